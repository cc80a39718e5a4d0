import { z } from 'zod/v4';

export const LongTermCategorySchema = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'category must be lowercase letters, digits, "-" or "_"');

export const LongTermEntrySchema = z.object({
  category: LongTermCategorySchema,
  key: z.string().min(1),
  value: z.unknown(),
  updatedAt: z.string().datetime(),
});

export type LongTermEntry = z.infer<typeof LongTermEntrySchema>;
