import { z } from 'zod/v4';

export const BackendParamsSchema = z.object({
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
});

export type BackendParams = z.infer<typeof BackendParamsSchema>;

/** A named backend plus the parameters it should be constructed with. */
export const BackendRequestSchema = z.object({
  name: z.string().min(1),
  params: BackendParamsSchema.default({}),
});

export type BackendRequest = z.infer<typeof BackendRequestSchema>;

export const STUB_BACKEND = 'stub';
