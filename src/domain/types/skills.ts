import { z } from 'zod/v4';

export const ProficiencySchema = z.enum(['beginner', 'intermediate', 'advanced', 'expert']);

export type Proficiency = z.infer<typeof ProficiencySchema>;

/** Levels that count an employee as qualified in a skill */
export const QUALIFIED_LEVELS: readonly Proficiency[] = ['advanced', 'expert'];

export const EmployeeSkillSchema = z.object({
  name: z.string().min(1),
  level: ProficiencySchema,
});

export const EmployeeSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  department: z.string().min(1),
  role: z.string().min(1),
  skills: z.array(EmployeeSkillSchema),
  /** Share of time free for new work, 0..1 */
  availability: z.number().min(0).max(1).default(1),
});

export type Employee = z.infer<typeof EmployeeSchema>;

export const ProjectSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  requiredSkills: z.array(z.string().min(1)),
  department: z.string().optional(),
  deadlineWeeks: z.number().int().positive().optional(),
});

export type Project = z.infer<typeof ProjectSchema>;

export const SkillMarketSchema = z.object({
  skill: z.string().min(1),
  demand: z.enum(['low', 'medium', 'high']),
  /** Typical weeks from opening a requisition to a start date */
  hireWeeks: z.number().int().positive(),
});

export type SkillMarket = z.infer<typeof SkillMarketSchema>;

export const CatalogSchema = z.object({
  employees: z.array(EmployeeSchema),
  projects: z.array(ProjectSchema).default([]),
  market: z.array(SkillMarketSchema).default([]),
});

export type Catalog = z.infer<typeof CatalogSchema>;

export const SkillDefinitionSchema = z.object({
  name: z.string().min(1),
  category: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
});

export type SkillDefinition = z.infer<typeof SkillDefinitionSchema>;

export const SkillVocabularySchema = z.object({
  skills: z.array(SkillDefinitionSchema).min(1),
  /** Weeks to bring someone at the given level up to qualified */
  upskillingWeeks: z.object({
    beginner: z.number().int().positive(),
    intermediate: z.number().int().positive(),
  }),
});

export type SkillVocabulary = z.infer<typeof SkillVocabularySchema>;
