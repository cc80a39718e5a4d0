import { z } from 'zod/v4';

export const IntentSchema = z.enum([
  'skill_gap_analysis',
  'team_optimization',
  'upskilling_plan',
  'project_readiness',
]);

export type Intent = z.infer<typeof IntentSchema>;

export const SkillGapSchema = z.object({
  skill: z.string().min(1),
  /** Employees at a qualified level */
  qualified: z.number().int().min(0),
  /** Headcount the analysis asked for */
  required: z.number().int().positive(),
  severity: z.enum(['high', 'medium']),
  /** Seen as a gap in an earlier session */
  recurring: z.boolean(),
});

export type SkillGap = z.infer<typeof SkillGapSchema>;

export const GapAnalysisSchema = z.object({
  requiredSkills: z.array(z.string()),
  gaps: z.array(SkillGapSchema),
  riskFactors: z.array(z.string()),
  successProbability: z.number().min(0).max(1),
  timelineAssessment: z.string().optional(),
  summary: z.string(),
});

export type GapAnalysis = z.infer<typeof GapAnalysisSchema>;

export const StrategySchema = z.enum(['upskill', 'transfer', 'hire', 'none']);

export type Strategy = z.infer<typeof StrategySchema>;

export const RecommendationSchema = z.object({
  skill: z.string().nullable(),
  strategy: StrategySchema,
  /** Employee id for upskill/transfer */
  candidate: z.string().optional(),
  timelineWeeks: z.number().int().min(0),
  rationale: z.string(),
});

export type Recommendation = z.infer<typeof RecommendationSchema>;
