import { z } from 'zod/v4';
import { BackendParamsSchema } from './backend.js';

export const BUILTIN_STAGES = ['perception', 'analysis', 'decision'] as const;

export const BackendConfigSchema = z.object({
  name: z.string().min(1),
  params: BackendParamsSchema.default({}),
});

export type BackendConfig = z.infer<typeof BackendConfigSchema>;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const GapflowConfigSchema = z.object({
  /** Default backend for every stage */
  backend: BackendConfigSchema.default(() => ({ name: 'anthropic', params: {} })),
  /** Per-stage backend overrides, keyed by stage name */
  stageBackends: z.record(z.string(), BackendConfigSchema).default({}),
  /** Upper bound on a single backend call */
  timeoutMs: z.number().int().positive().default(60_000),
  /** Ordered stage list; every name must be registered with the engine */
  stages: z.array(z.string().min(1)).min(1).default(() => [...BUILTIN_STAGES]),
  analysis: z.object({
    /** Qualified employees needed before a skill stops counting as a gap */
    requiredHeadcount: z.number().int().positive().default(2),
  }).default(() => ({ requiredHeadcount: 2 })),
  /** Alternative employee/project catalog, relative to the project root */
  dataCatalogPath: z.string().optional(),
  logging: z.object({
    level: LogLevelSchema.default('info'),
    json: z.boolean().default(false),
  }).default(() => ({ level: 'info' as const, json: false })),
});

export type GapflowConfig = z.infer<typeof GapflowConfigSchema>;

/** Input shape of the config file: every field optional. */
export type GapflowConfigInput = z.input<typeof GapflowConfigSchema>;
