import { z } from 'zod/v4';

export const SessionStatusSchema = z.enum(['pending', 'running', 'completed', 'failed']);

export type SessionStatus = z.infer<typeof SessionStatusSchema>;

/** Context keys and values shared between stages. Values are plain JSON. */
export const SessionContextSchema = z.record(z.string(), z.unknown());

export type SessionContext = z.infer<typeof SessionContextSchema>;

export const StructuredErrorSchema = z.object({
  /** Error class name, e.g. MissingInputError */
  name: z.string(),
  message: z.string(),
  stage: z.string().optional(),
  missingKeys: z.array(z.string()).optional(),
  /** Message of the underlying error, when one was wrapped */
  cause: z.string().optional(),
});

export type StructuredError = z.infer<typeof StructuredErrorSchema>;

/**
 * One executed stage. Written once, never modified.
 */
export const StageRecordSchema = z.object({
  stageName: z.string().min(1),
  /** Copy of the context keys the stage declared as inputs */
  inputSnapshot: SessionContextSchema,
  outputSnapshot: SessionContextSchema,
  /** Audit label of the prompting strategy (cot, react, tot, ...) */
  reasoningPatternTag: z.string(),
  confidence: z.number().min(0).max(1).optional(),
  /** Backend that produced the output */
  backend: z.string(),
  /** True when the output came from the stub after the requested backend failed */
  fallback: z.boolean(),
  timestamp: z.string().datetime(),
  /** Unused by the engine, which records only successful stages; the session carries the failure */
  error: StructuredErrorSchema.optional(),
});

export type StageRecord = z.infer<typeof StageRecordSchema>;

export const SessionStateSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  status: SessionStatusSchema,
  context: SessionContextSchema,
  stageHistory: z.array(StageRecordSchema),
  error: StructuredErrorSchema.optional(),
});

export type SessionState = z.infer<typeof SessionStateSchema>;

export interface SessionResult {
  sessionId: string;
  status: SessionStatus;
  context: SessionContext;
  stageHistory: StageRecord[];
  error?: StructuredError;
  /** False when the latest state could not be written to the store */
  durable: boolean;
}
