import { z } from 'zod/v4';

export const TraceOutcomeSchema = z.enum(['ok', 'fallback', 'error']);

export type TraceOutcome = z.infer<typeof TraceOutcomeSchema>;

/**
 * Audit record of one actor invocation (a stage, or the backend selector).
 * Append-only; nothing in the workflow reads traces back.
 */
export const TraceEntrySchema = z.object({
  id: z.string().uuid(),
  sessionId: z.string().optional(),
  /** e.g. "stage:analysis" or "backend-selector" */
  actor: z.string().min(1),
  inputs: z.record(z.string(), z.unknown()),
  outputs: z.record(z.string(), z.unknown()),
  durationMs: z.number().min(0),
  outcome: TraceOutcomeSchema,
  detail: z.string().optional(),
  recordedAt: z.string().datetime(),
});

export type TraceEntry = z.infer<typeof TraceEntrySchema>;

export interface TraceFilter {
  sessionId?: string;
  outcome?: TraceOutcome;
  /** Keep only the most recent N entries */
  limit?: number;
}

/** A trace entry before the store assigns its id and timestamp. */
export type TraceDraft = Omit<TraceEntry, 'id' | 'recordedAt' | 'sessionId'>;
