import type { z } from 'zod/v4';
import type { SessionContext } from '@domain/types/session.js';
import type { IBackend } from './backend.js';
import type { LongTermMemory } from './memory-store.js';

/** Long-term entry a stage hands back for the engine to store. */
export interface LongTermWrite {
  category: string;
  key: string;
  value: unknown;
}

export type StageOutcome =
  | {
      ok: true;
      output: SessionContext;
      reasoningPatternTag: string;
      confidence?: number;
      /** Stored only after the output is validated and the stage record persisted */
      memoryWrites?: readonly LongTermWrite[];
    }
  | { ok: false; error: Error };

/**
 * Contract every pipeline stage satisfies.
 *
 * The engine checks `declaredInputs()` against the context before calling
 * `execute`, and checks the returned output against `declaredOutputs()` and
 * `outputSchema` before merging it.
 */
export interface StageContract {
  readonly name: string;
  declaredInputs(): readonly string[];
  /** Keys read when present; recorded in the input snapshot but never required */
  optionalInputs(): readonly string[];
  declaredOutputs(): readonly string[];
  readonly outputSchema: z.ZodType;
  execute(
    context: Readonly<SessionContext>,
    backend: IBackend,
    memory: LongTermMemory,
  ): Promise<StageOutcome>;
}
