import type { BackendParams } from '@domain/types/backend.js';
import type { TraceDraft } from '@domain/types/trace.js';
import type { RecoverableBackendError } from '@shared/lib/errors.js';

/**
 * Outcome of one generate call. Failures are values, never thrown, so a
 * stage can hand them straight back to the engine's fallback branch.
 */
export type GenerateResult =
  | { ok: true; text: string; durationMs: number }
  | { ok: false; error: RecoverableBackendError; durationMs: number };

/**
 * Port interface for text-generation backends.
 *
 * Built-in backends:
 * - anthropic: Messages API
 * - groq: OpenAI-compatible chat completions
 * - stub: deterministic canned replies, no network
 */
export interface IBackend {
  /** Registry name of this backend (e.g., 'anthropic', 'stub') */
  readonly name: string;
  /** `signal` aborts the in-flight call; implementations that cannot cancel may ignore it. */
  generate(prompt: string, params?: BackendParams, signal?: AbortSignal): Promise<GenerateResult>;
}

export interface BackendSelection {
  backend: IBackend;
  /** True when the stub was substituted for the requested backend */
  fallback: boolean;
  /** Present when selection fell back; the caller appends it to the session trace */
  fallbackTrace?: TraceDraft;
}
