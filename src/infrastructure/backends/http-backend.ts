import type { z } from 'zod/v4';
import type { GenerateResult } from '@domain/ports/backend.js';
import { BackendTimeoutError, BackendUnavailableError } from '@shared/lib/errors.js';

export type FetchFn = typeof fetch;

export interface HttpCall<T> {
  backend: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  /** Shape of a successful response body */
  responseSchema: z.ZodType<T>;
  /** Pull the generated text out of a parsed response */
  extractText: (response: T) => string | undefined;
  fetchFn?: FetchFn;
  signal?: AbortSignal;
  /** Reported in the timeout error when `signal` aborts the call */
  timeoutMs?: number;
}

/**
 * POST a JSON request to a model API and turn every failure into a
 * GenerateResult. Aborting `signal` cancels the request and yields a
 * BackendTimeoutError.
 */
export async function postForText<T>(call: HttpCall<T>): Promise<GenerateResult> {
  const started = Date.now();
  const elapsed = () => Date.now() - started;
  const fetchFn = call.fetchFn ?? fetch;
  const unavailable = (reason: string, cause?: unknown): GenerateResult => ({
    ok: false,
    error: new BackendUnavailableError(call.backend, reason, { cause }),
    durationMs: elapsed(),
  });

  let res: Response;
  try {
    res = await fetchFn(call.url, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...call.headers },
      body: JSON.stringify(call.body),
      signal: call.signal,
    });
  } catch (err) {
    if (call.signal?.aborted) {
      return {
        ok: false,
        error: new BackendTimeoutError(call.backend, call.timeoutMs ?? elapsed()),
        durationMs: elapsed(),
      };
    }
    return unavailable(err instanceof Error ? err.message : String(err), err);
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    return unavailable(`HTTP ${res.status}${text ? `: ${text.slice(0, 200)}` : ''}`);
  }

  let payload: unknown;
  try {
    payload = await res.json();
  } catch (err) {
    return unavailable('response was not JSON', err);
  }

  const parsed = call.responseSchema.safeParse(payload);
  if (!parsed.success) {
    return unavailable('unexpected response shape', parsed.error);
  }

  const text = call.extractText(parsed.data);
  if (text === undefined) {
    return unavailable('response contained no text');
  }
  return { ok: true, text, durationMs: elapsed() };
}
