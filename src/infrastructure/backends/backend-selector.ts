import type { IBackend, BackendSelection, GenerateResult } from '@domain/ports/backend.js';
import type { IBackendSelector } from '@domain/ports/backend-selector.js';
import { STUB_BACKEND, type BackendParams, type BackendRequest } from '@domain/types/backend.js';
import type { TraceDraft } from '@domain/types/trace.js';
import { BackendTimeoutError, BackendUnavailableError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { AnthropicBackend } from './anthropic-backend.js';
import { GroqBackend } from './groq-backend.js';
import { StubBackend } from './stub-backend.js';
import type { FetchFn } from './http-backend.js';

export type Env = Record<string, string | undefined>;

export interface BackendFactoryContext {
  params: BackendParams;
  /** Credentials named by the definition, all present */
  credentials: Record<string, string>;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

export interface BackendDefinition {
  /** Environment variables that must be set before the backend can be built */
  credentials: readonly string[];
  /** Must not perform I/O; instances are cached and shared across sessions */
  create(ctx: BackendFactoryContext): IBackend;
}

export interface BackendSelectorOptions {
  /** Credential source; defaults to process.env */
  env?: Env;
  /** Upper bound for one generate call on a live backend */
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

export const DEFAULT_TIMEOUT_MS = 60_000;

/** JSON with sorted keys, so equal params give equal cache keys. */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Wraps a live backend so a call can neither hang past the timeout nor throw.
 */
export class GuardedBackend implements IBackend {
  constructor(
    private readonly inner: IBackend,
    private readonly timeoutMs: number,
  ) {}

  get name(): string {
    return this.inner.name;
  }

  async generate(prompt: string, params?: BackendParams): Promise<GenerateResult> {
    const started = Date.now();
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timedOut = new Promise<GenerateResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          ok: false,
          error: new BackendTimeoutError(this.inner.name, this.timeoutMs),
          durationMs: Date.now() - started,
        });
      }, this.timeoutMs);
    });

    const call = this.inner.generate(prompt, params, controller.signal).catch(
      (err: unknown): GenerateResult => ({
        ok: false,
        error: new BackendUnavailableError(
          this.inner.name,
          err instanceof Error ? err.message : String(err),
          { cause: err },
        ),
        durationMs: Date.now() - started,
      }),
    );

    try {
      return await Promise.race([call, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Resolves backend requests to live backends, substituting the stub when the
 * requested backend is unknown or its credentials are missing.
 *
 * Uses a static registry so external code can register additional backends
 * without modifying this source file:
 *
 *   BackendSelector.register('my-backend', { credentials: ['MY_KEY'], create: (ctx) => new MyBackend(ctx) });
 *
 * Live instances are cached per (name, params) for the selector's lifetime.
 * Selection never touches session state: a fallback comes back with a trace
 * draft for the caller to record.
 */
export class BackendSelector implements IBackendSelector {
  private static readonly registry = new Map<string, BackendDefinition>([
    [
      'anthropic',
      {
        credentials: ['ANTHROPIC_API_KEY'],
        create: (ctx) =>
          new AnthropicBackend({
            apiKey: ctx.credentials['ANTHROPIC_API_KEY'] ?? '',
            params: ctx.params,
            fetchFn: ctx.fetchFn,
            timeoutMs: ctx.timeoutMs,
          }),
      },
    ],
    [
      'groq',
      {
        credentials: ['GROQ_API_KEY'],
        create: (ctx) =>
          new GroqBackend({
            apiKey: ctx.credentials['GROQ_API_KEY'] ?? '',
            params: ctx.params,
            fetchFn: ctx.fetchFn,
            timeoutMs: ctx.timeoutMs,
          }),
      },
    ],
  ]);

  /**
   * Register a backend definition under the given name.
   * Warns when overwriting an existing registration.
   */
  static register(name: string, definition: BackendDefinition): void {
    if (name === STUB_BACKEND) {
      throw new Error(`"${STUB_BACKEND}" is reserved for the built-in fallback backend`);
    }
    if (BackendSelector.registry.has(name)) {
      logger.warn(`BackendSelector: overwriting existing registration for backend "${name}".`);
    }
    BackendSelector.registry.set(name, definition);
  }

  /**
   * Remove a registered backend. Primarily for test cleanup.
   */
  static unregister(name: string): void {
    BackendSelector.registry.delete(name);
  }

  /** Registered backend names, the stub included. */
  static registered(): string[] {
    return [...BackendSelector.registry.keys(), STUB_BACKEND];
  }

  private readonly cache = new Map<string, IBackend>();
  private readonly stub = new StubBackend();
  private readonly env: Env;
  private readonly timeoutMs: number;
  private readonly fetchFn?: FetchFn;

  constructor(options: BackendSelectorOptions = {}) {
    this.env = options.env ?? process.env;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn;
  }

  select(request: BackendRequest): BackendSelection {
    if (request.name === STUB_BACKEND) {
      return { backend: this.stub, fallback: false };
    }

    const definition = BackendSelector.registry.get(request.name);
    if (!definition) {
      const valid = BackendSelector.registered().join(', ');
      logger.warn(`Unknown backend "${request.name}"; using the stub. Registered backends are: ${valid}`);
      return this.fallback(request, `unknown backend "${request.name}"`);
    }

    const missing = this.missingCredentials(request.name);
    if (missing.length > 0) {
      logger.warn(`Backend "${request.name}" has no credentials; using the stub`, { missing });
      return this.fallback(request, `missing credentials: ${missing.join(', ')}`);
    }

    const key = `${request.name}:${stableStringify(request.params)}`;
    let backend = this.cache.get(key);
    if (!backend) {
      const credentials: Record<string, string> = {};
      for (const name of definition.credentials) {
        credentials[name] = this.env[name] ?? '';
      }
      backend = new GuardedBackend(
        definition.create({
          params: request.params,
          credentials,
          timeoutMs: this.timeoutMs,
          fetchFn: this.fetchFn,
        }),
        this.timeoutMs,
      );
      this.cache.set(key, backend);
    }
    return { backend, fallback: false };
  }

  fallback(request: BackendRequest, reason: string): BackendSelection {
    const trace: TraceDraft = {
      actor: 'backend-selector',
      inputs: { backend: request.name, params: request.params },
      outputs: { backend: STUB_BACKEND },
      durationMs: 0,
      outcome: 'fallback',
      detail: reason,
    };
    return { backend: this.stub, fallback: true, fallbackTrace: trace };
  }

  /** Credentials a registered backend needs that the environment lacks. */
  missingCredentials(name: string): string[] {
    const definition = BackendSelector.registry.get(name);
    if (!definition) return [];
    return definition.credentials.filter((cred) => !this.env[cred]);
  }
}
