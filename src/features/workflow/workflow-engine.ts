import { randomUUID } from 'node:crypto';
import type { IBackend, BackendSelection } from '@domain/ports/backend.js';
import type { IBackendSelector } from '@domain/ports/backend-selector.js';
import type { IMemoryStore } from '@domain/ports/memory-store.js';
import type { LongTermWrite, StageContract, StageOutcome } from '@domain/ports/stage.js';
import type { BackendRequest } from '@domain/types/backend.js';
import { STUB_BACKEND } from '@domain/types/backend.js';
import { BUILTIN_STAGES, type BackendConfig } from '@domain/types/config.js';
import type { LongTermEntry } from '@domain/types/long-term.js';
import type {
  SessionContext,
  SessionResult,
  SessionState,
  StageRecord,
} from '@domain/types/session.js';
import type { TraceDraft } from '@domain/types/trace.js';
import {
  assertTransition,
  collidingKeys,
  findOutputConflicts,
  isTerminal,
  isValidSessionId,
  missingInputs,
  nextStageIndex,
  snapshot,
} from '@domain/rules/session-rules.js';
import {
  ContextCollisionError,
  GapflowError,
  isRecoverableBackendError,
  MissingInputError,
  SessionBusyError,
  SessionNotFoundError,
  StageExecutionError,
  StageNotFoundError,
  ValidationError,
} from '@shared/lib/errors.js';
import { logger, type Logger } from '@shared/lib/logger.js';
import { toTraceEntry } from '@infra/memory/memory-store.js';
import { toStructuredError } from './structured-error.js';

/** Context key holding the user's question. Stages may read it but never write it. */
export const RAW_INPUT_KEY = 'raw_input';

/** Which stages run, and on which backend. Omitted fields use the engine defaults. */
export interface RunConfig {
  stages?: readonly string[];
  backend?: BackendConfig;
  stageBackends?: Record<string, BackendConfig>;
}

export interface RunRequest {
  /** Resume this session, or start it under this id. A new id is generated when omitted. */
  sessionId?: string;
  /** Stored as `raw_input` when the session is created; ignored on resume */
  userInput: string;
  /** Extra keys for a new session's initial context, e.g. `project_id` */
  seed?: SessionContext;
  config?: RunConfig;
}

/**
 * Optional lifecycle hooks. Errors are swallowed and logged as warnings.
 */
export interface WorkflowHooks {
  onStageStart?: (stage: string, index: number, sessionId: string) => Promise<void> | void;
  onStageComplete?: (stage: string, index: number, record: StageRecord) => Promise<void> | void;
  onStageFail?: (stage: string, index: number, error: unknown) => Promise<void> | void;
}

/**
 * Dependencies injected into the engine for testability.
 */
export interface WorkflowEngineDeps {
  memory: IMemoryStore;
  selector: IBackendSelector;
  /** Every stage the engine can run, looked up by name */
  stages: readonly StageContract[];
  /** Defaults for requests that carry no config of their own */
  config?: RunConfig;
  hooks?: WorkflowHooks;
  logger?: Logger;
  now?: () => Date;
  newSessionId?: () => string;
}

const DEFAULT_BACKEND: BackendConfig = { name: 'anthropic', params: {} };

interface ResolvedConfig {
  stages: readonly string[];
  backend: BackendConfig;
  stageBackends: Record<string, BackendConfig>;
}

interface StageRun {
  outcome: StageOutcome;
  backend: IBackend;
  fallback: boolean;
  durationMs: number;
}

/**
 * Workflow Engine — drives one session through its ordered stage list.
 *
 * For each stage not yet in the session's history:
 * 1. Check the declared inputs are in context
 * 2. Select a backend (the stub when the requested one is unusable)
 * 3. Execute; on a recoverable backend failure, re-run once on the stub
 * 4. Validate the output against the declared keys and schema
 * 5. Merge the output, append a stage record, persist, append a trace entry
 *
 * Resuming a session skips every stage already recorded. Completed and
 * failed sessions are returned as stored. `run` only rejects with
 * SessionBusyError; every other failure ends in a failed SessionResult.
 */
export class WorkflowEngine {
  private readonly registry: Map<string, StageContract>;
  private readonly leases = new Set<string>();

  constructor(private readonly deps: WorkflowEngineDeps) {
    this.registry = new Map(deps.stages.map((stage) => [stage.name, stage]));
  }

  async run(request: RunRequest): Promise<SessionResult> {
    const sessionId = request.sessionId ?? this.newSessionId();
    if (this.leases.has(sessionId)) {
      throw new SessionBusyError(sessionId);
    }

    this.leases.add(sessionId);
    try {
      return await this.runLeased(sessionId, request);
    } finally {
      this.leases.delete(sessionId);
    }
  }

  /** Read-only copy of a stored session. */
  async getSession(id: string): Promise<SessionState> {
    const state = await this.deps.memory.loadSession(id);
    if (!state) throw new SessionNotFoundError(id);
    return state;
  }

  async listSessions(): Promise<SessionState[]> {
    return this.deps.memory.listSessions();
  }

  async putLongTerm(category: string, key: string, value: unknown): Promise<LongTermEntry> {
    return this.deps.memory.putLongTerm(category, key, value);
  }

  async getLongTerm(category: string, key: string): Promise<LongTermEntry | undefined> {
    return this.deps.memory.getLongTerm(category, key);
  }

  // ---- run loop -------------------------------------------------------------

  private async runLeased(sessionId: string, request: RunRequest): Promise<SessionResult> {
    const log = (this.deps.logger ?? logger).child({ sessionId });

    if (!isValidSessionId(sessionId)) {
      const error = new ValidationError(`Invalid session id "${sessionId}"`, []);
      log.error(error.message);
      return this.detachedFailure(sessionId, request, error);
    }

    let state: SessionState;
    try {
      const stored = await this.deps.memory.loadSession(sessionId);
      if (stored && isTerminal(stored.status)) {
        log.info(`Session is already ${stored.status}; nothing to run`);
        return toResult(stored, true);
      }
      state = stored ?? this.createSession(sessionId, request);
    } catch (error) {
      log.error('Could not load session', { error: errorMessage(error) });
      return this.detachedFailure(sessionId, request, error);
    }

    if (state.status === 'pending') {
      assertTransition(state.status, 'running');
      state = { ...state, status: 'running', updatedAt: this.timestamp() };
    }

    const config = this.resolveConfig(request.config);
    const stages: StageContract[] = [];
    for (const name of config.stages) {
      const stage = this.registry.get(name);
      if (!stage) {
        return this.fail(state, new StageNotFoundError(name, [...this.registry.keys()]), name, -1, log);
      }
      stages.push(stage);
    }

    const conflicts = findOutputConflicts(
      stages.map((s) => ({ name: s.name, outputs: s.declaredOutputs() })),
      [RAW_INPUT_KEY],
    );
    const conflict = conflicts[0];
    if (conflict) {
      return this.fail(state, new ContextCollisionError(conflict.stage, conflict.keys), conflict.stage, -1, log);
    }

    try {
      await this.deps.memory.saveSession(state);
    } catch (error) {
      log.error('Could not persist session start', { error: errorMessage(error) });
      return toResult(this.failedState(state, error), false);
    }

    const names = stages.map((s) => s.name);
    for (let i = nextStageIndex(names, state.stageHistory); i < stages.length; i++) {
      const stage = stages[i];
      if (!stage) continue;
      if (state.stageHistory.some((r) => r.stageName === stage.name)) continue;

      log.info(`Stage ${stage.name} started`, { index: i });
      await this.fireHook('onStageStart', () => this.deps.hooks?.onStageStart?.(stage.name, i, sessionId), log);

      const missing = missingInputs(state.context, stage.declaredInputs());
      if (missing.length > 0) {
        return this.fail(state, new MissingInputError(stage.name, missing), stage.name, i, log);
      }

      const collisions = collidingKeys(state.context, stage.declaredOutputs());
      if (collisions.length > 0) {
        return this.fail(state, new ContextCollisionError(stage.name, collisions), stage.name, i, log);
      }

      const request = config.stageBackends[stage.name] ?? config.backend;
      const run = await this.executeWithFallback(stage, state, request, log);
      if (!run.outcome.ok) {
        return this.fail(state, run.outcome.error, stage.name, i, log);
      }

      const output = run.outcome.output;
      const invalid = validateOutput(stage, output) ?? validateConfidence(stage, run.outcome.confidence);
      if (invalid) {
        return this.fail(state, invalid, stage.name, i, log);
      }

      const record: StageRecord = {
        stageName: stage.name,
        inputSnapshot: snapshot(state.context, [...stage.declaredInputs(), ...stage.optionalInputs()]),
        outputSnapshot: snapshot(output, stage.declaredOutputs()),
        reasoningPatternTag: run.outcome.reasoningPatternTag,
        ...(run.outcome.confidence !== undefined ? { confidence: run.outcome.confidence } : {}),
        backend: run.backend.name,
        fallback: run.fallback,
        timestamp: this.timestamp(),
      };

      state = {
        ...state,
        context: { ...state.context, ...snapshot(output, stage.declaredOutputs()) },
        stageHistory: [...state.stageHistory, record],
        updatedAt: record.timestamp,
      };

      try {
        await this.deps.memory.saveSession(state);
      } catch (error) {
        log.error(`Could not persist session after stage ${stage.name}`, { error: errorMessage(error) });
        await this.fireHook('onStageFail', () => this.deps.hooks?.onStageFail?.(stage.name, i, error), log);
        return toResult(this.failedState(state, error, stage.name), false);
      }

      await this.storeLongTerm(stage.name, run.outcome.memoryWrites ?? [], log);
      await this.trace(sessionId, {
        actor: `stage:${stage.name}`,
        inputs: record.inputSnapshot,
        outputs: record.outputSnapshot,
        durationMs: run.durationMs,
        outcome: run.fallback ? 'fallback' : 'ok',
      }, log);

      log.info(`Stage ${stage.name} completed`, { backend: record.backend, fallback: record.fallback });
      await this.fireHook('onStageComplete', () => this.deps.hooks?.onStageComplete?.(stage.name, i, record), log);
    }

    assertTransition(state.status, 'completed');
    state = { ...state, status: 'completed', updatedAt: this.timestamp() };
    try {
      await this.deps.memory.saveSession(state);
    } catch (error) {
      // Every stage record is already durable; only the status flip was lost.
      log.error('Could not persist session completion', { error: errorMessage(error) });
      return { ...toResult(state, false), error: toStructuredError(error) };
    }

    log.info('Session completed', { stages: state.stageHistory.length });
    return toResult(state, true);
  }

  /**
   * Select a backend and execute the stage. A recoverable failure on a live
   * backend is retried exactly once on the stub; a second failure becomes
   * StageExecutionError.
   */
  private async executeWithFallback(
    stage: StageContract,
    state: SessionState,
    request: BackendRequest,
    log: Logger,
  ): Promise<StageRun> {
    const selection = this.deps.selector.select(request);
    await this.traceSelection(state.id, selection, log);

    const first = await this.attempt(stage, state.context, selection.backend);
    if (first.outcome.ok || !isRecoverableBackendError(first.outcome.error)) {
      return { ...first, fallback: selection.fallback };
    }

    const reason = first.outcome.error.message;
    if (selection.backend.name === STUB_BACKEND) {
      return {
        ...first,
        outcome: { ok: false, error: new StageExecutionError(stage.name, reason, { cause: first.outcome.error }) },
        fallback: selection.fallback,
      };
    }

    log.warn(`Stage ${stage.name} backend failed; retrying on the stub`, { backend: selection.backend.name, reason });
    const retrySelection = this.deps.selector.fallback(request, reason);
    await this.traceSelection(state.id, retrySelection, log);

    const retry = await this.attempt(stage, state.context, retrySelection.backend);
    if (retry.outcome.ok) {
      return { ...retry, fallback: true };
    }
    const cause = retry.outcome.error;
    return {
      ...retry,
      outcome: {
        ok: false,
        error: cause instanceof GapflowError && !isRecoverableBackendError(cause)
          ? cause
          : new StageExecutionError(stage.name, `retry on the stub failed: ${cause.message}`, { cause }),
      },
      fallback: true,
    };
  }

  /** A failed write is logged; the stage is already recorded and is not rerun. */
  private async storeLongTerm(stageName: string, writes: readonly LongTermWrite[], log: Logger): Promise<void> {
    for (const write of writes) {
      try {
        await this.deps.memory.putLongTerm(write.category, write.key, write.value);
      } catch (error) {
        log.error(`Could not store long-term entry ${write.category}/${write.key} from stage ${stageName}`, {
          error: errorMessage(error),
        });
      }
    }
  }

  private async attempt(
    stage: StageContract,
    context: SessionContext,
    backend: IBackend,
  ): Promise<Omit<StageRun, 'fallback'>> {
    const started = Date.now();
    let outcome: StageOutcome;
    try {
      outcome = await stage.execute(structuredClone(context), backend, this.deps.memory);
    } catch (error) {
      outcome = {
        ok: false,
        error: error instanceof GapflowError
          ? error
          : new StageExecutionError(stage.name, errorMessage(error), { cause: error }),
      };
    }
    return { outcome, backend, durationMs: Date.now() - started };
  }

  // ---- failure paths -------------------------------------------------------

  private async fail(
    state: SessionState,
    error: unknown,
    stageName: string,
    index: number,
    log: Logger,
  ): Promise<SessionResult> {
    log.error(`Stage ${stageName} failed`, { error: errorMessage(error) });
    const failed = this.failedState(state, error, stageName);

    let durable = true;
    try {
      await this.deps.memory.saveSession(failed);
    } catch (persistErr) {
      durable = false;
      log.error('Could not persist failed session state', { error: errorMessage(persistErr) });
    }

    await this.trace(state.id, {
      actor: `stage:${stageName}`,
      inputs: {},
      outputs: {},
      durationMs: 0,
      outcome: 'error',
      detail: errorMessage(error),
    }, log);

    await this.fireHook('onStageFail', () => this.deps.hooks?.onStageFail?.(stageName, index, error), log);
    return toResult(failed, durable);
  }

  private failedState(state: SessionState, error: unknown, stageName?: string): SessionState {
    if (state.status !== 'failed') assertTransition(state.status, 'failed');
    return {
      ...state,
      status: 'failed',
      error: toStructuredError(error, stageName),
      updatedAt: this.timestamp(),
    };
  }

  /** A failure before any state could be loaded or created; nothing is written. */
  private detachedFailure(sessionId: string, request: RunRequest, error: unknown): SessionResult {
    return {
      sessionId,
      status: 'failed',
      context: { ...request.seed, [RAW_INPUT_KEY]: request.userInput },
      stageHistory: [],
      error: toStructuredError(error),
      durable: false,
    };
  }

  // ---- helpers --------------------------------------------------------------

  private createSession(id: string, request: RunRequest): SessionState {
    const now = this.timestamp();
    return {
      id,
      createdAt: now,
      updatedAt: now,
      status: 'pending',
      context: { ...structuredClone(request.seed ?? {}), [RAW_INPUT_KEY]: request.userInput },
      stageHistory: [],
    };
  }

  private resolveConfig(override?: RunConfig): ResolvedConfig {
    const defaults = this.deps.config;
    return {
      stages: override?.stages ?? defaults?.stages ?? BUILTIN_STAGES,
      backend: override?.backend ?? defaults?.backend ?? DEFAULT_BACKEND,
      stageBackends: { ...defaults?.stageBackends, ...override?.stageBackends },
    };
  }

  private async traceSelection(sessionId: string, selection: BackendSelection, log: Logger): Promise<void> {
    if (selection.fallbackTrace) {
      await this.trace(sessionId, selection.fallbackTrace, log);
    }
  }

  /** Trace writes are audit only: a failure is logged and the run continues. */
  private async trace(sessionId: string, draft: TraceDraft, log: Logger): Promise<void> {
    try {
      await this.deps.memory.appendTrace(toTraceEntry(draft, sessionId, this.now()));
    } catch (error) {
      log.warn('Could not append trace entry', { actor: draft.actor, error: errorMessage(error) });
    }
  }

  private async fireHook(hookName: string, fn: () => Promise<void> | void, log: Logger): Promise<void> {
    try {
      await fn();
    } catch (err) {
      log.warn('Lifecycle hook error (swallowed)', {
        hook: hookName,
        error: errorMessage(err),
      });
    }
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private newSessionId(): string {
    return this.deps.newSessionId?.() ?? randomUUID();
  }
}

/**
 * Check a stage's output: the key set must equal the declared outputs and
 * the values must satisfy the stage's schema.
 */
export function validateOutput(stage: StageContract, output: SessionContext): ValidationError | undefined {
  const declared = [...stage.declaredOutputs()].sort();
  const actual = Object.keys(output).sort();
  if (declared.length !== actual.length || declared.some((key, i) => key !== actual[i])) {
    return new ValidationError(
      `Stage "${stage.name}" returned keys [${actual.join(', ')}], expected [${declared.join(', ')}]`,
      [],
      stage.name,
    );
  }

  const parsed = stage.outputSchema.safeParse(output);
  if (!parsed.success) {
    return new ValidationError(
      `Stage "${stage.name}" returned output that does not match its schema`,
      parsed.error.issues,
      stage.name,
    );
  }
  return undefined;
}

/** Confidence is optional; when reported it must be a finite number in [0, 1]. */
export function validateConfidence(stage: StageContract, confidence: number | undefined): ValidationError | undefined {
  if (confidence === undefined) return undefined;
  if (Number.isFinite(confidence) && confidence >= 0 && confidence <= 1) return undefined;
  return new ValidationError(
    `Stage "${stage.name}" reported confidence ${confidence}, expected a number in [0, 1]`,
    [],
    stage.name,
  );
}

function toResult(state: SessionState, durable: boolean): SessionResult {
  return {
    sessionId: state.id,
    status: state.status,
    context: state.context,
    stageHistory: state.stageHistory,
    ...(state.error ? { error: state.error } : {}),
    durable,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
