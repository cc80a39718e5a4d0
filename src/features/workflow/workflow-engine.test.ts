import { z } from 'zod/v4';
import type { BackendSelection, GenerateResult, IBackend } from '@domain/ports/backend.js';
import type { IBackendSelector } from '@domain/ports/backend-selector.js';
import type { StageContract, StageOutcome } from '@domain/ports/stage.js';
import type { BackendRequest } from '@domain/types/backend.js';
import type { SessionContext, SessionState } from '@domain/types/session.js';
import { StubBackend } from '@infra/backends/stub-backend.js';
import { BackendSelector } from '@infra/backends/backend-selector.js';
import { MemoryStore } from '@infra/memory/memory-store.js';
import { MemoryPersistence } from '@infra/persistence/memory-persistence.js';
import { CatalogDataProvider } from '@infra/data/catalog-data-provider.js';
import { loadSkillVocabulary } from '@infra/data/data-files.js';
import { createBuiltinStages } from '@features/stages/builtin-stages.js';
import {
  BackendTimeoutError,
  BackendUnavailableError,
  SessionBusyError,
  SessionNotFoundError,
  StorageError,
} from '@shared/lib/errors.js';
import { createLogger, logger } from '@shared/lib/logger.js';
import { WorkflowEngine, type WorkflowEngineDeps } from './workflow-engine.js';

const silent = createLogger({ write: () => {} });
const STUB_CONFIG = { backend: { name: 'stub', params: {} } };

interface ScriptedStage extends StageContract {
  calls: number;
}

interface ScriptedStageOptions {
  inputs: string[];
  outputs: string[];
  run?: (context: Readonly<SessionContext>, backend: IBackend) => Promise<StageOutcome>;
}

/** A stage that asks its backend once and writes "<stage>:<key>" to each output. */
function scriptedStage(name: string, options: ScriptedStageOptions): ScriptedStage {
  const shape: Record<string, z.ZodString> = {};
  for (const key of options.outputs) shape[key] = z.string();

  const stage: ScriptedStage = {
    name,
    calls: 0,
    outputSchema: z.object(shape),
    declaredInputs: () => options.inputs,
    optionalInputs: () => [],
    declaredOutputs: () => options.outputs,
    async execute(context, backend) {
      stage.calls++;
      if (options.run) return options.run(context, backend);
      const result = await backend.generate(`task: ${name}`);
      if (!result.ok) return { ok: false, error: result.error };
      return {
        ok: true,
        output: Object.fromEntries(options.outputs.map((key) => [key, `${name}:${key}`])),
        reasoningPatternTag: 'cot',
      };
    },
  };
  return stage;
}

function pipeline(): ScriptedStage[] {
  return [
    scriptedStage('perception', { inputs: ['raw_input'], outputs: ['normalized_question'] }),
    scriptedStage('analysis', { inputs: ['normalized_question'], outputs: ['gap_analysis'] }),
    scriptedStage('decision', { inputs: ['gap_analysis'], outputs: ['recommendations'] }),
  ];
}

class DownBackend implements IBackend {
  readonly name = 'live';
  calls = 0;

  async generate(): Promise<GenerateResult> {
    this.calls++;
    return { ok: false, error: new BackendUnavailableError('live', 'HTTP 503'), durationMs: 5 };
  }
}

/** Hands out `live` for every non-stub request and records fallbacks. */
class FakeSelector implements IBackendSelector {
  readonly stub = new StubBackend();
  readonly fallbacks: string[] = [];

  constructor(private readonly live: IBackend) {}

  select(request: BackendRequest): BackendSelection {
    return { backend: request.name === 'stub' ? this.stub : this.live, fallback: false };
  }

  fallback(request: BackendRequest, reason: string): BackendSelection {
    this.fallbacks.push(reason);
    return {
      backend: this.stub,
      fallback: true,
      fallbackTrace: {
        actor: 'backend-selector',
        inputs: { backend: request.name },
        outputs: { backend: 'stub' },
        durationMs: 0,
        outcome: 'fallback',
        detail: reason,
      },
    };
  }
}

/** MemoryPersistence that accepts `okWrites` writes, then fails every write. */
class FailingWrites extends MemoryPersistence {
  constructor(private okWrites: number) {
    super();
  }

  override async write<T>(filePath: string, data: T, schema: z.ZodType<T>): Promise<void> {
    if (this.okWrites <= 0) throw new StorageError('disk full', filePath);
    this.okWrites--;
    await super.write(filePath, data, schema);
  }
}

/** MemoryPersistence whose writes wait `delayMs` before landing. */
class SlowWrites extends MemoryPersistence {
  constructor(private readonly delayMs: number) {
    super();
  }

  override async write<T>(filePath: string, data: T, schema: z.ZodType<T>): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    await super.write(filePath, data, schema);
  }
}

describe('WorkflowEngine', () => {
  let memory: MemoryStore;

  function engineWith(overrides: Partial<WorkflowEngineDeps> = {}): WorkflowEngine {
    return new WorkflowEngine({
      memory,
      selector: new FakeSelector(new StubBackend()),
      stages: pipeline(),
      config: STUB_CONFIG,
      logger: silent,
      ...overrides,
    });
  }

  beforeEach(() => {
    memory = MemoryStore.inMemory();
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('with the built-in stages', () => {
    const vocabulary = loadSkillVocabulary();
    const dataProvider = CatalogDataProvider.fromFile();
    const stages = () => createBuiltinStages({ vocabulary, dataProvider, requiredHeadcount: 2 });

    it('answers a React staffing question end to end on the stub', async () => {
      const engine = engineWith({ stages: stages(), selector: new BackendSelector({ env: {} }) });

      const result = await engine.run({ sessionId: 's-react', userInput: 'What skills do we need for a React project?' });

      expect(result.status).toBe('completed');
      expect(result.durable).toBe(true);
      expect(result.context['entities']).toEqual(['React']);
      expect(result.context['gap_analysis']).toMatchObject({
        gaps: [{ skill: 'React', qualified: 1, required: 2, severity: 'medium' }],
      });
      expect(result.context['recommendations']).toEqual([
        {
          skill: 'React',
          strategy: 'upskill',
          candidate: 'emp-002',
          timelineWeeks: 2,
          rationale: 'Jordan Vale already works with React at intermediate level',
        },
      ]);
      expect(result.stageHistory.map((r) => [r.stageName, r.reasoningPatternTag])).toEqual([
        ['perception', 'cot'],
        ['analysis', 'react'],
        ['decision', 'tot'],
      ]);
    });

    it('completes on the stub when the configured backend has no credentials', async () => {
      const engine = engineWith({
        stages: stages(),
        selector: new BackendSelector({ env: {} }),
        config: { backend: { name: 'anthropic', params: {} } },
      });

      const result = await engine.run({ sessionId: 's-nokey', userInput: 'What skills do we need for a React project?' });

      expect(result.status).toBe('completed');
      expect(result.stageHistory.every((r) => r.backend === 'stub' && r.fallback)).toBe(true);
      const fallbacks = await memory.readTrace({ sessionId: 's-nokey', outcome: 'fallback' });
      expect(fallbacks.length).toBeGreaterThanOrEqual(1);
      expect(fallbacks[0]).toMatchObject({
        actor: 'backend-selector',
        detail: 'missing credentials: ANTHROPIC_API_KEY',
      });
    });

    it('keeps two concurrent sessions apart', async () => {
      const engine = engineWith({ stages: stages() });

      const [first, second] = await Promise.all([
        engine.run({ sessionId: 's-one', userInput: 'Who can work on Kubernetes?' }),
        engine.run({ sessionId: 's-two', userInput: 'Do we have enough Python people?', seed: { project_id: 'proj-insights' } }),
      ]);

      expect(first.stageHistory).toHaveLength(3);
      expect(second.stageHistory).toHaveLength(3);
      expect(Object.keys(first.context).sort()).toEqual(
        ['entities', 'gap_analysis', 'intent', 'normalized_question', 'raw_input', 'recommendations'],
      );
      expect(Object.keys(second.context).sort()).toEqual(
        ['entities', 'gap_analysis', 'intent', 'normalized_question', 'project_id', 'raw_input', 'recommendations'],
      );
      expect(first.context['raw_input']).toBe('Who can work on Kubernetes?');
      expect(second.context['raw_input']).toBe('Do we have enough Python people?');
      expect((await engine.getSession('s-one')).stageHistory).toHaveLength(3);
      expect((await engine.getSession('s-two')).stageHistory).toHaveLength(3);
    });
  });

  it('only ever grows the stored stage history', async () => {
    const engine = engineWith();
    const saves = vi.spyOn(memory, 'saveSession');

    await engine.run({ sessionId: 's-1', userInput: 'q' });

    const lengths = saves.mock.calls.map(([state]) => state.stageHistory.length);
    expect(lengths).toEqual([0, 1, 2, 3, 3]);
  });

  it('persists each stage before the next one starts', async () => {
    const seen: number[] = [];
    const engine: WorkflowEngine = engineWith({
      hooks: {
        onStageStart: async (_stage, _index, sessionId) => {
          seen.push((await engine.getSession(sessionId)).stageHistory.length);
        },
      },
    });

    await engine.run({ sessionId: 's-1', userInput: 'q' });

    expect(seen).toEqual([0, 1, 2]);
  });

  it('resumes after the last recorded stage without re-running it', async () => {
    const stages = pipeline();
    const stored: SessionState = {
      id: 's-resume',
      createdAt: '2026-03-01T09:00:00.000Z',
      updatedAt: '2026-03-01T09:00:05.000Z',
      status: 'running',
      context: { raw_input: 'q', normalized_question: 'perception:normalized_question' },
      stageHistory: [
        {
          stageName: 'perception',
          inputSnapshot: { raw_input: 'q' },
          outputSnapshot: { normalized_question: 'perception:normalized_question' },
          reasoningPatternTag: 'cot',
          backend: 'stub',
          fallback: false,
          timestamp: '2026-03-01T09:00:05.000Z',
        },
      ],
    };
    await memory.saveSession(stored);
    const engine = engineWith({ stages });

    const result = await engine.run({ sessionId: 's-resume', userInput: 'ignored' });

    expect(result.status).toBe('completed');
    expect(stages.map((s) => s.calls)).toEqual([0, 1, 1]);
    expect(result.stageHistory.map((r) => r.stageName)).toEqual(['perception', 'analysis', 'decision']);
    expect(result.context['raw_input']).toBe('q');
  });

  it('fails a stage whose inputs are missing and leaves the history alone', async () => {
    const stages = pipeline();
    const engine = engineWith({ stages });

    const result = await engine.run({
      sessionId: 's-missing',
      userInput: 'q',
      config: { stages: ['analysis', 'decision'] },
    });

    expect(result.status).toBe('failed');
    expect(result.stageHistory).toEqual([]);
    expect(result.error).toEqual({
      name: 'MissingInputError',
      message: 'Stage "analysis" is missing required context keys: normalized_question',
      stage: 'analysis',
      missingKeys: ['normalized_question'],
    });
    expect(stages.map((s) => s.calls)).toEqual([0, 0, 0]);
    expect((await engine.getSession('s-missing')).status).toBe('failed');
  });

  it('returns a finished session as stored', async () => {
    const stages = pipeline();
    const engine = engineWith({ stages });
    const first = await engine.run({ sessionId: 's-done', userInput: 'q' });

    const second = await engine.run({ sessionId: 's-done', userInput: 'q' });

    expect(second).toEqual(first);
    expect(stages.map((s) => s.calls)).toEqual([1, 1, 1]);
  });

  it('rejects a second run of a session that is still executing', async () => {
    let release: () => void = () => {};
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });
    const stages = pipeline();
    stages[0] = scriptedStage('perception', {
      inputs: ['raw_input'],
      outputs: ['normalized_question'],
      run: async () => {
        await blocked;
        return { ok: true, output: { normalized_question: 'q' }, reasoningPatternTag: 'cot' };
      },
    });
    const engine = engineWith({ stages });

    const running = engine.run({ sessionId: 's-busy', userInput: 'q' });
    await expect(engine.run({ sessionId: 's-busy', userInput: 'q' })).rejects.toBeInstanceOf(SessionBusyError);

    release();
    expect((await running).status).toBe('completed');
    expect((await engine.run({ sessionId: 's-busy', userInput: 'q' })).status).toBe('completed');
  });

  it('generates a session id when none is given', async () => {
    const engine = engineWith({ newSessionId: () => 'generated-1' });

    const result = await engine.run({ userInput: 'q' });

    expect(result.sessionId).toBe('generated-1');
    expect(await engine.listSessions()).toHaveLength(1);
  });

  it('fails an invalid session id without storing anything', async () => {
    const engine = engineWith();

    const result = await engine.run({ sessionId: '../escape', userInput: 'q' });

    expect(result).toMatchObject({ status: 'failed', durable: false, error: { name: 'ValidationError' } });
    expect(await engine.listSessions()).toEqual([]);
  });

  describe('backend fallback', () => {
    it('re-runs a stage once on the stub after a live failure', async () => {
      const live = new DownBackend();
      const selector = new FakeSelector(live);
      const engine = engineWith({ selector, config: { backend: { name: 'live', params: {} } } });

      const result = await engine.run({ sessionId: 's-fb', userInput: 'q' });

      expect(result.status).toBe('completed');
      expect(live.calls).toBe(3);
      expect(selector.fallbacks).toEqual([
        'Backend "live" unavailable: HTTP 503',
        'Backend "live" unavailable: HTTP 503',
        'Backend "live" unavailable: HTTP 503',
      ]);
      expect(result.stageHistory.map((r) => [r.backend, r.fallback])).toEqual([
        ['stub', true],
        ['stub', true],
        ['stub', true],
      ]);
      const traces = await memory.readTrace({ sessionId: 's-fb', outcome: 'fallback' });
      expect(traces.map((t) => t.actor)).toEqual([
        'backend-selector',
        'stage:perception',
        'backend-selector',
        'stage:analysis',
        'backend-selector',
        'stage:decision',
      ]);
    });

    it('fails the stage when the stub retry fails as well', async () => {
      const selector = new FakeSelector(new DownBackend());
      const stages = pipeline();
      stages[0] = scriptedStage('perception', {
        inputs: ['raw_input'],
        outputs: ['normalized_question'],
        run: async (_context, backend) => ({ ok: false, error: new BackendTimeoutError(backend.name, 10) }),
      });
      const engine = engineWith({ selector, stages, config: { backend: { name: 'live', params: {} } } });

      const result = await engine.run({ sessionId: 's-retry', userInput: 'q' });

      expect(result.status).toBe('failed');
      expect(selector.fallbacks).toHaveLength(1);
      expect(stages[0]?.calls).toBe(2);
      expect(result.error).toEqual({
        name: 'StageExecutionError',
        message: 'Stage "perception" failed: retry on the stub failed: Backend "stub" did not answer within 10ms',
        stage: 'perception',
        cause: 'Backend "stub" did not answer within 10ms',
      });
    });

    it('does not retry a failure that already happened on the stub', async () => {
      const selector = new FakeSelector(new DownBackend());
      const stages = pipeline();
      stages[0] = scriptedStage('perception', {
        inputs: ['raw_input'],
        outputs: ['normalized_question'],
        run: async () => ({ ok: false, error: new BackendUnavailableError('stub', 'down') }),
      });
      const engine = engineWith({ selector, stages });

      const result = await engine.run({ sessionId: 's-stub', userInput: 'q' });

      expect(selector.fallbacks).toEqual([]);
      expect(result.error).toMatchObject({
        name: 'StageExecutionError',
        message: 'Stage "perception" failed: Backend "stub" unavailable: down',
      });
    });

    it('uses a per-stage backend override', async () => {
      const live = new DownBackend();
      const engine = engineWith({
        selector: new FakeSelector(live),
        config: { ...STUB_CONFIG, stageBackends: { analysis: { name: 'live', params: {} } } },
      });

      const result = await engine.run({ sessionId: 's-override', userInput: 'q' });

      expect(live.calls).toBe(1);
      expect(result.stageHistory.map((r) => r.fallback)).toEqual([false, true, false]);
    });
  });

  describe('output checks', () => {
    function engineReturning(output: SessionContext, confidence?: number): WorkflowEngine {
      const stages = pipeline();
      stages[0] = scriptedStage('perception', {
        inputs: ['raw_input'],
        outputs: ['normalized_question'],
        run: async () => ({
          ok: true,
          output,
          reasoningPatternTag: 'cot',
          ...(confidence !== undefined ? { confidence } : {}),
        }),
      });
      return engineWith({ stages });
    }

    it('rejects undeclared output keys', async () => {
      const result = await engineReturning({ normalized_question: 'q', extra: 1 }).run({ sessionId: 's-keys', userInput: 'q' });

      expect(result.status).toBe('failed');
      expect(result.error).toEqual({
        name: 'ValidationError',
        message: 'Stage "perception" returned keys [extra, normalized_question], expected [normalized_question]',
        stage: 'perception',
      });
    });

    it('rejects output that breaks the stage schema', async () => {
      const result = await engineReturning({ normalized_question: 42 }).run({ sessionId: 's-schema', userInput: 'q' });

      expect(result.error?.message).toBe('Stage "perception" returned output that does not match its schema');
      expect(result.stageHistory).toEqual([]);
    });

    it('rejects a confidence outside [0, 1] before recording the stage', async () => {
      const result = await engineReturning({ normalized_question: 'q' }, 1.5).run({ sessionId: 's-conf', userInput: 'q' });

      expect(result.status).toBe('failed');
      expect(result.durable).toBe(true);
      expect(result.error).toEqual({
        name: 'ValidationError',
        message: 'Stage "perception" reported confidence 1.5, expected a number in [0, 1]',
        stage: 'perception',
      });
      expect(result.stageHistory).toEqual([]);
      expect(result.context['normalized_question']).toBeUndefined();
      expect((await memory.loadSession('s-conf'))?.stageHistory).toEqual([]);
    });

    it('accepts a confidence at the bounds', async () => {
      const result = await engineReturning({ normalized_question: 'q' }, 0).run({ sessionId: 's-conf-0', userInput: 'q' });

      expect(result.status).toBe('completed');
      expect(result.stageHistory[0]?.confidence).toBe(0);
    });

    it('stores long-term writes only once the stage is recorded', async () => {
      const stages = pipeline();
      stages[0] = scriptedStage('perception', {
        inputs: ['raw_input'],
        outputs: ['normalized_question'],
        run: async () => ({
          ok: true,
          output: { normalized_question: 'q' },
          reasoningPatternTag: 'cot',
          memoryWrites: [{ category: 'skill-gaps', key: 'React', value: { severity: 'medium' } }],
        }),
      });
      const saves = vi.spyOn(memory, 'saveSession');
      const puts = vi.spyOn(memory, 'putLongTerm');

      const result = await engineWith({ stages }).run({ sessionId: 's-writes', userInput: 'q' });

      expect(result.status).toBe('completed');
      expect((await memory.getLongTerm('skill-gaps', 'React'))?.value).toEqual({ severity: 'medium' });
      const recorded = saves.mock.calls.findIndex(([state]) => state.stageHistory.length === 1);
      expect(puts.mock.invocationCallOrder[0]).toBeGreaterThan(saves.mock.invocationCallOrder[recorded] ?? Infinity);
    });

    it('drops long-term writes from output that fails its checks', async () => {
      const stages = pipeline();
      stages[0] = scriptedStage('perception', {
        inputs: ['raw_input'],
        outputs: ['normalized_question'],
        run: async () => ({
          ok: true,
          output: { normalized_question: 'q', extra: 1 },
          reasoningPatternTag: 'cot',
          memoryWrites: [{ category: 'skill-gaps', key: 'React', value: { severity: 'medium' } }],
        }),
      });

      const result = await engineWith({ stages }).run({ sessionId: 's-dropped', userInput: 'q' });

      expect(result.status).toBe('failed');
      expect(await memory.getLongTerm('skill-gaps', 'React')).toBeUndefined();
    });

    it('wraps an unexpected throw from a stage', async () => {
      const stages = pipeline();
      stages[1] = scriptedStage('analysis', {
        inputs: ['normalized_question'],
        outputs: ['gap_analysis'],
        run: async () => {
          throw new TypeError('boom');
        },
      });
      const engine = engineWith({ stages });

      const result = await engine.run({ sessionId: 's-throw', userInput: 'q' });

      expect(result.error).toEqual({
        name: 'StageExecutionError',
        message: 'Stage "analysis" failed: boom',
        stage: 'analysis',
        cause: 'boom',
      });
      expect(result.stageHistory.map((r) => r.stageName)).toEqual(['perception']);
    });
  });

  describe('configuration checks', () => {
    it('fails on an unregistered stage name', async () => {
      const result = await engineWith().run({
        sessionId: 's-unknown',
        userInput: 'q',
        config: { stages: ['perception', 'summarise'] },
      });

      expect(result.error).toEqual({
        name: 'StageNotFoundError',
        message: 'Stage not found: "summarise". Registered stages are: perception, analysis, decision',
        stage: 'summarise',
      });
    });

    it('fails when two stages write the same key', async () => {
      const stages = [
        ...pipeline(),
        scriptedStage('rephrase', { inputs: ['raw_input'], outputs: ['normalized_question'] }),
      ];
      const result = await engineWith({ stages }).run({
        sessionId: 's-dup',
        userInput: 'q',
        config: { stages: ['perception', 'rephrase'] },
      });

      expect(result.error).toMatchObject({
        name: 'ContextCollisionError',
        message: 'Stage "rephrase" would overwrite context keys: normalized_question',
        stage: 'rephrase',
      });
    });

    it('fails when a stage would overwrite raw_input', async () => {
      const stages = [scriptedStage('echo', { inputs: [], outputs: ['raw_input'] })];
      const result = await engineWith({ stages }).run({
        sessionId: 's-echo',
        userInput: 'q',
        config: { stages: ['echo'] },
      });

      expect(result.error).toMatchObject({ name: 'ContextCollisionError', stage: 'echo' });
    });

    it('fails when seeded context already holds a stage output', async () => {
      const result = await engineWith().run({
        sessionId: 's-seed',
        userInput: 'q',
        seed: { normalized_question: 'preset' },
      });

      expect(result.error).toMatchObject({
        name: 'ContextCollisionError',
        message: 'Stage "perception" would overwrite context keys: normalized_question',
      });
      expect(result.context['normalized_question']).toBe('preset');
    });
  });

  describe('slow storage', () => {
    it('does not hold back another session while one waits on its writes', async () => {
      const slow = engineWith({ memory: new MemoryStore({ root: '/slow', persistence: new SlowWrites(50) }) });
      const fast = engineWith({ memory: MemoryStore.inMemory('/fast') });
      const finished: string[] = [];

      await Promise.all([
        slow.run({ sessionId: 's-slow', userInput: 'q' }).then((r) => finished.push(`slow:${r.status}`)),
        fast.run({ sessionId: 's-fast', userInput: 'q' }).then((r) => finished.push(`fast:${r.status}`)),
      ]);

      expect(finished).toEqual(['fast:completed', 'slow:completed']);
    });
  });

  describe('persistence failures', () => {
    it('halts with durable false when a stage record cannot be written', async () => {
      memory = new MemoryStore({ root: '/mem', persistence: new FailingWrites(1) });
      const engine = engineWith();

      const result = await engine.run({ sessionId: 's-disk', userInput: 'q' });

      expect(result.status).toBe('failed');
      expect(result.durable).toBe(false);
      expect(result.stageHistory.map((r) => r.stageName)).toEqual(['perception']);
      expect(result.error).toEqual({
        name: 'SessionPersistenceError',
        message: 'Could not persist session "s-disk" after retry: disk full',
        stage: 'perception',
        cause: 'disk full',
      });
      const stored = await memory.loadSession('s-disk');
      expect(stored?.status).toBe('running');
      expect(stored?.stageHistory).toEqual([]);
    });

    it('keeps running when trace appends fail', async () => {
      vi.spyOn(memory, 'appendTrace').mockRejectedValue(new StorageError('log full'));
      const engine = engineWith();

      const result = await engine.run({ sessionId: 's-trace', userInput: 'q' });

      expect(result.status).toBe('completed');
      expect(result.durable).toBe(true);
    });
  });

  describe('hooks', () => {
    it('reports stage lifecycle events', async () => {
      const events: string[] = [];
      const engine = engineWith({
        hooks: {
          onStageStart: (stage) => {
            events.push(`start:${stage}`);
          },
          onStageComplete: (stage, _index, record) => {
            events.push(`done:${stage}:${record.backend}`);
          },
        },
      });

      await engine.run({ sessionId: 's-hooks', userInput: 'q' });

      expect(events).toEqual([
        'start:perception',
        'done:perception:stub',
        'start:analysis',
        'done:analysis:stub',
        'start:decision',
        'done:decision:stub',
      ]);
    });

    it('swallows hook errors', async () => {
      const onStageFail = vi.fn();
      const engine = engineWith({
        hooks: {
          onStageStart: () => {
            throw new Error('hook broke');
          },
          onStageFail,
        },
      });

      const result = await engine.run({ sessionId: 's-hookerr', userInput: 'q' });

      expect(result.status).toBe('completed');
      expect(onStageFail).not.toHaveBeenCalled();
    });

    it('calls onStageFail with the failing stage', async () => {
      const onStageFail = vi.fn();
      const engine = engineWith({ hooks: { onStageFail } });

      await engine.run({ sessionId: 's-failhook', userInput: 'q', config: { stages: ['analysis'] } });

      expect(onStageFail).toHaveBeenCalledWith('analysis', 0, expect.objectContaining({ name: 'MissingInputError' }));
    });
  });

  describe('memory access', () => {
    it('returns the latest long-term value', async () => {
      const engine = engineWith();

      await engine.putLongTerm('skills', 'react', { owner: 'A' });
      await engine.putLongTerm('skills', 'react', { owner: 'B' });

      expect((await engine.getLongTerm('skills', 'react'))?.value).toEqual({ owner: 'B' });
      expect(await engine.getLongTerm('skills', 'vue')).toBeUndefined();
    });

    it('throws SessionNotFoundError for an unknown session', async () => {
      await expect(engineWith().getSession('nope')).rejects.toBeInstanceOf(SessionNotFoundError);
    });
  });
});
