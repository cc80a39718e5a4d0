import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { IMemoryStore } from '@domain/ports/memory-store.js';
import type { IPersistence } from '@domain/ports/persistence.js';
import { SessionStateSchema, type SessionState } from '@domain/types/session.js';
import {
  LongTermCategorySchema,
  LongTermEntrySchema,
  type LongTermEntry,
} from '@domain/types/long-term.js';
import {
  TraceEntrySchema,
  type TraceDraft,
  type TraceEntry,
  type TraceFilter,
} from '@domain/types/trace.js';
import { isValidSessionId } from '@domain/rules/session-rules.js';
import { GAPFLOW_DIRS } from '@shared/constants/paths.js';
import { SessionPersistenceError, StorageError, ValidationError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { FilePersistence } from '@infra/persistence/file-persistence.js';
import { MemoryPersistence } from '@infra/persistence/memory-persistence.js';

/**
 * Path helpers for the memory tree.
 *
 * Directory structure:
 *   <root>/
 *     sessions/<session-id>.json
 *     long-term/<category>/<url-encoded key>.json
 *     traces/trace.jsonl
 */
export function memoryPaths(root: string) {
  return {
    root,
    sessionsDir: join(root, GAPFLOW_DIRS.sessions),
    sessionJson: (id: string) => join(root, GAPFLOW_DIRS.sessions, `${id}.json`),
    longTermRoot: join(root, GAPFLOW_DIRS.longTerm),
    longTermDir: (category: string) => join(root, GAPFLOW_DIRS.longTerm, category),
    longTermJson: (category: string, key: string) =>
      join(root, GAPFLOW_DIRS.longTerm, category, `${encodeURIComponent(key)}.json`),
    tracesDir: join(root, GAPFLOW_DIRS.traces),
    traceJsonl: join(root, GAPFLOW_DIRS.traces, GAPFLOW_DIRS.traceLog),
  };
}

export interface MemoryStoreOptions {
  /** Root of the memory tree, usually `<project>/.gapflow` */
  root: string;
  /** Defaults to the filesystem */
  persistence?: IPersistence;
  now?: () => Date;
}

/**
 * MemoryStore — session, long-term and trace tiers over an IPersistence.
 *
 * Every durable write is attempted twice: a StorageError on the first attempt
 * is logged and retried, a second StorageError is raised as
 * SessionPersistenceError. Reads are single attempts.
 *
 * Sessions are independent records; a session's record has a single writer
 * (the engine running it). Long-term entries are last-write-wins on
 * (category, key).
 */
export class MemoryStore implements IMemoryStore {
  private readonly persistence: IPersistence;
  private readonly paths: ReturnType<typeof memoryPaths>;
  private readonly now: () => Date;
  private closed = false;

  constructor(options: MemoryStoreOptions) {
    this.persistence = options.persistence ?? FilePersistence;
    this.paths = memoryPaths(options.root);
    this.now = options.now ?? (() => new Date());
  }

  /** Open a store and create its directory layout. */
  static open(options: MemoryStoreOptions): MemoryStore {
    const store = new MemoryStore(options);
    store.persistence.ensureDir(store.paths.sessionsDir);
    store.persistence.ensureDir(store.paths.longTermRoot);
    store.persistence.ensureDir(store.paths.tracesDir);
    return store;
  }

  /** A store that keeps everything in process memory. */
  static inMemory(root = '/memory'): MemoryStore {
    return new MemoryStore({ root, persistence: new MemoryPersistence() });
  }

  // ---- session tier -------------------------------------------------------

  async loadSession(id: string): Promise<SessionState | undefined> {
    this.assertOpen();
    if (!isValidSessionId(id)) return undefined;
    const path = this.paths.sessionJson(id);
    if (!this.persistence.exists(path)) return undefined;
    return this.persistence.read(path, SessionStateSchema);
  }

  async saveSession(state: SessionState): Promise<void> {
    if (!isValidSessionId(state.id)) {
      throw new ValidationError(`Invalid session id: "${state.id}"`, []);
    }
    const path = this.paths.sessionJson(state.id);
    await this.durable(`session "${state.id}"`, () =>
      this.persistence.write(path, state, SessionStateSchema),
    );
  }

  async listSessions(): Promise<SessionState[]> {
    this.assertOpen();
    return this.persistence
      .list(this.paths.sessionsDir, SessionStateSchema)
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  // ---- long-term tier -----------------------------------------------------

  async putLongTerm(category: string, key: string, value: unknown): Promise<LongTermEntry> {
    this.assertCategory(category);
    if (!key) {
      throw new ValidationError('Long-term key must not be empty', []);
    }
    const entry: LongTermEntry = {
      category,
      key,
      value: structuredClone(value),
      updatedAt: this.now().toISOString(),
    };
    const path = this.paths.longTermJson(category, key);
    await this.durable(`long-term entry ${category}/${key}`, () =>
      this.persistence.write(path, entry, LongTermEntrySchema),
    );
    return entry;
  }

  async getLongTerm(category: string, key: string): Promise<LongTermEntry | undefined> {
    this.assertOpen();
    this.assertCategory(category);
    const path = this.paths.longTermJson(category, key);
    if (!this.persistence.exists(path)) return undefined;
    return this.persistence.read(path, LongTermEntrySchema);
  }

  async listLongTerm(category: string): Promise<LongTermEntry[]> {
    this.assertOpen();
    this.assertCategory(category);
    return this.persistence
      .list(this.paths.longTermDir(category), LongTermEntrySchema)
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  // ---- trace tier ---------------------------------------------------------

  async appendTrace(entry: TraceEntry): Promise<void> {
    await this.durable('trace entry', () =>
      this.persistence.append(this.paths.traceJsonl, entry, TraceEntrySchema),
    );
  }

  async readTrace(filter: TraceFilter = {}): Promise<TraceEntry[]> {
    this.assertOpen();
    const entries = this.persistence
      .readLines(this.paths.traceJsonl, TraceEntrySchema)
      .filter((e) => filter.sessionId === undefined || e.sessionId === filter.sessionId)
      .filter((e) => filter.outcome === undefined || e.outcome === filter.outcome);
    return filter.limit !== undefined ? entries.slice(-filter.limit) : entries;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageError('Memory store is closed', this.paths.root);
    }
  }

  private assertCategory(category: string): void {
    const result = LongTermCategorySchema.safeParse(category);
    if (!result.success) {
      throw new ValidationError(`Invalid long-term category: "${category}"`, result.error.issues);
    }
  }

  private async durable(target: string, write: () => Promise<void>): Promise<void> {
    this.assertOpen();
    try {
      await write();
      return;
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      logger.warn(`Write of ${target} failed — retrying once`, { error: err.message });
    }
    try {
      await write();
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      throw new SessionPersistenceError(target, { cause: err });
    }
  }
}

/** Stamp a trace draft with an id, time and owning session. */
export function toTraceEntry(draft: TraceDraft, sessionId?: string, at: Date = new Date()): TraceEntry {
  return {
    ...draft,
    id: randomUUID(),
    ...(sessionId !== undefined ? { sessionId } : {}),
    recordedAt: at.toISOString(),
  };
}
