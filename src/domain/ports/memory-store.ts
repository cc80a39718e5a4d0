import type { SessionState } from '@domain/types/session.js';
import type { LongTermEntry } from '@domain/types/long-term.js';
import type { TraceEntry, TraceFilter } from '@domain/types/trace.js';

/**
 * Port interface for the three memory tiers.
 *
 * - session: one record per session id, rewritten after every stage
 * - long-term: (category, key) → value, last write wins
 * - trace: append-only audit log
 *
 * Durable writes are retried once; a second failure rejects with
 * SessionPersistenceError.
 */
export interface IMemoryStore {
  loadSession(id: string): Promise<SessionState | undefined>;
  saveSession(state: SessionState): Promise<void>;
  listSessions(): Promise<SessionState[]>;

  putLongTerm(category: string, key: string, value: unknown): Promise<LongTermEntry>;
  getLongTerm(category: string, key: string): Promise<LongTermEntry | undefined>;
  listLongTerm(category: string): Promise<LongTermEntry[]>;

  appendTrace(entry: TraceEntry): Promise<void>;
  /** Audit only; the workflow never reads traces back. */
  readTrace(filter?: TraceFilter): Promise<TraceEntry[]>;

  close(): Promise<void>;
}

/** The slice of memory a stage may touch. Stages never write session records. */
export type LongTermMemory = Pick<IMemoryStore, 'getLongTerm' | 'putLongTerm' | 'listLongTerm'>;
