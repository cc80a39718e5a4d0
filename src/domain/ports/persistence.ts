import type { z } from 'zod/v4';

/**
 * Port interface for typed JSON persistence.
 *
 * File-path oriented to match JsonStore and JsonlStore. Failures throw
 * StorageError (or a subclass) so callers can tell them apart from
 * programming errors. Writes and appends are async so a slow disk holds up
 * only the session waiting on it.
 *
 * For unit tests that don't need real I/O, use MemoryPersistence from
 * `@infra/persistence/memory-persistence.js`.
 */
export interface IPersistence {
  read<T>(filePath: string, schema: z.ZodType<T>): T;
  write<T>(filePath: string, data: T, schema: z.ZodType<T>): Promise<void>;
  exists(filePath: string): boolean;
  list<T>(dirPath: string, schema: z.ZodType<T>): T[];
  ensureDir(dirPath: string): void;
  /** Append one line to a JSONL log */
  append<T>(filePath: string, entry: T, schema: z.ZodType<T>): Promise<void>;
  /** Every valid line of a JSONL log, oldest first */
  readLines<T>(filePath: string, schema: z.ZodType<T>): T[];
}
