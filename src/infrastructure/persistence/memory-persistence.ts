import type { z } from 'zod/v4';
import type { IPersistence } from '@domain/ports/persistence.js';
import { StorageError } from '@shared/lib/errors.js';

/**
 * In-memory implementation of IPersistence, for tests and for embedding the
 * engine without touching disk.
 *
 * Stores data in a Map keyed by file path. `list(dirPath)` returns the direct
 * children of `dirPath`. `ensureDir()` is a no-op. Values are cloned on the
 * way in and out, so callers never share references with the store.
 *
 * Example:
 * ```ts
 * const store = new MemoryPersistence();
 * await store.write('/mem/sessions/abc.json', session, SessionStateSchema);
 * const sessions = store.list('/mem/sessions', SessionStateSchema);
 * ```
 */
export class MemoryPersistence implements IPersistence {
  private readonly store = new Map<string, unknown>();
  private readonly logs = new Map<string, unknown[]>();

  read<T>(filePath: string, schema: z.ZodType<T>): T {
    if (!this.store.has(filePath)) {
      throw new StorageError(`MemoryPersistence: file not found: ${filePath}`, filePath);
    }
    return schema.parse(structuredClone(this.store.get(filePath)));
  }

  async write<T>(filePath: string, data: T, schema: z.ZodType<T>): Promise<void> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new StorageError(
        `MemoryPersistence: validation failed for ${filePath}: ${JSON.stringify(result.error.issues)}`,
        filePath,
      );
    }
    this.store.set(filePath, structuredClone(result.data));
  }

  exists(filePath: string): boolean {
    return this.store.has(filePath) || this.logs.has(filePath);
  }

  list<T>(dirPath: string, schema: z.ZodType<T>): T[] {
    const prefix = dirPath.endsWith('/') ? dirPath : `${dirPath}/`;
    const results: T[] = [];
    for (const [key, value] of this.store) {
      if (!key.startsWith(prefix)) continue;
      // Only list direct children (no deeper nesting)
      const remainder = key.slice(prefix.length);
      if (remainder.includes('/')) continue;
      const parsed = schema.safeParse(structuredClone(value));
      if (parsed.success) {
        results.push(parsed.data);
      }
    }
    return results;
  }

  /** No-op — in-memory storage has no directory concept. */
  ensureDir(_dirPath: string): void {}

  async append<T>(filePath: string, entry: T, schema: z.ZodType<T>): Promise<void> {
    const result = schema.safeParse(entry);
    if (!result.success) {
      throw new StorageError(
        `MemoryPersistence: validation failed for ${filePath}: ${JSON.stringify(result.error.issues)}`,
        filePath,
      );
    }
    const lines = this.logs.get(filePath) ?? [];
    lines.push(structuredClone(result.data));
    this.logs.set(filePath, lines);
  }

  readLines<T>(filePath: string, schema: z.ZodType<T>): T[] {
    const results: T[] = [];
    for (const line of this.logs.get(filePath) ?? []) {
      const parsed = schema.safeParse(structuredClone(line));
      if (parsed.success) results.push(parsed.data);
    }
    return results;
  }
}
