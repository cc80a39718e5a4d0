import { existsSync, readFileSync } from 'node:fs';
import { appendFile, mkdir, open } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { z } from 'zod/v4';
import { StorageError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export class JsonlStoreError extends StorageError {
  constructor(message: string, path: string, cause?: unknown) {
    super(message, path, { cause });
    this.name = 'JsonlStoreError';
  }
}

/** True when the file is missing, empty, or its last byte is a newline. */
async function endsWithNewline(path: string): Promise<boolean> {
  if (!existsSync(path)) return true;
  const handle = await open(path, 'r');
  try {
    const { size } = await handle.stat();
    if (size === 0) return true;
    const last = Buffer.alloc(1);
    await handle.read(last, 0, 1, size - 1);
    return last[0] === 0x0a;
  } finally {
    await handle.close();
  }
}

/**
 * Append-only JSONL (newline-delimited JSON) file persistence.
 *
 * Each line in a JSONL file is an independent JSON object.
 * Invalid lines are skipped with a warning on read. A torn final line left
 * by an interrupted write is terminated before the next append, so only the
 * torn entry is lost. Files are created on first append.
 */
export const JsonlStore = {
  /**
   * Append a single entry to a JSONL file.
   * Creates the file and parent directories if they don't exist.
   */
  async append<T>(path: string, entry: T, schema: z.ZodType<T>): Promise<void> {
    const result = schema.safeParse(entry);
    if (!result.success) {
      throw new JsonlStoreError(
        `Validation failed before append: ${JSON.stringify(result.error.issues, null, 2)}`,
        path,
        result.error,
      );
    }

    try {
      await mkdir(dirname(path), { recursive: true });
      const prefix = (await endsWithNewline(path)) ? '' : '\n';
      await appendFile(path, prefix + JSON.stringify(result.data) + '\n', 'utf-8');
    } catch (err) {
      throw new JsonlStoreError(`Failed to append to file: ${path}`, path, err);
    }
  },

  /**
   * Read all valid entries from a JSONL file.
   * Returns an empty array if the file does not exist.
   */
  readAll<T>(path: string, schema: z.ZodType<T>): T[] {
    if (!existsSync(path)) {
      return [];
    }

    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new JsonlStoreError(`Failed to read file: ${path}`, path, err);
    }

    const results: T[] = [];

    for (const [lineIndex, line] of raw.split('\n').entries()) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        logger.warn(`Skipping invalid JSON on line ${lineIndex + 1} in ${path}`);
        continue;
      }

      const result = schema.safeParse(parsed);
      if (!result.success) {
        logger.warn(`Skipping invalid entry on line ${lineIndex + 1} in ${path}`, {
          issues: result.error.issues,
        });
        continue;
      }

      results.push(result.data);
    }

    return results;
  },
};
