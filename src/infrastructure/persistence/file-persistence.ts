import type { z } from 'zod/v4';
import type { IPersistence } from '@domain/ports/persistence.js';
import { JsonStore } from './json-store.js';
import { JsonlStore } from './jsonl-store.js';

/**
 * IPersistence over the local filesystem: JSON records via JsonStore,
 * logs via JsonlStore.
 */
export const FilePersistence: IPersistence = {
  read<T>(filePath: string, schema: z.ZodType<T>): T {
    return JsonStore.read(filePath, schema);
  },
  write<T>(filePath: string, data: T, schema: z.ZodType<T>): Promise<void> {
    return JsonStore.write(filePath, data, schema);
  },
  exists(filePath: string): boolean {
    return JsonStore.exists(filePath);
  },
  list<T>(dirPath: string, schema: z.ZodType<T>): T[] {
    return JsonStore.list(dirPath, schema);
  },
  ensureDir(dirPath: string): void {
    JsonStore.ensureDir(dirPath);
  },
  append<T>(filePath: string, entry: T, schema: z.ZodType<T>): Promise<void> {
    return JsonlStore.append(filePath, entry, schema);
  },
  readLines<T>(filePath: string, schema: z.ZodType<T>): T[] {
    return JsonlStore.readAll(filePath, schema);
  },
};
