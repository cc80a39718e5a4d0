import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { JsonStore } from '@infra/persistence/json-store.js';
import { CatalogSchema, SkillVocabularySchema, type Catalog, type SkillVocabulary } from '@domain/types/skills.js';

const DATA_DIR = 'data';
const SKILLS_FILE = 'skills.json';
const CATALOG_FILE = 'catalog.json';

/**
 * Resolve the package root directory, where data/ lives.
 * Works both in dev (src/infrastructure/data/) and built (dist/ chunks) contexts.
 */
export function resolvePackageRoot(): string {
  // Walk up from this file until a directory holding data/skills.json is found
  let candidate = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 5; depth++) {
    if (existsSync(join(candidate, DATA_DIR, SKILLS_FILE))) {
      return candidate;
    }
    candidate = resolve(candidate, '..');
  }
  // Last resort: src/infrastructure/data → root
  return resolve(dirname(fileURLToPath(import.meta.url)), '..', '..', '..');
}

export function builtinDataPath(file: string): string {
  return join(resolvePackageRoot(), DATA_DIR, file);
}

export function loadSkillVocabulary(path: string = builtinDataPath(SKILLS_FILE)): SkillVocabulary {
  return JsonStore.read(path, SkillVocabularySchema);
}

export function loadCatalog(path: string = builtinDataPath(CATALOG_FILE)): Catalog {
  return JsonStore.read(path, CatalogSchema);
}
