import { dirname, isAbsolute, resolve } from 'node:path';
import type { GapflowConfig } from '@domain/types/config.js';
import { BackendSelector, type Env } from '@infra/backends/backend-selector.js';
import type { FetchFn } from '@infra/backends/http-backend.js';
import { loadConfig } from '@infra/config/config-loader.js';
import { CatalogDataProvider } from '@infra/data/catalog-data-provider.js';
import { loadSkillVocabulary } from '@infra/data/data-files.js';
import { MemoryStore } from '@infra/memory/memory-store.js';
import { createBuiltinStages } from '@features/stages/builtin-stages.js';
import type { Logger } from '@shared/lib/logger.js';
import { WorkflowEngine, type WorkflowHooks } from './workflow-engine.js';

export interface OpenWorkflowOptions {
  /** The project's `.gapflow/` directory */
  gapflowDir: string;
  /** Defaults to loading `<gapflowDir>/config.json` with environment overrides */
  config?: GapflowConfig;
  env?: Env;
  fetchFn?: FetchFn;
  hooks?: WorkflowHooks;
  logger?: Logger;
}

export interface Workflow {
  engine: WorkflowEngine;
  memory: MemoryStore;
  config: GapflowConfig;
  close(): Promise<void>;
}

/**
 * Assemble a ready-to-run engine for a project directory: config, data
 * catalog, skill vocabulary, file-backed memory, backend selector and the
 * built-in stages. Call `close()` when done.
 */
export function openWorkflow(options: OpenWorkflowOptions): Workflow {
  const env = options.env ?? process.env;
  const config = options.config ?? loadConfig(options.gapflowDir, env);

  const catalogPath = config.dataCatalogPath
    ? resolveFromProject(options.gapflowDir, config.dataCatalogPath)
    : undefined;
  const dataProvider = CatalogDataProvider.fromFile(catalogPath);
  const vocabulary = loadSkillVocabulary();

  const memory = MemoryStore.open({ root: options.gapflowDir });
  const selector = new BackendSelector({ env, timeoutMs: config.timeoutMs, fetchFn: options.fetchFn });

  const engine = new WorkflowEngine({
    memory,
    selector,
    stages: createBuiltinStages({
      vocabulary,
      dataProvider,
      requiredHeadcount: config.analysis.requiredHeadcount,
    }),
    config: { stages: config.stages, backend: config.backend, stageBackends: config.stageBackends },
    hooks: options.hooks,
    logger: options.logger,
  });

  return { engine, memory, config, close: () => memory.close() };
}

/** Relative catalog paths are resolved against the project root (the parent of `.gapflow/`). */
function resolveFromProject(gapflowDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(dirname(gapflowDir), path);
}
