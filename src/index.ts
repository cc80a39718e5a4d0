// Library entry point
export * from '@domain/types/index.js';
export type * from '@domain/ports/index.js';
export * from '@shared/lib/index.js';

export {
  WorkflowEngine,
  RAW_INPUT_KEY,
  validateOutput,
  type RunConfig,
  type RunRequest,
  type WorkflowHooks,
  type WorkflowEngineDeps,
} from '@features/workflow/workflow-engine.js';
export { openWorkflow, type OpenWorkflowOptions, type Workflow } from '@features/workflow/open-workflow.js';
export { toStructuredError } from '@features/workflow/structured-error.js';
export { createBuiltinStages, type BuiltinStageDeps } from '@features/stages/builtin-stages.js';
export { createPerceptionStage } from '@features/stages/perception-stage.js';
export { createAnalysisStage } from '@features/stages/analysis-stage.js';
export { createDecisionStage } from '@features/stages/decision-stage.js';

export { MemoryStore, type MemoryStoreOptions } from '@infra/memory/memory-store.js';
export { BackendSelector, type BackendSelectorOptions, type Env } from '@infra/backends/backend-selector.js';
export { StubBackend } from '@infra/backends/stub-backend.js';
export { CatalogDataProvider } from '@infra/data/catalog-data-provider.js';
export { loadConfig, writeConfig, defaultConfig } from '@infra/config/config-loader.js';
