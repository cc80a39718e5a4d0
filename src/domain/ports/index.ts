export type { IPersistence } from './persistence.js';
export type { IBackend, GenerateResult, BackendSelection } from './backend.js';
export type { IBackendSelector } from './backend-selector.js';
export type { IMemoryStore, LongTermMemory } from './memory-store.js';
export type { LongTermWrite, StageContract, StageOutcome } from './stage.js';
export type { IDataProvider } from './data-provider.js';
