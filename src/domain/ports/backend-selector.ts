import type { BackendRequest } from '@domain/types/backend.js';
import type { BackendSelection } from './backend.js';

export interface IBackendSelector {
  /** Resolve a request to a live backend, or to the stub when it cannot be used. */
  select(request: BackendRequest): BackendSelection;
  /** The stub, for the engine's single retry after a live call failed. */
  fallback(request: BackendRequest, reason: string): BackendSelection;
}
