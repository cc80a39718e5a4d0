import type { StructuredError } from '@domain/types/session.js';
import {
  ContextCollisionError,
  MissingInputError,
  StageExecutionError,
  StageNotFoundError,
  ValidationError,
} from '@shared/lib/errors.js';

function stageOf(error: unknown): string | undefined {
  if (
    error instanceof MissingInputError ||
    error instanceof StageExecutionError ||
    error instanceof StageNotFoundError ||
    error instanceof ContextCollisionError
  ) {
    return error.stage;
  }
  if (error instanceof ValidationError) return error.stage;
  return undefined;
}

/**
 * Flatten an error into the JSON shape stored on a failed session.
 * `stage` falls back to the stage the engine was running when the error
 * does not name one itself.
 */
export function toStructuredError(error: unknown, stage?: string): StructuredError {
  if (!(error instanceof Error)) {
    return { name: 'Error', message: String(error), ...(stage ? { stage } : {}) };
  }

  const structured: StructuredError = { name: error.name, message: error.message };
  const named = stageOf(error) ?? stage;
  if (named) structured.stage = named;
  if (error instanceof MissingInputError) structured.missingKeys = [...error.missingKeys];
  if (error.cause instanceof Error) structured.cause = error.cause.message;
  else if (error.cause !== undefined) structured.cause = String(error.cause);
  return structured;
}
