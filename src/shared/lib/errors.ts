export class GapflowError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GapflowError';
  }
}

export class ConfigNotFoundError extends GapflowError {
  constructor(path: string) {
    super(
      `No .gapflow/ directory found at ${path}. Run "gapflow init" to initialize your project.`,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ValidationError extends GapflowError {
  constructor(
    message: string,
    public readonly issues: unknown[],
    public readonly stage?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class MissingInputError extends GapflowError {
  constructor(
    public readonly stage: string,
    public readonly missingKeys: string[],
  ) {
    super(`Stage "${stage}" is missing required context keys: ${missingKeys.join(', ')}`);
    this.name = 'MissingInputError';
  }
}

export class BackendUnavailableError extends GapflowError {
  constructor(
    public readonly backend: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Backend "${backend}" unavailable: ${reason}`, options);
    this.name = 'BackendUnavailableError';
  }
}

export class BackendTimeoutError extends GapflowError {
  constructor(
    public readonly backend: string,
    public readonly timeoutMs: number,
  ) {
    super(`Backend "${backend}" did not answer within ${timeoutMs}ms`);
    this.name = 'BackendTimeoutError';
  }
}

/** Failures the engine absorbs by re-running the stage on the stub backend. */
export type RecoverableBackendError = BackendUnavailableError | BackendTimeoutError;

export function isRecoverableBackendError(error: unknown): error is RecoverableBackendError {
  return error instanceof BackendUnavailableError || error instanceof BackendTimeoutError;
}

export class StageExecutionError extends GapflowError {
  constructor(
    public readonly stage: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Stage "${stage}" failed: ${message}`, options);
    this.name = 'StageExecutionError';
  }
}

export class StorageError extends GapflowError {
  constructor(
    message: string,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class SessionPersistenceError extends GapflowError {
  constructor(
    public readonly target: string,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Could not persist ${target} after retry${reason}`, options);
    this.name = 'SessionPersistenceError';
  }
}

export class SessionNotFoundError extends GapflowError {
  constructor(id: string) {
    super(`Session not found: "${id}". Run "gapflow session list" to see stored sessions.`);
    this.name = 'SessionNotFoundError';
  }
}

export class SessionBusyError extends GapflowError {
  constructor(public readonly sessionId: string) {
    super(`Session "${sessionId}" is already running in this process`);
    this.name = 'SessionBusyError';
  }
}

export class StageNotFoundError extends GapflowError {
  constructor(
    public readonly stage: string,
    known: string[],
  ) {
    super(`Stage not found: "${stage}". Registered stages are: ${known.join(', ')}`);
    this.name = 'StageNotFoundError';
  }
}

export class ContextCollisionError extends GapflowError {
  constructor(
    public readonly stage: string,
    public readonly keys: string[],
  ) {
    super(`Stage "${stage}" would overwrite context keys: ${keys.join(', ')}`);
    this.name = 'ContextCollisionError';
  }
}
