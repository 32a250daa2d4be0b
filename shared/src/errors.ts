/**
 * Error taxonomy shared by the API, the orchestrator and the dispatcher.
 *
 * `status` is the HTTP status the API layer maps the error to; code paths
 * outside the API only use the class for control flow.
 */
export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Request shape or input limits rejected before any job is created. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class SignatureError extends AppError {
  constructor(message = 'Invalid signature') {
    super(message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super(`${entity} "${id}" not found`, 404);
  }
}

/** The entity exists but is in a state that forbids the operation. */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * Thrown by the store when a job changed between read and write. The losing
 * writer drops its change; the scheduler picks the job up again next tick.
 */
export class ConcurrentUpdateError extends AppError {
  constructor(jobId: string, expectedVersion: number) {
    super(`Job "${jobId}" was modified concurrently (expected version ${expectedVersion})`, 409);
  }
}

/**
 * Failure talking to the inference provider. `transient` errors (timeouts,
 * connection resets, 429, 5xx) leave job state untouched.
 */
export class RemoteInferenceError extends AppError {
  readonly transient: boolean;

  constructor(message: string, transient: boolean, options?: { cause?: unknown }) {
    super(message, 502);
    this.transient = transient;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export function isTransientRemoteError(err: unknown): err is RemoteInferenceError {
  return err instanceof RemoteInferenceError && err.transient;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
