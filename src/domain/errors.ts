/**
 * Application error types
 * Each error type maps to a specific HTTP status code and a stable `code`
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Submission rejected before a job record exists.
 * 400 for malformed input, 500 when the durable write failed.
 */
export class AdmissionError extends AppError {
  constructor(message: string, statusCode = 500, details?: Record<string, unknown>) {
    super(message, 'ADMISSION_ERROR', statusCode, details);
  }
}

/**
 * Job record was written but the hand-off to the orchestrator failed (503)
 */
export class DispatchError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DISPATCH_ERROR', 503, details);
  }
}

/**
 * One generation task failed. Converted into job state by the orchestrator,
 * never surfaced over HTTP.
 */
export class TaskFailureError extends AppError {
  constructor(
    public readonly artifactType: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'TASK_FAILURE', 500, { artifactType, ...details });
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

/**
 * Blob store failures other than a write-once conflict (502 Bad Gateway)
 */
export class StorageError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', 502, details);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Unknown job id (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 404, details);
  }
}

export class JobNotFoundError extends NotFoundError {
  constructor(jobId: string) {
    super('Job not found', { job_id: jobId });
  }
}

/**
 * A record with the same id already exists (409 Conflict)
 */
export class AlreadyExistsError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} already exists`, 'ALREADY_EXISTS', 409, { resource, id });
  }
}

/**
 * Conditional update rejected because the record is no longer in an expected status
 */
export class StaleWriteError extends AppError {
  constructor(
    jobId: string,
    public readonly expected: readonly string[],
    public readonly actual: string
  ) {
    super(
      `Job ${jobId} is ${actual}, expected one of: ${expected.join(', ')}`,
      'STALE_WRITE',
      409,
      { job_id: jobId, expected: [...expected], actual }
    );
  }
}

/**
 * Blob keys are write-once
 */
export class BlobExistsError extends AppError {
  constructor(key: string) {
    super(`Blob ${key} already exists`, 'BLOB_EXISTS', 409, { key });
  }
}

/**
 * Access handle signature invalid or expired (403 Forbidden)
 */
export class AccessDeniedError extends AppError {
  constructor(message: string) {
    super(message, 'ACCESS_DENIED', 403);
  }
}

export class MethodNotAllowedError extends AppError {
  constructor(method: string, allowed: readonly string[]) {
    super(`Method ${method} not allowed`, 'METHOD_NOT_ALLOWED', 405, {
      allowed_methods: [...allowed],
    });
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  if (typeof error === 'string' && error.trim().length > 0) {
    return error;
  }
  return 'Unexpected error';
}
