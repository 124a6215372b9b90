/**
 * Error types for the taskline worker.
 *
 * Every error raised by this package extends {@link RuntimeError} and carries
 * a string code from {@link RuntimeErrorCodes}, so callers can branch on the
 * code instead of on class identity.
 */

// ============================================================================
// Runtime Error Codes
// ============================================================================

export const RuntimeErrorCodes = {
  /** Input validation failed */
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  /** Worker constructed with invalid options */
  WORKER_CONFIG_ERROR: 'WORKER_CONFIG_ERROR',
  /** Worker lifecycle method called in the wrong state */
  WORKER_STATE_ERROR: 'WORKER_STATE_ERROR',
  /** Job factory could not build a job from a task payload */
  JOB_CREATION_FAILED: 'JOB_CREATION_FAILED',
  /** Queue refused to reschedule a task */
  TASK_RESCHEDULE_FAILED: 'TASK_RESCHEDULE_FAILED',
  /** Queue operation on a task whose claim is no longer current */
  TASK_STATE_ERROR: 'TASK_STATE_ERROR',
  /** Worker settings module could not be loaded */
  SETTINGS_LOAD_ERROR: 'SETTINGS_LOAD_ERROR',
} as const;

/** Union type of all runtime error code values */
export type RuntimeErrorCode = (typeof RuntimeErrorCodes)[keyof typeof RuntimeErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for all taskline errors.
 */
export class RuntimeError extends Error {
  /** The error code identifying this error type */
  public readonly code: RuntimeErrorCode;

  constructor(message: string, code: RuntimeErrorCode) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

export class ValidationError extends RuntimeError {
  constructor(message: string) {
    super(message, RuntimeErrorCodes.VALIDATION_ERROR);
    this.name = 'ValidationError';
  }
}

/**
 * Thrown by the Worker constructor when an option is out of range.
 */
export class WorkerConfigError extends RuntimeError {
  /** Option paths that failed validation, e.g. `['maxJobs']` */
  public readonly fields: readonly string[];

  constructor(fields: readonly string[], reason: string) {
    super(`Invalid worker config: ${reason}`, RuntimeErrorCodes.WORKER_CONFIG_ERROR);
    this.name = 'WorkerConfigError';
    this.fields = fields;
  }
}

export class WorkerStateError extends RuntimeError {
  constructor(message: string) {
    super(message, RuntimeErrorCodes.WORKER_STATE_ERROR);
    this.name = 'WorkerStateError';
  }
}

/**
 * Thrown by a job factory when a task payload is malformed or names a job
 * type the factory does not know. The worker fails such tasks permanently.
 */
export class JobCreationError extends RuntimeError {
  public readonly taskId: string;

  constructor(taskId: string, reason: string) {
    super(`Cannot create job for task ${taskId}: ${reason}`, RuntimeErrorCodes.JOB_CREATION_FAILED);
    this.name = 'JobCreationError';
    this.taskId = taskId;
  }
}

/**
 * Raised by a queue when its retry policy forbids another attempt.
 */
export class TaskRescheduleError extends RuntimeError {
  public readonly taskId: string;
  public readonly reason: string;

  constructor(taskId: string, reason: string) {
    super(`Task ${taskId} cannot be rescheduled: ${reason}`, RuntimeErrorCodes.TASK_RESCHEDULE_FAILED);
    this.name = 'TaskRescheduleError';
    this.taskId = taskId;
    this.reason = reason;
  }
}

export class TaskStateError extends RuntimeError {
  public readonly taskId: string;

  constructor(taskId: string, message: string) {
    super(message, RuntimeErrorCodes.TASK_STATE_ERROR);
    this.name = 'TaskStateError';
    this.taskId = taskId;
  }
}

export class SettingsLoadError extends RuntimeError {
  public readonly specifier: string;

  constructor(specifier: string, reason: string) {
    super(`Failed to load worker settings from ${specifier}: ${reason}`, RuntimeErrorCodes.SETTINGS_LOAD_ERROR);
    this.name = 'SettingsLoadError';
    this.specifier = specifier;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Type guard for {@link RuntimeError}, optionally narrowing to one code.
 */
export function isRuntimeError(error: unknown, code?: RuntimeErrorCode): error is RuntimeError {
  if (!(error instanceof RuntimeError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
