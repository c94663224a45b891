export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed') {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** Raised while wiring the lab (settings, hooks, task registration), never at request time. */
export class InvalidConfigError extends AppError {
  constructor(message: string) {
    super(message, 500, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
  }
}

/** A task declared `unique` is already running in its scope. */
export class AlreadyRunningError extends AppError {
  constructor(message: string) {
    super(message, 409, 'ALREADY_RUNNING');
    this.name = 'AlreadyRunningError';
  }
}

export class TaskTimeoutError extends AppError {
  constructor(message: string) {
    super(message, 504, 'TASK_TIMEOUT');
    this.name = 'TaskTimeoutError';
  }
}

export class DeadlockError extends AppError {
  constructor(message = "Deadlock detected: you're calling join from the task itself") {
    super(message, 500, 'DEADLOCK');
    this.name = 'DeadlockError';
  }
}

/** Session identity was requested outside a request or a running task. */
export class NoContextError extends AppError {
  constructor(message = 'No session context available') {
    super(message, 500, 'NO_CONTEXT');
    this.name = 'NoContextError';
  }
}
