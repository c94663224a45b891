import { describe, it, expect } from 'vitest';
import {
  AppError,
  NotFoundError,
  ValidationError,
  InvalidConfigError,
  AlreadyRunningError,
  TaskTimeoutError,
  DeadlockError,
  NoContextError,
} from '../../src/shared/errors.js';

describe('Error classes', () => {
  it('AppError has statusCode and code', () => {
    const err = new AppError('test', 418, 'TEAPOT');
    expect(err.message).toBe('test');
    expect(err.statusCode).toBe(418);
    expect(err.code).toBe('TEAPOT');
    expect(err).toBeInstanceOf(Error);
  });

  it('NotFoundError defaults to 404', () => {
    const err = new NotFoundError();
    expect(err.statusCode).toBe(404);
  });

  it('ValidationError defaults to 400', () => {
    const err = new ValidationError('bad input');
    expect(err.statusCode).toBe(400);
    expect(err.message).toBe('bad input');
  });

  it('InvalidConfigError is a 500 raised at setup time', () => {
    const err = new InvalidConfigError('onStart has already been defined');
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe('INVALID_CONFIG');
  });

  it('AlreadyRunningError is a conflict', () => {
    const err = new AlreadyRunningError('busy');
    expect(err.statusCode).toBe(409);
    expect(err.code).toBe('ALREADY_RUNNING');
    expect(err).toBeInstanceOf(AppError);
  });

  it('TaskTimeoutError keeps its message', () => {
    const err = new TaskTimeoutError('2 seconds passed');
    expect(err.statusCode).toBe(504);
    expect(err.message).toBe('2 seconds passed');
  });

  it('DeadlockError explains the self-join', () => {
    expect(new DeadlockError().message).toBe("Deadlock detected: you're calling join from the task itself");
  });

  it('NoContextError has a name for logs', () => {
    expect(new NoContextError().name).toBe('NoContextError');
  });
});
