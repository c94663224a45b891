export { Weblab } from './weblab.js';
export type { WeblabOptions } from './weblab.js';

export { createApp } from './app.js';
export type { AppDeps } from './app.js';
export { startServer } from './server.js';
export type { RunningServer } from './server.js';

export { getConfig, resetConfig, defaultSettings } from './config/config-manager.js';
export type { AppConfig, WeblabSettings } from './config/config-manager.js';
export { validateEnv } from './config/env-validator.js';

export {
  AppError,
  NotFoundError,
  ValidationError,
  InvalidConfigError,
  AlreadyRunningError,
  TaskTimeoutError,
  DeadlockError,
  NoContextError,
} from './shared/errors.js';
export { logger } from './shared/logger.js';
export { createToken } from './shared/token.js';

export * from './backend/index.js';

export { AnonymousUser, CurrentUser, ExpiredUser } from './users/users.js';
export type { UserLoader, WeblabUser } from './users/users.js';

export type { StartHook, DisposeHook, InitialUrlHook } from './session/hooks.js';
export { STATUS_DISPOSING, STATUS_FINISHED } from './session/session-manager.js';

export { WeblabTask } from './tasks/task.js';
export type { JoinOptions } from './tasks/task.js';
export type { TaskFunction, TaskOptions, TaskReference, TaskResult, UniqueMode } from './tasks/task-manager.js';

export { requiresActive, requiresLogin } from './weblab/session-context.js';
