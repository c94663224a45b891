import { logger } from '../shared/logger.js';
import type { WeblabSettings } from '../config/config-manager.js';
import { MemoryBackend } from './memory-store.js';
import { RedisBackend } from './redis-store.js';
import type { WeblabBackend } from './store.js';

export type * from './store.js';
export { deriveTaskStatus, isSessionOver } from './store.js';
export { MemoryBackend } from './memory-store.js';
export type { BackendOptions } from './memory-store.js';
export { RedisBackend } from './redis-store.js';
export type { RedisBackendOptions } from './redis-store.js';

/**
 * Redis when a URL is configured, the in-process backend otherwise.
 * A Redis backend is returned unconnected; call `connect()` at startup.
 */
export function createBackend(settings: WeblabSettings): WeblabBackend {
  const opts = {
    taskExpiresSeconds: settings.taskExpiresSeconds,
    expiredUsersTimeoutSeconds: settings.expiredUsersTimeoutSeconds,
  };

  if (settings.redisUrl) {
    logger.info({ base: settings.redisBase }, 'Using Redis backend');
    return RedisBackend.fromUrl(settings.redisUrl, {
      ...opts,
      keyBase: settings.redisBase,
      tls: settings.redisUrl.startsWith('rediss://'),
    });
  }

  logger.info('Using in-memory backend');
  return new MemoryBackend(opts);
}

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE']);

/** True for failures that mean the backend is unreachable rather than a bug. */
export function isConnectionError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === 'MaxRetriesPerRequestError') return true;
  if (err.message === 'Connection is closed.') return true;

  const code = 'code' in err ? err.code : undefined;
  return typeof code === 'string' && CONNECTION_ERROR_CODES.has(code);
}
