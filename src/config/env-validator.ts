import { logger } from '../shared/logger.js';
import { InvalidConfigError } from '../shared/errors.js';
import { getConfig } from './config-manager.js';

/** Env vars the server always needs to start. */
const SERVER_REQUIRED_VARS = ['WEBLAB_USERNAME', 'WEBLAB_PASSWORD'];

/**
 * Validate environment variables.
 *
 * The scheduler credentials are fatal if missing. Running without Redis is
 * allowed but only safe for a single process, so it is warned about.
 */
export function validateEnv(): void {
  const missing = SERVER_REQUIRED_VARS.filter((name) => !process.env[name]);

  if (missing.length > 0) {
    logger.error({ missing }, `Missing required environment variables: ${missing.join(', ')}`);
    throw new InvalidConfigError(`Invalid configuration. Missing ${missing.join(', ')}`);
  }

  // Parses every numeric setting; throws InvalidConfigError on bad values
  const config = getConfig();

  if (!config.weblab.redisUrl) {
    logger.warn(
      'WEBLAB_REDIS_URL not set: sessions and tasks live in this process only. ' +
        'Do not run more than one server or runner process against it.',
    );
  }

  if (config.weblab.callbackUrl.endsWith('/')) {
    logger.warn({ callbackUrl: config.weblab.callbackUrl }, 'Callback URL ends with "/"; this is discouraged');
  }

  logger.info('Environment validation passed');
}
