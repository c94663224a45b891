import { InvalidConfigError } from '../shared/errors.js';

export interface WeblabSettings {
  // Scheduler credentials
  username: string;
  password: string;

  // Routing
  baseUrl: string;
  callbackUrl: string;
  sessionIdName: string;
  cookieSecret: string;
  scheme: 'http' | 'https' | undefined;
  unauthorizedLink: string | undefined;
  unauthorizedPage: string | undefined;

  // Backend
  redisUrl: string | undefined;
  redisBase: string;
  taskExpiresSeconds: number;

  // Sessions
  timeoutSeconds: number;
  pollIntervalSeconds: number;
  autopoll: boolean;
  expiredUsersTimeoutSeconds: number;

  // Background loops
  cleanerIntervalSeconds: number;
  autocleanThread: boolean;
  taskThreads: number;
  joinStepMs: number;
}

export interface AppConfig {
  weblab: WeblabSettings;

  // Server
  port: number;
  corsOrigins: string;
  callbackRateLimit: number;
  logLevel: string;
  nodeEnv: string;
}

let config: AppConfig | null = null;

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidConfigError(`${name} must be an integer (got ${JSON.stringify(raw)})`);
  }
  return value;
}

function readBool(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function readScheme(): 'http' | 'https' | undefined {
  const raw = process.env.WEBLAB_SCHEME;
  if (!raw) return undefined;
  if (raw === 'http' || raw === 'https') return raw;
  throw new InvalidConfigError(`WEBLAB_SCHEME must be http or https (got ${JSON.stringify(raw)})`);
}

/**
 * Background loop settings. WEBLAB_NO_THREAD turns both loops off and refuses
 * an explicit request for either of them.
 */
function readThreadSettings(): { autocleanThread: boolean; taskThreads: number } {
  if (readBool('WEBLAB_NO_THREAD', false)) {
    if (readBool('WEBLAB_AUTOCLEAN_THREAD', false)) {
      throw new InvalidConfigError('WEBLAB_NO_THREAD=true is incompatible with WEBLAB_AUTOCLEAN_THREAD=true');
    }
    if (readInt('WEBLAB_TASK_THREADS_PROCESS', 0) > 0) {
      throw new InvalidConfigError('WEBLAB_NO_THREAD=true is incompatible with WEBLAB_TASK_THREADS_PROCESS > 0');
    }
    return { autocleanThread: false, taskThreads: 0 };
  }

  return {
    autocleanThread: readBool('WEBLAB_AUTOCLEAN_THREAD', true),
    taskThreads: readInt('WEBLAB_TASK_THREADS_PROCESS', 3),
  };
}

export function getConfig(): AppConfig {
  if (config) return config;

  const password = process.env.WEBLAB_PASSWORD ?? '';

  config = {
    weblab: {
      username: process.env.WEBLAB_USERNAME ?? '',
      password,
      baseUrl: process.env.WEBLAB_BASE_URL ?? '',
      callbackUrl: process.env.WEBLAB_CALLBACK_URL ?? '/callback',
      sessionIdName: process.env.WEBLAB_SESSION_ID_NAME ?? 'weblab_session_id',
      cookieSecret: process.env.WEBLAB_COOKIE_SECRET ?? `weblab-cookie:${password}`,
      scheme: readScheme(),
      unauthorizedLink: process.env.WEBLAB_UNAUTHORIZED_LINK,
      unauthorizedPage: process.env.WEBLAB_UNAUTHORIZED_PAGE,
      redisUrl: process.env.WEBLAB_REDIS_URL,
      redisBase: process.env.WEBLAB_REDIS_BASE ?? 'lab',
      taskExpiresSeconds: readInt('WEBLAB_TASK_EXPIRES', 3600),
      timeoutSeconds: readInt('WEBLAB_TIMEOUT', 15),
      pollIntervalSeconds: readInt('WEBLAB_POLL_INTERVAL', 5),
      autopoll: readBool('WEBLAB_AUTOPOLL', true),
      expiredUsersTimeoutSeconds: readInt('WEBLAB_EXPIRED_USERS_TIMEOUT', 3600),
      cleanerIntervalSeconds: readInt('WEBLAB_CLEANER_INTERVAL', 5),
      joinStepMs: 50,
      ...readThreadSettings(),
    },
    port: readInt('PORT', 3000),
    corsOrigins: process.env.CORS_ORIGINS ?? '*',
    callbackRateLimit: readInt('RATE_LIMIT_CALLBACK', 300),
    logLevel: process.env.LOG_LEVEL ?? 'info',
    nodeEnv: process.env.NODE_ENV ?? 'development',
  };

  return config;
}

/** Reset config (for testing) */
export function resetConfig(): void {
  config = null;
}

/** Settings with every default applied; handy for embedding and tests. */
export function defaultSettings(overrides: Partial<WeblabSettings> = {}): WeblabSettings {
  return {
    username: '',
    password: '',
    baseUrl: '',
    callbackUrl: '/callback',
    sessionIdName: 'weblab_session_id',
    cookieSecret: 'weblab-cookie:',
    scheme: undefined,
    unauthorizedLink: undefined,
    unauthorizedPage: undefined,
    redisUrl: undefined,
    redisBase: 'lab',
    taskExpiresSeconds: 3600,
    timeoutSeconds: 15,
    pollIntervalSeconds: 5,
    autopoll: true,
    expiredUsersTimeoutSeconds: 3600,
    cleanerIntervalSeconds: 5,
    autocleanThread: true,
    taskThreads: 3,
    joinStepMs: 50,
    ...overrides,
  };
}
