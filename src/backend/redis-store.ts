import { Redis } from 'ioredis';
import { logger } from '../shared/logger.js';
import { createToken, TASK_TOKEN_BYTES } from '../shared/token.js';
import { currentTimestamp } from '../shared/time.js';
import {
  deriveTaskStatus,
  isJsonObject,
  isSessionOver,
  SESSION_MARKER_GRACE_SECONDS,
  UNIQUE_LOCK_SECONDS,
} from './store.js';
import type { BackendOptions } from './memory-store.js';
import type {
  ExpiredSessionFields,
  JsonObject,
  JsonValue,
  SessionFields,
  StoredUser,
  TaskError,
  TaskInfo,
  TaskOutcome,
  TaskParams,
  WeblabBackend,
} from './store.js';

type RedisBatch = ReturnType<Redis['pipeline']>;

export interface RedisBackendOptions extends BackendOptions {
  /** Namespace shared by every key, so several labs can use one Redis. */
  keyBase?: string;
}

const ACTIVE_FIELDS = [
  'back', 'last_poll', 'max_date', 'username', 'username-unique', 'data', 'exited',
  'locale', 'full_name', 'experiment_name', 'category_name', 'experiment_id',
  'request_client_data', 'request_server_data', 'start_date',
] as const;

const INACTIVE_FIELDS = [
  'back', 'max_date', 'username', 'username-unique', 'data', 'locale', 'full_name',
  'experiment_name', 'category_name', 'experiment_id', 'request_client_data',
  'request_server_data', 'start_date', 'disposing_resources',
] as const;

const TASK_FIELDS = [
  'session_id', 'finished', 'error', 'result', 'running', 'name', 'data', 'stopping',
] as const;

// ─── Decoding ───────────────────────────────────────────────────────────────

function asString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function asStrings(value: unknown): (string | null)[] {
  return Array.isArray(value) ? value.map(asString) : [];
}

function isTaskError(value: unknown): value is TaskError {
  return isJsonObject(value) && typeof value.message === 'string'
    && (value.code === 'exception' || value.code === 'not-found');
}

function parseJson(raw: string | null): unknown {
  if (raw === null) return null;
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function parseObject(raw: string | null): JsonObject {
  const value = parseJson(raw);
  return isJsonObject(value) ? value : {};
}

function parseValue(raw: string | null): JsonValue {
  const value: JsonValue = raw === null ? null : JSON.parse(raw);
  return value;
}

function parseNullableString(raw: string | null): string | null {
  const value = parseJson(raw);
  return typeof value === 'string' ? value : null;
}

function zipFields<const K extends readonly string[]>(
  names: K,
  values: (string | null)[],
): Record<K[number], string | null> {
  const record: Record<string, string | null> = {};
  names.forEach((name, index) => {
    record[name] = values[index] ?? null;
  });
  return record;
}

/** Run a batch and surface the first command error. */
async function execBatch(batch: RedisBatch): Promise<unknown[]> {
  const results = await batch.exec();
  if (!results) throw new Error('Redis transaction aborted');
  return results.map(([err, value]) => {
    if (err) throw err;
    return value;
  });
}

// ─── Backend ────────────────────────────────────────────────────────────────

/**
 * Redis-backed store shared by every web and runner process of a lab.
 *
 * Sessions live in `<base>:weblab:active:<id>` until disposal moves them to
 * `<base>:weblab:inactive:<id>`; `<base>:weblab:sessions:<id>` marks that the
 * disposal has not completed yet. Tasks live in `<base>:weblab:tasks:<id>`,
 * indexed per session in `<base>:weblab:<session>:tasks`.
 */
export class RedisBackend implements WeblabBackend {
  readonly kind = 'redis';

  private readonly redis: Redis;
  private readonly base: string;
  private readonly taskExpires: number;
  private readonly expiredUsersTimeout: number;

  constructor(client: Redis, opts?: RedisBackendOptions) {
    this.redis = client;
    this.base = `${opts?.keyBase ?? 'lab'}:weblab`;
    this.taskExpires = opts?.taskExpiresSeconds ?? 3600;
    this.expiredUsersTimeout = opts?.expiredUsersTimeoutSeconds ?? 3600;
  }

  static fromUrl(redisUrl: string, opts?: RedisBackendOptions & { tls?: boolean }): RedisBackend {
    const client = new Redis(redisUrl, {
      tls: opts?.tls ? { rejectUnauthorized: false } : undefined,
      maxRetriesPerRequest: 3,
      lazyConnect: true,
    });

    client.on('error', (err: Error) => {
      logger.error({ err }, 'Redis connection error');
    });

    return new RedisBackend(client, opts);
  }

  /** Explicitly connect (call once at startup). */
  async connect(): Promise<void> {
    await this.redis.connect();
    logger.info({ base: this.base }, 'Redis backend connected');
  }

  // ── Keys ────────────────────────────────────────────────────────────────

  private activeKey(sessionId: string): string {
    return `${this.base}:active:${sessionId}`;
  }

  private inactiveKey(sessionId: string): string {
    return `${this.base}:inactive:${sessionId}`;
  }

  private markerKey(sessionId: string): string {
    return `${this.base}:sessions:${sessionId}`;
  }

  private taskKey(taskId: string): string {
    return `${this.base}:tasks:${taskId}`;
  }

  private taskIdKey(taskId: string): string {
    return `${this.base}:task_ids:${taskId}`;
  }

  private unclaimedTaskKey(taskId: string): string {
    return `${this.base}:task_ids:active:${taskId}`;
  }

  private sessionTasksKey(sessionId: string): string {
    return `${this.base}:${sessionId}:tasks`;
  }

  private async scanKeys(pattern: string): Promise<string[]> {
    const keys = new Set<string>();
    let cursor = '0';

    do {
      const [nextCursor, batch] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', 100);
      cursor = nextCursor;
      for (const key of batch) keys.add(key);
    } while (cursor !== '0');

    return [...keys];
  }

  // ── Sessions ────────────────────────────────────────────────────────────

  async addUser(sessionId: string, fields: SessionFields, expirationSeconds: number): Promise<void> {
    const key = this.activeKey(sessionId);

    await execBatch(
      this.redis
        .multi()
        .hset(key, {
          back: fields.back,
          last_poll: String(fields.lastPoll),
          max_date: String(fields.maxDate),
          username: fields.username,
          'username-unique': fields.usernameUnique,
          data: JSON.stringify(fields.data),
          exited: JSON.stringify(fields.exited),
          locale: JSON.stringify(fields.locale),
          full_name: JSON.stringify(fields.fullName),
          experiment_name: JSON.stringify(fields.experimentName),
          category_name: JSON.stringify(fields.categoryName),
          experiment_id: JSON.stringify(fields.experimentId),
          start_date: String(fields.startDate),
          request_client_data: JSON.stringify(fields.requestClientData),
          request_server_data: JSON.stringify(fields.requestServerData),
        })
        .expire(key, expirationSeconds)
        .set(
          this.markerKey(sessionId),
          String(currentTimestamp()),
          'EX',
          expirationSeconds + SESSION_MARKER_GRACE_SECONDS,
        ),
    );
  }

  async getUser(sessionId: string): Promise<StoredUser> {
    const active = zipFields(ACTIVE_FIELDS, await this.redis.hmget(this.activeKey(sessionId), ...ACTIVE_FIELDS));

    if (active.max_date !== null) {
      return {
        kind: 'current',
        fields: {
          sessionId,
          back: active.back ?? '',
          lastPoll: Number(active.last_poll),
          maxDate: Number(active.max_date),
          startDate: Number(active.start_date),
          username: active.username ?? '',
          usernameUnique: active['username-unique'] ?? '',
          fullName: parseNullableString(active.full_name) ?? '',
          locale: parseNullableString(active.locale),
          experimentName: parseNullableString(active.experiment_name) ?? '',
          categoryName: parseNullableString(active.category_name) ?? '',
          experimentId: parseNullableString(active.experiment_id) ?? '',
          exited: parseJson(active.exited) === true,
          data: parseObject(active.data),
          requestClientData: parseObject(active.request_client_data),
          requestServerData: parseObject(active.request_server_data),
        },
      };
    }

    const inactive = zipFields(
      INACTIVE_FIELDS,
      await this.redis.hmget(this.inactiveKey(sessionId), ...INACTIVE_FIELDS),
    );

    if (inactive.max_date !== null) {
      return {
        kind: 'expired',
        fields: {
          sessionId,
          back: inactive.back ?? '',
          maxDate: Number(inactive.max_date),
          startDate: Number(inactive.start_date),
          username: inactive.username ?? '',
          usernameUnique: inactive['username-unique'] ?? '',
          fullName: parseNullableString(inactive.full_name) ?? '',
          locale: parseNullableString(inactive.locale),
          experimentName: parseNullableString(inactive.experiment_name) ?? '',
          categoryName: parseNullableString(inactive.category_name) ?? '',
          experimentId: parseNullableString(inactive.experiment_id) ?? '',
          data: parseObject(inactive.data),
          requestClientData: parseObject(inactive.request_client_data),
          requestServerData: parseObject(inactive.request_server_data),
          disposingResources: parseJson(inactive.disposing_resources) === true,
        },
      };
    }

    return { kind: 'anonymous' };
  }

  async sessionExists(sessionId: string): Promise<boolean> {
    const user = await this.getUser(sessionId);
    return user.kind !== 'anonymous';
  }

  /**
   * The active record is tried first. Only when it is gone is the inactive one
   * written: disposal creates the inactive record in the same transaction that
   * deletes the active one, so a missing inactive record at that point is
   * really gone and the partial write is undone.
   */
  async updateData(sessionId: string, data: JsonObject): Promise<void> {
    const raw = JSON.stringify(data);
    const activeKey = this.activeKey(sessionId);

    const [activeMaxDate] = await execBatch(
      this.redis.multi().hget(activeKey, 'max_date').hset(activeKey, 'data', raw),
    );
    if (asString(activeMaxDate) !== null) return;
    await this.redis.del(activeKey);

    const inactiveKey = this.inactiveKey(sessionId);
    const [inactiveMaxDate] = await execBatch(
      this.redis.multi().hget(inactiveKey, 'max_date').hset(inactiveKey, 'data', raw),
    );
    if (asString(inactiveMaxDate) === null) {
      await this.redis.del(inactiveKey);
    }
  }

  /**
   * DEL and the inactive record's fields go in one transaction. The fields
   * are written with HSETNX, so a caller that loses the race (its DEL returns
   * 0) never overwrites what the winner stored.
   */
  async deleteUser(sessionId: string, expired: ExpiredSessionFields): Promise<boolean> {
    const activeKey = this.activeKey(sessionId);
    if ((await this.redis.hget(activeKey, 'max_date')) === null) return false;

    const key = this.inactiveKey(sessionId);
    const fields: Record<(typeof INACTIVE_FIELDS)[number], string> = {
      back: expired.back,
      max_date: String(expired.maxDate),
      username: expired.username,
      'username-unique': expired.usernameUnique,
      data: JSON.stringify(expired.data),
      locale: JSON.stringify(expired.locale),
      full_name: JSON.stringify(expired.fullName),
      experiment_name: JSON.stringify(expired.experimentName),
      category_name: JSON.stringify(expired.categoryName),
      experiment_id: JSON.stringify(expired.experimentId),
      request_client_data: JSON.stringify(expired.requestClientData),
      request_server_data: JSON.stringify(expired.requestServerData),
      start_date: String(expired.startDate),
      disposing_resources: JSON.stringify(expired.disposingResources),
    };

    const batch = this.redis.multi().del(activeKey);
    for (const [field, value] of Object.entries(fields)) {
      batch.hsetnx(key, field, value);
    }
    batch.expire(key, this.expiredUsersTimeout);

    const [deleted] = await execBatch(batch);
    return deleted === 1;
  }

  async finishedDispose(sessionId: string): Promise<void> {
    const key = this.inactiveKey(sessionId);
    // HSET answers 1 when the field is new, i.e. the record had vanished
    if ((await this.redis.hset(key, 'disposing_resources', 'false')) === 1) {
      await this.redis.del(key);
    }
  }

  async forceExit(sessionId: string): Promise<void> {
    const key = this.activeKey(sessionId);
    const [maxDate] = await execBatch(this.redis.multi().hget(key, 'max_date').hset(key, 'exited', 'true'));
    if (asString(maxDate) === null) {
      await this.redis.del(key);
    }
  }

  async findExpiredSessions(timeoutSeconds: number): Promise<string[]> {
    const prefix = `${this.base}:active:`;
    const keys = await this.scanKeys(`${prefix}*`);
    if (keys.length === 0) return [];

    const batch = this.redis.pipeline();
    for (const key of keys) {
      batch.hmget(key, 'max_date', 'last_poll', 'exited');
    }
    const results = await execBatch(batch);

    const now = currentTimestamp();
    const expired: string[] = [];

    keys.forEach((key, index) => {
      const [maxDate, lastPoll, exited] = asStrings(results[index]);
      // Deleted in the meanwhile
      if (maxDate == null || lastPoll == null) return;

      const fields = {
        maxDate: Number(maxDate),
        lastPoll: Number(lastPoll),
        exited: ['true', '1', 'True', 'TRUE'].includes(exited ?? ''),
      };
      if (isSessionOver(fields, now, timeoutSeconds)) {
        expired.push(key.slice(prefix.length));
      }
    });

    return expired;
  }

  async poll(sessionId: string): Promise<void> {
    const key = this.activeKey(sessionId);
    const [maxDate] = await execBatch(
      this.redis.multi().hget(key, 'max_date').hset(key, 'last_poll', String(currentTimestamp())),
    );
    if (asString(maxDate) === null) {
      // Disposed in between: drop the last_poll we just created
      await this.redis.del(key);
    }
  }

  async isSessionDeleted(sessionId: string): Promise<boolean> {
    return (await this.redis.get(this.markerKey(sessionId))) === null;
  }

  async reportSessionDeleted(sessionId: string): Promise<void> {
    await this.redis.del(this.markerKey(sessionId));
  }

  // ── Tasks ───────────────────────────────────────────────────────────────

  async newTask(sessionId: string | null, name: string, args: JsonValue[]): Promise<string> {
    let taskId = createToken(TASK_TOKEN_BYTES);
    while ((await this.redis.set(this.taskIdKey(taskId), taskId, 'EX', this.taskExpires, 'NX')) !== 'OK') {
      taskId = createToken(TASK_TOKEN_BYTES);
    }

    const key = this.taskKey(taskId);
    // `running` stays absent until a worker claims the task
    const batch = this.redis
      .multi()
      .hset(key, {
        name,
        session_id: sessionId ?? '',
        args: JSON.stringify(args),
        finished: 'false',
        error: 'null',
        result: 'null',
        data: JSON.stringify({}),
        stopping: JSON.stringify(false),
      })
      .expire(key, this.taskExpires);

    if (sessionId !== null) {
      const indexKey = this.sessionTasksKey(sessionId);
      batch.sadd(indexKey, taskId).expire(indexKey, this.taskExpires);
    }

    batch.set(this.unclaimedTaskKey(taskId), taskId, 'EX', this.taskExpires);
    await execBatch(batch);
    return taskId;
  }

  async startTask(taskId: string): Promise<TaskParams | null> {
    const key = this.taskKey(taskId);

    const [created, values] = await execBatch(
      this.redis
        .multi()
        .hset(key, 'running', '1')
        .hmget(key, 'name', 'args', 'session_id')
        .del(this.unclaimedTaskKey(taskId)),
    );

    // Another worker set `running` first
    if (created !== 1) return null;

    const [name, args, sessionId] = asStrings(values);
    if (name == null) {
      // The task was deleted before: remove the `running` we just created
      await this.redis.del(key);
      return null;
    }

    const parsedArgs = parseJson(args ?? null);
    return {
      name,
      args: Array.isArray(parsedArgs) ? parsedArgs : [],
      sessionId: sessionId ? sessionId : null,
    };
  }

  async finishTask(taskId: string, outcome: TaskOutcome): Promise<void> {
    const key = this.taskKey(taskId);
    const result = 'result' in outcome ? outcome.result : null;
    const error = 'error' in outcome ? outcome.error : null;

    const [name] = await execBatch(
      this.redis
        .multi()
        .hget(key, 'name')
        .hset(key, {
          finished: 'true',
          result: JSON.stringify(result),
          error: JSON.stringify(error),
        }),
    );
    if (asString(name) === null) {
      await this.redis.del(key);
    }
  }

  async updateTaskData(taskId: string, data: JsonObject): Promise<void> {
    await this.setTaskField(taskId, 'data', JSON.stringify(data));
  }

  async requestStopTask(taskId: string): Promise<void> {
    await this.setTaskField(taskId, 'stopping', JSON.stringify(true));
  }

  private async setTaskField(taskId: string, field: string, value: string): Promise<void> {
    const key = this.taskKey(taskId);
    const [name] = await execBatch(this.redis.multi().hget(key, 'name').hset(key, field, value));
    if (asString(name) === null) {
      // Deleted in the meanwhile
      await this.redis.del(key);
    }
  }

  async getTask(taskId: string): Promise<TaskInfo | null> {
    const task = zipFields(TASK_FIELDS, await this.redis.hmget(this.taskKey(taskId), ...TASK_FIELDS));
    if (task.name === null) return null;

    const parsedError = parseJson(task.error);
    const error = isTaskError(parsedError) ? parsedError : null;

    return {
      taskId,
      sessionId: task.session_id ? task.session_id : null,
      name: task.name,
      status: deriveTaskStatus(Boolean(task.running), task.finished === 'true', error),
      result: parseValue(task.result),
      error,
      data: parseObject(task.data),
      stopping: parseJson(task.stopping) === true,
    };
  }

  async getTasksNotStarted(): Promise<string[]> {
    const prefix = `${this.base}:task_ids:active:`;
    const taskIds = (await this.scanKeys(`${prefix}*`)).map((key) => key.slice(prefix.length));
    if (taskIds.length === 0) return [];

    const batch = this.redis.pipeline();
    for (const taskId of taskIds) {
      batch.hget(this.taskKey(taskId), 'running');
    }
    const results = await execBatch(batch);

    return taskIds.filter((_, index) => !asString(results[index]));
  }

  async getAllTasks(sessionId: string): Promise<string[]> {
    return this.redis.smembers(this.sessionTasksKey(sessionId));
  }

  async getUnfinishedTasks(sessionId: string): Promise<string[]> {
    const taskIds = await this.redis.smembers(this.sessionTasksKey(sessionId));
    if (taskIds.length === 0) return [];

    const batch = this.redis.pipeline();
    for (const taskId of taskIds) {
      batch.hget(this.taskKey(taskId), 'finished');
    }
    const results = await execBatch(batch);

    // 'true' when done or failed, null when the record expired
    return taskIds.filter((_, index) => asString(results[index]) === 'false');
  }

  async cleanSessionTasks(sessionId: string): Promise<void> {
    const indexKey = this.sessionTasksKey(sessionId);
    const taskIds = await this.redis.smembers(indexKey);

    const batch = this.redis.multi().del(indexKey);
    for (const taskId of taskIds) {
      batch.del(this.taskKey(taskId), this.taskIdKey(taskId), this.unclaimedTaskKey(taskId));
    }
    await execBatch(batch);
  }

  // ── Uniqueness locks ────────────────────────────────────────────────────

  private globalLockKey(name: string): string {
    return `${this.base}:global-unique-tasks:${name}`;
  }

  private userLockKey(name: string, sessionId: string): string {
    return `${this.base}:user-unique-tasks:${name}:${sessionId}`;
  }

  async lockGlobalUniqueTask(name: string): Promise<boolean> {
    return (await this.redis.set(this.globalLockKey(name), '1', 'EX', UNIQUE_LOCK_SECONDS, 'NX')) === 'OK';
  }

  async lockUserUniqueTask(name: string, sessionId: string): Promise<boolean> {
    return (
      (await this.redis.set(this.userLockKey(name, sessionId), '1', 'EX', UNIQUE_LOCK_SECONDS, 'NX')) === 'OK'
    );
  }

  async unlockGlobalUniqueTask(name: string): Promise<void> {
    await this.redis.del(this.globalLockKey(name));
  }

  async unlockUserUniqueTask(name: string, sessionId: string): Promise<void> {
    await this.redis.del(this.userLockKey(name, sessionId));
  }

  async cleanLockGlobalUniqueTask(name: string): Promise<void> {
    await this.unlockGlobalUniqueTask(name);
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (err) {
      logger.warn({ err }, 'Redis ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
