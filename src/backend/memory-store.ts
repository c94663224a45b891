import { createToken, TASK_TOKEN_BYTES } from '../shared/token.js';
import { currentTimestamp } from '../shared/time.js';
import {
  deriveTaskStatus,
  isSessionOver,
  SESSION_MARKER_GRACE_SECONDS,
  UNIQUE_LOCK_SECONDS,
} from './store.js';
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

export interface BackendOptions {
  /** Lifetime of task records, in seconds. */
  taskExpiresSeconds?: number;
  /** Lifetime of the inactive record after disposal, in seconds. */
  expiredUsersTimeoutSeconds?: number;
}

interface MemoryTask {
  name: string;
  sessionId: string | null;
  args: JsonValue[];
  claimed: boolean;
  finished: boolean;
  result: JsonValue;
  error: TaskError | null;
  data: JsonObject;
  stopping: boolean;
}

/** How often a map drops every expired entry while it is being written to. */
const PRUNE_INTERVAL_MS = 60_000;

/**
 * Map whose entries disappear once their expiry (epoch ms) has passed. An
 * expired entry is dropped when it is read, and all of them by `prune()`,
 * which writes trigger at most once per interval.
 */
export class ExpiringMap<T> {
  private entries = new Map<string, { value: T; expiresAt: number | null }>();
  private lastPrune = Date.now();

  /** Stored entries, expired ones included until they are pruned. */
  get size(): number {
    return this.entries.size;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set(key: string, value: T, ttlSeconds?: number): void {
    const expiresAt = ttlSeconds === undefined ? null : Date.now() + ttlSeconds * 1000;
    this.entries.set(key, { value, expiresAt });

    if (Date.now() - this.lastPrune >= PRUNE_INTERVAL_MS) this.prune();
  }

  delete(key: string): boolean {
    const existed = this.has(key);
    this.entries.delete(key);
    return existed;
  }

  keys(): string[] {
    return [...this.entries.keys()].filter((key) => this.has(key));
  }

  prune(): void {
    const now = Date.now();
    this.lastPrune = now;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) this.entries.delete(key);
    }
  }
}

export interface MemoryBackendStats {
  active: number;
  inactive: number;
  markers: number;
  tasks: number;
  sessionTasks: number;
  locks: number;
}

/**
 * In-process backend. JavaScript runs each method body up to its first await
 * without interruption, and none of these methods awaits between a read and
 * the write that depends on it, so every operation is atomic here.
 */
export class MemoryBackend implements WeblabBackend {
  readonly kind = 'memory';

  private readonly taskExpires: number;
  private readonly expiredUsersTimeout: number;

  private active = new ExpiringMap<SessionFields>();
  private inactive = new ExpiringMap<ExpiredSessionFields>();
  private markers = new ExpiringMap<number>();
  private tasks = new ExpiringMap<MemoryTask>();
  private sessionTasks = new ExpiringMap<Set<string>>();
  private locks = new ExpiringMap<true>();

  constructor(opts?: BackendOptions) {
    this.taskExpires = opts?.taskExpiresSeconds ?? 3600;
    this.expiredUsersTimeout = opts?.expiredUsersTimeoutSeconds ?? 3600;
  }

  // ── Sessions ────────────────────────────────────────────────────────────

  async addUser(sessionId: string, fields: SessionFields, expirationSeconds: number): Promise<void> {
    this.active.set(sessionId, structuredClone(fields), expirationSeconds);
    this.markers.set(sessionId, currentTimestamp(), expirationSeconds + SESSION_MARKER_GRACE_SECONDS);
  }

  async getUser(sessionId: string): Promise<StoredUser> {
    const current = this.active.get(sessionId);
    if (current) return { kind: 'current', fields: structuredClone(current) };

    const expired = this.inactive.get(sessionId);
    if (expired) return { kind: 'expired', fields: structuredClone(expired) };

    return { kind: 'anonymous' };
  }

  async sessionExists(sessionId: string): Promise<boolean> {
    return this.active.has(sessionId) || this.inactive.has(sessionId);
  }

  async updateData(sessionId: string, data: JsonObject): Promise<void> {
    const current = this.active.get(sessionId);
    if (current) current.data = structuredClone(data);

    const expired = this.inactive.get(sessionId);
    if (expired) expired.data = structuredClone(data);
  }

  async deleteUser(sessionId: string, expired: ExpiredSessionFields): Promise<boolean> {
    if (!this.active.delete(sessionId)) return false;

    this.inactive.set(sessionId, structuredClone(expired), this.expiredUsersTimeout);
    return true;
  }

  async finishedDispose(sessionId: string): Promise<void> {
    const expired = this.inactive.get(sessionId);
    if (expired) expired.disposingResources = false;
  }

  async forceExit(sessionId: string): Promise<void> {
    const current = this.active.get(sessionId);
    if (current) current.exited = true;
  }

  /** Also sweeps every expired record, since the cleaner calls this periodically. */
  async findExpiredSessions(timeoutSeconds: number): Promise<string[]> {
    this.prune();
    const now = currentTimestamp();
    return this.active.keys().filter((sessionId) => {
      const fields = this.active.get(sessionId);
      return fields !== undefined && isSessionOver(fields, now, timeoutSeconds);
    });
  }

  async poll(sessionId: string): Promise<void> {
    const current = this.active.get(sessionId);
    if (current) current.lastPoll = currentTimestamp();
  }

  async isSessionDeleted(sessionId: string): Promise<boolean> {
    return !this.markers.has(sessionId);
  }

  async reportSessionDeleted(sessionId: string): Promise<void> {
    this.markers.delete(sessionId);
  }

  // ── Tasks ───────────────────────────────────────────────────────────────

  async newTask(sessionId: string | null, name: string, args: JsonValue[]): Promise<string> {
    let taskId = createToken(TASK_TOKEN_BYTES);
    while (this.tasks.has(taskId)) {
      taskId = createToken(TASK_TOKEN_BYTES);
    }

    this.tasks.set(
      taskId,
      {
        name,
        sessionId,
        args: structuredClone(args),
        claimed: false,
        finished: false,
        result: null,
        error: null,
        data: {},
        stopping: false,
      },
      this.taskExpires,
    );

    if (sessionId !== null) {
      const index = this.sessionTasks.get(sessionId) ?? new Set<string>();
      index.add(taskId);
      this.sessionTasks.set(sessionId, index, this.taskExpires);
    }

    return taskId;
  }

  async startTask(taskId: string): Promise<TaskParams | null> {
    const task = this.tasks.get(taskId);
    if (!task || task.claimed) return null;

    task.claimed = true;
    return { name: task.name, args: structuredClone(task.args), sessionId: task.sessionId };
  }

  async finishTask(taskId: string, outcome: TaskOutcome): Promise<void> {
    const task = this.tasks.get(taskId);
    if (!task) return;

    task.finished = true;
    if ('error' in outcome) {
      task.error = structuredClone(outcome.error);
      task.result = null;
    } else {
      task.result = structuredClone(outcome.result);
      task.error = null;
    }
  }

  async updateTaskData(taskId: string, data: JsonObject): Promise<void> {
    const task = this.tasks.get(taskId);
    if (task) task.data = structuredClone(data);
  }

  async requestStopTask(taskId: string): Promise<void> {
    const task = this.tasks.get(taskId);
    if (task) task.stopping = true;
  }

  async getTask(taskId: string): Promise<TaskInfo | null> {
    const task = this.tasks.get(taskId);
    if (!task) return null;

    return {
      taskId,
      sessionId: task.sessionId,
      name: task.name,
      status: deriveTaskStatus(task.claimed, task.finished, task.error),
      result: structuredClone(task.result),
      error: task.error ? structuredClone(task.error) : null,
      data: structuredClone(task.data),
      stopping: task.stopping,
    };
  }

  async getTasksNotStarted(): Promise<string[]> {
    return this.tasks.keys().filter((taskId) => this.tasks.get(taskId)?.claimed === false);
  }

  async getAllTasks(sessionId: string): Promise<string[]> {
    return [...(this.sessionTasks.get(sessionId) ?? [])].filter((taskId) => this.tasks.has(taskId));
  }

  async getUnfinishedTasks(sessionId: string): Promise<string[]> {
    return [...(this.sessionTasks.get(sessionId) ?? [])].filter(
      (taskId) => this.tasks.get(taskId)?.finished === false,
    );
  }

  async cleanSessionTasks(sessionId: string): Promise<void> {
    for (const taskId of this.sessionTasks.get(sessionId) ?? []) {
      this.tasks.delete(taskId);
    }
    this.sessionTasks.delete(sessionId);
  }

  // ── Uniqueness locks ────────────────────────────────────────────────────

  async lockGlobalUniqueTask(name: string): Promise<boolean> {
    return this.lock(`global:${name}`);
  }

  async lockUserUniqueTask(name: string, sessionId: string): Promise<boolean> {
    return this.lock(`user:${name}:${sessionId}`);
  }

  async unlockGlobalUniqueTask(name: string): Promise<void> {
    this.locks.delete(`global:${name}`);
  }

  async unlockUserUniqueTask(name: string, sessionId: string): Promise<void> {
    this.locks.delete(`user:${name}:${sessionId}`);
  }

  async cleanLockGlobalUniqueTask(name: string): Promise<void> {
    await this.unlockGlobalUniqueTask(name);
  }

  private lock(key: string): boolean {
    if (this.locks.has(key)) return false;
    this.locks.set(key, true, UNIQUE_LOCK_SECONDS);
    return true;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  /** Stored entries per map, expired ones included until the next sweep. */
  stats(): MemoryBackendStats {
    return {
      active: this.active.size,
      inactive: this.inactive.size,
      markers: this.markers.size,
      tasks: this.tasks.size,
      sessionTasks: this.sessionTasks.size,
      locks: this.locks.size,
    };
  }

  private prune(): void {
    for (const map of [this.active, this.inactive, this.markers, this.tasks, this.sessionTasks, this.locks]) {
      map.prune();
    }
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
