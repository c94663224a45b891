/** JSON values persisted in the backend (user data, task arguments and results). */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Every field of an active session as stored by the backend. */
export interface SessionFields {
  sessionId: string;
  back: string;
  lastPoll: number;   // epoch seconds
  maxDate: number;    // epoch seconds
  startDate: number;  // epoch seconds
  username: string;
  usernameUnique: string;
  fullName: string;
  locale: string | null;
  experimentName: string;
  categoryName: string;
  experimentId: string;
  exited: boolean;
  data: JsonObject;
  requestClientData: JsonObject;
  requestServerData: JsonObject;
}

/** The inactive record kept after disposal, for post-hoc redirects. */
export interface ExpiredSessionFields extends Omit<SessionFields, 'lastPoll' | 'exited'> {
  disposingResources: boolean;
}

export type StoredUser =
  | { kind: 'anonymous' }
  | { kind: 'current'; fields: SessionFields }
  | { kind: 'expired'; fields: ExpiredSessionFields };

export type TaskStatus = 'submitted' | 'running' | 'done' | 'failed';

export interface TaskError {
  code: 'exception' | 'not-found';
  class?: string;
  message: string;
}

/** What the worker that won the claim needs to run the task. */
export interface TaskParams {
  name: string;
  args: JsonValue[];
  sessionId: string | null;
}

export interface TaskInfo {
  taskId: string;
  sessionId: string | null;
  name: string;
  status: TaskStatus;
  result: JsonValue;
  error: TaskError | null;
  data: JsonObject;
  stopping: boolean;
}

export type TaskOutcome = { result: JsonValue } | { error: TaskError };

/**
 * Shared store for sessions, tasks and locks. Every mutation that involves
 * more than one step happens in one round trip, so concurrent HTTP requests,
 * worker loops and separate processes never observe an intermediate state.
 */
export interface WeblabBackend {
  /** Backend name for health checks and logs. */
  readonly kind: 'redis' | 'memory';

  // ── Sessions ────────────────────────────────────────────────────────────

  /** Store an active session and its existence marker (which outlives it by 300 s). */
  addUser(sessionId: string, fields: SessionFields, expirationSeconds: number): Promise<void>;

  /** Active record, else inactive record, else anonymous. */
  getUser(sessionId: string): Promise<StoredUser>;

  sessionExists(sessionId: string): Promise<boolean>;

  /** Write `data` to whichever record exists; never resurrects a vanished one. */
  updateData(sessionId: string, data: JsonObject): Promise<void>;

  /**
   * Atomically replace the active record with the inactive one.
   * Returns false when another caller already did it.
   */
  deleteUser(sessionId: string, expired: ExpiredSessionFields): Promise<boolean>;

  /** Clear `disposingResources` on the inactive record. */
  finishedDispose(sessionId: string): Promise<void>;

  /** Mark an active session as exited. No-op when it is already gone. */
  forceExit(sessionId: string): Promise<void>;

  /** Active sessions that are over: past max date, poll timeout exceeded, or exited. */
  findExpiredSessions(timeoutSeconds: number): Promise<string[]>;

  /** Refresh last poll. No-op when the session is already gone. */
  poll(sessionId: string): Promise<void>;

  isSessionDeleted(sessionId: string): Promise<boolean>;
  reportSessionDeleted(sessionId: string): Promise<void>;

  // ── Tasks ───────────────────────────────────────────────────────────────

  newTask(sessionId: string | null, name: string, args: JsonValue[]): Promise<string>;

  /** Atomic claim: the first caller gets the parameters, everyone else null. */
  startTask(taskId: string): Promise<TaskParams | null>;

  finishTask(taskId: string, outcome: TaskOutcome): Promise<void>;
  updateTaskData(taskId: string, data: JsonObject): Promise<void>;
  requestStopTask(taskId: string): Promise<void>;
  getTask(taskId: string): Promise<TaskInfo | null>;
  getTasksNotStarted(): Promise<string[]>;
  getAllTasks(sessionId: string): Promise<string[]>;
  getUnfinishedTasks(sessionId: string): Promise<string[]>;
  cleanSessionTasks(sessionId: string): Promise<void>;

  // ── Uniqueness locks ────────────────────────────────────────────────────

  lockGlobalUniqueTask(name: string): Promise<boolean>;
  lockUserUniqueTask(name: string, sessionId: string): Promise<boolean>;
  unlockGlobalUniqueTask(name: string): Promise<void>;
  unlockUserUniqueTask(name: string, sessionId: string): Promise<void>;
  /** Drop a global lock left behind by a process that died mid-task. */
  cleanLockGlobalUniqueTask(name: string): Promise<void>;

  // ── Lifecycle ───────────────────────────────────────────────────────────

  ping(): Promise<boolean>;
  close(): Promise<void>;
}

/** Seconds the existence marker outlives the active record. */
export const SESSION_MARKER_GRACE_SECONDS = 300;

/** Lifetime of a uniqueness lock; a crashed holder releases it at the latest then. */
export const UNIQUE_LOCK_SECONDS = 7200;

export function deriveTaskStatus(claimed: boolean, finished: boolean, error: TaskError | null): TaskStatus {
  if (!claimed) return 'submitted';
  if (!finished) return 'running';
  return error ? 'failed' : 'done';
}

/** Raw-field expiry check shared by both backends' sweeps. */
export function isSessionOver(
  fields: { maxDate: number; lastPoll: number; exited: boolean },
  now: number,
  timeoutSeconds: number,
): boolean {
  if (fields.maxDate - now <= 0) return true;
  if (timeoutSeconds > 0 && now - fields.lastPoll >= timeoutSeconds) return true;
  return fields.exited;
}
