import { DeadlockError, NotFoundError, TaskTimeoutError } from '../shared/errors.js';
import { sleep } from '../shared/time.js';
import type { JsonObject, JsonValue, TaskError, TaskInfo, TaskStatus, WeblabBackend } from '../backend/store.js';
import { currentRunningTask } from './context.js';

export interface JoinOptions {
  /** Seconds to wait; wait forever when omitted. */
  timeout?: number;
  /** Throw `TaskTimeoutError` on timeout instead of returning. Defaults to true. */
  errorOnTimeout?: boolean;
}

/**
 * Handle on a task record. It is a snapshot: call `retrieve()` to refresh it.
 *
 * Status only moves forward: submitted → running → done | failed. `result` is
 * set only when done and `error` only when failed.
 */
export class WeblabTask {
  private info: TaskInfo;

  private constructor(
    private readonly backend: WeblabBackend,
    info: TaskInfo,
    private readonly joinStepMs: number,
  ) {
    this.info = info;
  }

  /** @throws NotFoundError when the task does not exist (or expired) */
  static async load(backend: WeblabBackend, taskId: string, joinStepMs = 50): Promise<WeblabTask> {
    const info = await backend.getTask(taskId);
    if (!info) throw new NotFoundError(`Task ${taskId} not found`);
    return new WeblabTask(backend, info, joinStepMs);
  }

  static fromInfo(backend: WeblabBackend, info: TaskInfo, joinStepMs = 50): WeblabTask {
    return new WeblabTask(backend, info, joinStepMs);
  }

  get taskId(): string {
    return this.info.taskId;
  }

  get sessionId(): string | null {
    return this.info.sessionId;
  }

  /** Registered name of the task function. */
  get name(): string {
    return this.info.name;
  }

  get status(): TaskStatus {
    return this.info.status;
  }

  get submitted(): boolean {
    return this.info.status === 'submitted';
  }

  get running(): boolean {
    return this.info.status === 'running';
  }

  get done(): boolean {
    return this.info.status === 'done';
  }

  get failed(): boolean {
    return this.info.status === 'failed';
  }

  get finished(): boolean {
    return this.done || this.failed;
  }

  /** Someone called `stop()`; the task is expected to wind down. */
  get stopping(): boolean {
    return this.info.stopping;
  }

  get result(): JsonValue {
    return this.info.result;
  }

  get error(): TaskError | null {
    return this.info.error;
  }

  /**
   * Progress data. Inside the task itself this is the live object to edit
   * before `store()`; anywhere else it is a read-only copy.
   */
  get data(): JsonObject {
    if (this.isCurrentTask()) return this.info.data;
    return Object.freeze(structuredClone(this.info.data));
  }

  set data(value: JsonObject) {
    if (!this.isCurrentTask()) {
      throw new TypeError('You cannot set data outside the task itself');
    }
    this.info.data = value;
  }

  private isCurrentTask(): boolean {
    return currentRunningTask()?.taskId === this.info.taskId;
  }

  /** Persist `data`. Only the task itself may do this. */
  async store(): Promise<this> {
    if (!this.isCurrentTask()) {
      throw new TypeError('You cannot store data outside the task itself');
    }
    await this.backend.updateTaskData(this.info.taskId, this.info.data);
    return this;
  }

  async retrieve(): Promise<this> {
    const info = await this.backend.getTask(this.info.taskId);
    if (!info) throw new NotFoundError(`Task ${this.info.taskId} not found`);
    this.info = info;
    return this;
  }

  /** Raise the stop flag. The task decides when (and whether) to stop. */
  async stop(): Promise<void> {
    await this.backend.requestStopTask(this.info.taskId);
  }

  /** Wait until the task is finished. Never interrupts the task itself. */
  async join(options: JoinOptions = {}): Promise<this> {
    if (this.isCurrentTask()) throw new DeadlockError();

    const { timeout, errorOnTimeout = true } = options;
    const startedAt = Date.now();

    while (!(await this.retrieve()).finished) {
      if (timeout !== undefined && Date.now() - startedAt > timeout * 1000) {
        if (errorOnTimeout) throw new TaskTimeoutError(`${timeout} seconds passed`);
        return this;
      }
      await sleep(this.joinStepMs);
    }
    return this;
  }

  toString(): string {
    return `<Task ${this.info.taskId} (${this.info.name}): ${this.info.status}>`;
  }
}
