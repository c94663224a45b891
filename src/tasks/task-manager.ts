import { logger } from '../shared/logger.js';
import { AlreadyRunningError, InvalidConfigError, NoContextError } from '../shared/errors.js';
import type { JsonValue, TaskError, TaskParams, WeblabBackend } from '../backend/store.js';
import { currentRunningTask, currentSessionId, runWithContext } from './context.js';
import { WeblabTask } from './task.js';
import type { JoinOptions } from './task.js';

export type UniqueMode = 'global' | 'user';

export interface TaskOptions {
  /** Defaults to the function's own name. */
  name?: string;
  /** Reject concurrent runs of this task everywhere (`global`) or per session (`user`). */
  unique?: UniqueMode | null;
}

/** Task results are stored as JSON; `undefined` becomes null. */
export type TaskResult = JsonValue | void;

/**
 * A registered task. Calling it runs the function here and now (honouring
 * `unique`); `delay` and `runSync` hand it to a task runner instead.
 */
export interface TaskFunction<A extends JsonValue[], R extends TaskResult> {
  (...args: A): Promise<R>;
  readonly taskName: string;
  readonly unique: UniqueMode | null;
  /** Submit the task and return its handle at once. */
  delay(...args: A): Promise<WeblabTask>;
  /** Submit the task and wait for it; never throws on timeout. */
  runSync(options: { timeout?: number }, ...args: A): Promise<WeblabTask>;
}

export type TaskReference = string | { readonly taskName: string };

interface RegisteredTask {
  readonly name: string;
  readonly unique: UniqueMode | null;
  // Method syntax keeps the lab function's own parameter types assignable here
  call(...args: JsonValue[]): Promise<TaskResult>;
}

export interface TaskManagerDeps {
  backend: WeblabBackend;
  joinStepMs: number;
  /** How often a running task's stop flag is checked to abort its signal. */
  stopCheckMs?: number;
}

function taskName(reference: TaskReference): string {
  return typeof reference === 'string' ? reference : reference.taskName;
}

function toJsonResult(value: unknown): JsonValue {
  if (value === undefined) return null;
  const result: JsonValue = JSON.parse(JSON.stringify(value));
  return result;
}

function toTaskError(err: unknown): TaskError {
  if (err instanceof Error) {
    return { code: 'exception', class: err.constructor.name, message: err.message };
  }
  return { code: 'exception', class: typeof err, message: String(err) };
}

/** Task registry, runner sweep and lookups for one lab. */
export class TaskManager {
  private readonly backend: WeblabBackend;
  private readonly joinStepMs: number;
  private readonly stopCheckMs: number;
  private readonly registry = new Map<string, RegisteredTask>();
  private started = false;

  constructor(deps: TaskManagerDeps) {
    this.backend = deps.backend;
    this.joinStepMs = deps.joinStepMs;
    this.stopCheckMs = deps.stopCheckMs ?? 250;
  }

  // ── Registration ────────────────────────────────────────────────────────

  register<A extends JsonValue[], R extends TaskResult>(
    fn: (...args: A) => R | Promise<R>,
    options: TaskOptions = {},
  ): TaskFunction<A, R> {
    const name = options.name ?? fn.name;
    const unique = options.unique ?? null;

    if (!name) {
      throw new InvalidConfigError('Task functions need a name: pass a named function or the name option');
    }
    if (this.registry.has(name)) {
      throw new InvalidConfigError(`You can't have two tasks with the same name (${name})`);
    }
    if (unique !== null && unique !== 'global' && unique !== 'user') {
      throw new InvalidConfigError("unique must be null, 'global' or 'user'");
    }

    const call = async (...args: A): Promise<R> => this.callExclusive(name, unique, () => fn(...args));

    this.registry.set(name, { name, unique, call });

    if (unique === 'global' && this.started) {
      this.backend.cleanLockGlobalUniqueTask(name).catch((err: unknown) => {
        logger.error({ err, task: name }, 'Failed to clean global task lock');
      });
    }

    return Object.assign(call, {
      taskName: name,
      unique,
      delay: (...args: A): Promise<WeblabTask> => this.submit(name, args),
      runSync: async (runOptions: { timeout?: number }, ...args: A): Promise<WeblabTask> => {
        const task = await this.submit(name, args);
        return task.join({ timeout: runOptions.timeout, errorOnTimeout: false });
      },
    });
  }

  get taskNames(): string[] {
    return [...this.registry.keys()];
  }

  /** Drop global locks left by a process that died mid-task. Runs once at startup. */
  async start(): Promise<void> {
    for (const task of this.registry.values()) {
      if (task.unique === 'global') {
        await this.backend.cleanLockGlobalUniqueTask(task.name);
      }
    }
    this.started = true;
  }

  private async callExclusive<R>(name: string, unique: UniqueMode | null, run: () => R | Promise<R>): Promise<R> {
    if (unique === null) return run();

    let sessionId: string | null = null;
    if (unique === 'global') {
      if (!(await this.backend.lockGlobalUniqueTask(name))) {
        throw new AlreadyRunningError(`This task (${name}) has been sent in parallel and it is still running`);
      }
    } else {
      sessionId = currentSessionId();
      if (sessionId === null) {
        throw new NoContextError(`Task ${name} is unique per user but runs outside a session`);
      }
      if (!(await this.backend.lockUserUniqueTask(name, sessionId))) {
        throw new AlreadyRunningError(
          `This task (${name}) has been sent in parallel by ${sessionId} and it is still running`,
        );
      }
    }

    try {
      return await run();
    } finally {
      if (sessionId === null) {
        await this.backend.unlockGlobalUniqueTask(name);
      } else {
        await this.backend.unlockUserUniqueTask(name, sessionId);
      }
    }
  }

  private async submit(name: string, args: JsonValue[]): Promise<WeblabTask> {
    const taskId = await this.backend.newTask(currentSessionId(), name, args);
    logger.debug({ taskId, task: name }, 'Task submitted');
    return WeblabTask.load(this.backend, taskId, this.joinStepMs);
  }

  // ── Execution ───────────────────────────────────────────────────────────

  /**
   * One sweep: claim every unclaimed task and run the ones this process won.
   * A failing task is recorded as failed; it never breaks the sweep.
   */
  async runTasks(shouldStop: () => boolean = () => false): Promise<void> {
    if (this.registry.size === 0) return;

    for (const taskId of await this.backend.getTasksNotStarted()) {
      if (shouldStop()) return;

      const params = await this.backend.startTask(taskId);
      // Someone else took it
      if (!params) continue;

      await this.execute(taskId, params);
    }
  }

  private async execute(taskId: string, params: TaskParams): Promise<void> {
    const task = this.registry.get(params.name);
    if (!task) {
      logger.warn({ taskId, task: params.name }, 'Task function not registered');
      await this.backend.finishTask(taskId, {
        error: { code: 'not-found', message: `Task ${params.name} not found` },
      });
      return;
    }

    const controller = new AbortController();
    const stopWatch = setInterval(() => {
      this.backend
        .getTask(taskId)
        .then((info) => {
          if (info?.stopping) controller.abort();
        })
        .catch((err: unknown) => {
          logger.warn({ err, taskId }, 'Failed to check the stop flag');
        });
    }, this.stopCheckMs);

    logger.info({ taskId, task: task.name, sessionId: params.sessionId }, 'Running task');
    try {
      const result = await runWithContext(
        { sessionId: params.sessionId, task: { taskId, name: task.name, controller } },
        () => task.call(...params.args),
      );
      await this.backend.finishTask(taskId, { result: toJsonResult(result) });
    } catch (err) {
      logger.error({ err, taskId, task: task.name }, 'Task failed');
      await this.backend.finishTask(taskId, { error: toTaskError(err) });
    } finally {
      clearInterval(stopWatch);
    }
  }

  // ── Current task ────────────────────────────────────────────────────────

  /** The task executing in this call chain, or null outside a task. */
  async currentTask(): Promise<WeblabTask | null> {
    const running = currentRunningTask();
    if (!running) return null;
    return WeblabTask.load(this.backend, running.taskId, this.joinStepMs);
  }

  /** Whether someone asked the current task to stop. False outside a task. */
  async currentTaskStopping(): Promise<boolean> {
    const running = currentRunningTask();
    if (!running) return false;
    if (running.controller.signal.aborted) return true;

    const info = await this.backend.getTask(running.taskId);
    return info?.stopping ?? false;
  }

  /** Aborted once a stop request for the current task is seen. */
  currentTaskSignal(): AbortSignal | undefined {
    return currentRunningTask()?.controller.signal;
  }

  // ── Lookups (current session only) ──────────────────────────────────────

  /** A task of the current session by id; null when unknown or someone else's. */
  async getTask(taskId: string): Promise<WeblabTask | null> {
    const info = await this.backend.getTask(taskId);
    if (!info || info.sessionId !== currentSessionId()) return null;
    return WeblabTask.fromInfo(this.backend, info, this.joinStepMs);
  }

  /** First task of the current session running the given function. */
  async getTaskByName(reference: TaskReference): Promise<WeblabTask | null> {
    const [first] = await this.getTasks(reference);
    return first ?? null;
  }

  /** Every task of the current session, optionally only those of one function. */
  async getTasks(reference?: TaskReference): Promise<WeblabTask[]> {
    const sessionId = currentSessionId();
    if (sessionId === null) return [];
    return this.loadTasks(await this.backend.getAllTasks(sessionId), reference);
  }

  /** Unfinished tasks of the current session, optionally only those of one function. */
  async getRunningTasks(reference?: TaskReference): Promise<WeblabTask[]> {
    const sessionId = currentSessionId();
    if (sessionId === null) return [];
    return this.loadTasks(await this.backend.getUnfinishedTasks(sessionId), reference);
  }

  /** Any unfinished task of one function; handy with `unique` tasks. */
  async getRunningTask(reference: TaskReference): Promise<WeblabTask | null> {
    const [first] = await this.getRunningTasks(reference);
    return first ?? null;
  }

  /** Optionally stop, then wait for, every running task of one function. */
  async joinTasks(reference: TaskReference, options: { timeout?: number; stop?: boolean } = {}): Promise<void> {
    const tasks = await this.getRunningTasks(reference);

    if (options.stop) {
      for (const task of tasks) await task.stop();
    }

    const join: JoinOptions = { timeout: options.timeout, errorOnTimeout: false };
    for (const task of tasks) await task.join(join);
  }

  private async loadTasks(taskIds: string[], reference: TaskReference | undefined): Promise<WeblabTask[]> {
    const name = reference === undefined ? undefined : taskName(reference);
    const tasks: WeblabTask[] = [];

    for (const taskId of taskIds) {
      const info = await this.backend.getTask(taskId);
      // Expired in the meanwhile
      if (!info) continue;
      if (name !== undefined && info.name !== name) continue;
      tasks.push(WeblabTask.fromInfo(this.backend, info, this.joinStepMs));
    }
    return tasks;
  }
}
