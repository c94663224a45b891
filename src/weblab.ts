import { logger } from './shared/logger.js';
import { InvalidConfigError } from './shared/errors.js';
import { createToken } from './shared/token.js';
import { defaultSettings, getConfig } from './config/config-manager.js';
import type { WeblabSettings } from './config/config-manager.js';
import { createBackend } from './backend/index.js';
import type { JsonValue, WeblabBackend } from './backend/store.js';
import { HookRegistry } from './session/hooks.js';
import type { DisposeHook, InitialUrlHook, StartHook } from './session/hooks.js';
import { SessionManager } from './session/session-manager.js';
import { currentContext, currentSessionId } from './tasks/context.js';
import { TaskManager } from './tasks/task-manager.js';
import type { TaskFunction, TaskOptions, TaskReference, TaskResult } from './tasks/task-manager.js';
import type { WeblabTask } from './tasks/task.js';
import type { UserLoader, WeblabUser } from './users/users.js';
import type { BackgroundLoop } from './workers/background-loop.js';
import { CleanerLoop } from './workers/cleaner.js';
import { TaskRunner } from './workers/task-runner.js';

export interface WeblabOptions {
  /** Overrides on top of the defaults. */
  settings?: Partial<WeblabSettings>;
  /** Defaults to Redis when `redisUrl` is set, in-memory otherwise. */
  backend?: WeblabBackend;
}

/**
 * One laboratory: its settings, backend, hooks, tasks and background loops.
 *
 * ```ts
 * const weblab = new Weblab({ settings: { username: 'scheduler', password: 'test-secret' } });
 * weblab.initialUrl(() => '/lab/');
 * weblab.onStart(async (clientData) => ({ light: false }));
 * const toggle = weblab.task(async function toggle(state: boolean) { return !state; });
 * ```
 */
export class Weblab {
  readonly settings: WeblabSettings;
  readonly backend: WeblabBackend;
  readonly hooks = new HookRegistry();
  readonly sessions: SessionManager;
  readonly tasks: TaskManager;

  private loops: BackgroundLoop[] = [];
  private started = false;
  private loopAbort: AbortController | null = null;

  constructor(options: WeblabOptions = {}) {
    this.settings = defaultSettings(options.settings);

    if (!this.settings.callbackUrl) {
      throw new InvalidConfigError(
        'Empty URL. Either provide it in the constructor or in the WEBLAB_CALLBACK_URL configuration',
      );
    }
    // The scheduler authenticates with this pair
    if (!this.settings.username) {
      throw new InvalidConfigError('Invalid configuration. Missing WEBLAB_USERNAME');
    }
    if (!this.settings.password) {
      throw new InvalidConfigError('Invalid configuration. Missing WEBLAB_PASSWORD');
    }

    this.backend = options.backend ?? createBackend(this.settings);
    this.sessions = new SessionManager({ backend: this.backend, settings: this.settings, hooks: this.hooks });
    this.tasks = new TaskManager({ backend: this.backend, joinStepMs: this.settings.joinStepMs });
  }

  /** A lab configured from the environment. */
  static fromConfig(overrides: Partial<WeblabSettings> = {}): Weblab {
    return new Weblab({ settings: { ...getConfig().weblab, ...overrides } });
  }

  // ── Hooks ───────────────────────────────────────────────────────────────

  /** Called when the scheduler sends a user. Returning an object sets the session data. */
  onStart(hook: StartHook): StartHook {
    this.hooks.setOnStart(hook);
    return hook;
  }

  /** Called once when the session ends, however it ends. */
  onDispose(hook: DisposeHook): DisposeHook {
    this.hooks.setOnDispose(hook);
    return hook;
  }

  /** Where users land after the callback URL. Required. */
  initialUrl(hook: InitialUrlHook): InitialUrlHook {
    this.hooks.setInitialUrl(hook);
    return hook;
  }

  userLoader(loader: UserLoader): UserLoader {
    this.hooks.setUserLoader(loader);
    return loader;
  }

  task<A extends JsonValue[], R extends TaskResult>(
    fn: (...args: A) => R | Promise<R>,
    options?: TaskOptions,
  ): TaskFunction<A, R> {
    return this.tasks.register(fn, options);
  }

  // ── Current session ─────────────────────────────────────────────────────

  currentSessionId(): string | null {
    return currentSessionId();
  }

  /**
   * The user of the current request or task. Cached for the rest of the
   * request unless `cached` is false, which re-reads the backend.
   */
  async getUser(options: { cached?: boolean } = {}): Promise<WeblabUser> {
    const context = currentContext();
    if (options.cached !== false && context?.user) return context.user;

    const user = await this.sessions.getUser(currentSessionId());
    if (context) context.user = user;
    return user;
  }

  /** Refresh the current session's last poll. */
  async poll(): Promise<void> {
    const sessionId = currentSessionId();
    if (sessionId === null) return;

    await this.sessions.poll(sessionId);
    const context = currentContext();
    if (context) context.pollRequested = true;
  }

  /** End the current session from the lab side. */
  async logout(): Promise<void> {
    const sessionId = currentSessionId();
    if (sessionId !== null) await this.sessions.forceExit(sessionId);
  }

  // ── Tasks ───────────────────────────────────────────────────────────────

  currentTask(): Promise<WeblabTask | null> {
    return this.tasks.currentTask();
  }

  currentTaskStopping(): Promise<boolean> {
    return this.tasks.currentTaskStopping();
  }

  currentTaskSignal(): AbortSignal | undefined {
    return this.tasks.currentTaskSignal();
  }

  getTask(taskId: string): Promise<WeblabTask | null> {
    return this.tasks.getTask(taskId);
  }

  getTaskByName(reference: TaskReference): Promise<WeblabTask | null> {
    return this.tasks.getTaskByName(reference);
  }

  getTasks(reference?: TaskReference): Promise<WeblabTask[]> {
    return this.tasks.getTasks(reference);
  }

  getRunningTasks(reference?: TaskReference): Promise<WeblabTask[]> {
    return this.tasks.getRunningTasks(reference);
  }

  getRunningTask(reference: TaskReference): Promise<WeblabTask | null> {
    return this.tasks.getRunningTask(reference);
  }

  joinTasks(reference: TaskReference, options?: { timeout?: number; stop?: boolean }): Promise<void> {
    return this.tasks.joinTasks(reference, options);
  }

  /** One runner sweep, for labs that schedule task execution themselves. */
  runTasks(): Promise<void> {
    return this.tasks.runTasks();
  }

  /** One expiration sweep. */
  cleanExpiredUsers(): Promise<void> {
    return this.sessions.cleanExpiredUsers();
  }

  createToken(size?: number): string {
    return createToken(size);
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  /** Start the background loops the settings ask for. */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    await this.tasks.start();

    if (this.settings.autocleanThread) {
      this.loops.push(new CleanerLoop(this.sessions, this.settings.cleanerIntervalSeconds));
    }
    for (let number = 1; number <= this.settings.taskThreads; number++) {
      this.loops.push(new TaskRunner(this.tasks, number));
    }

    for (const loop of this.loops) loop.start();
    logger.info(
      { cleaner: this.settings.autocleanThread, taskRunners: this.settings.taskThreads },
      'Laboratory started',
    );
  }

  /**
   * Stop every loop and wait for them to exit. No runner claims a task after
   * this is called, but a task already running is waited for: call
   * `joinTasks(name, { stop: true })` first for tasks that watch their stop
   * signal, or expect `stop()` to take as long as the longest running task.
   */
  async stop(): Promise<void> {
    this.loopAbort?.abort();
    const loops = this.loops;
    this.loops = [];
    await Promise.all(loops.map((loop) => loop.stop()));
    this.started = false;
  }

  /** Stop, then release the backend. */
  async close(): Promise<void> {
    await this.stop();
    await this.backend.close();
  }

  /**
   * Standalone runner process: `workers` task runners and cleaners until
   * `stop()` is called or the process gets SIGTERM/SIGINT.
   */
  async loop(workers: number): Promise<void> {
    // Set before the first await so a `stop()` right after `loop()` is not lost
    const abort = new AbortController();
    this.loopAbort = abort;

    await this.tasks.start();

    const loops: BackgroundLoop[] = [];
    for (let number = 1; number <= workers; number++) {
      loops.push(new TaskRunner(this.tasks, number));
      loops.push(new CleanerLoop(this.sessions, this.settings.cleanerIntervalSeconds, number));
    }
    for (const loop of loops) loop.start();
    logger.info({ workers }, 'Running task loop');

    const onSignal = (signal: NodeJS.Signals): void => {
      logger.info({ signal }, 'Stopping task loop');
      abort.abort();
    };
    process.once('SIGTERM', onSignal);
    process.once('SIGINT', onSignal);

    try {
      if (!abort.signal.aborted) {
        await new Promise<void>((resolve) => {
          abort.signal.addEventListener('abort', () => resolve(), { once: true });
        });
      }
    } finally {
      process.off('SIGTERM', onSignal);
      process.off('SIGINT', onSignal);
      this.loopAbort = null;
      await Promise.all(loops.map((loop) => loop.stop()));
      logger.info('Task loop stopped');
    }
  }
}
