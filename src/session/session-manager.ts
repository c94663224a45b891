import { logger } from '../shared/logger.js';
import { NotFoundError, ValidationError } from '../shared/errors.js';
import { createToken } from '../shared/token.js';
import { currentTimestamp, sleep } from '../shared/time.js';
import { isJsonObject } from '../backend/store.js';
import type { SessionFields, WeblabBackend } from '../backend/store.js';
import type { WeblabSettings } from '../config/config-manager.js';
import { runWithContext } from '../tasks/context.js';
import { AnonymousUser, CurrentUser, toWeblabUser } from '../users/users.js';
import type { WeblabUser } from '../users/users.js';
import { parseStartRequest } from './start-request.js';
import type { StartRequest } from './start-request.js';
import type { HookRegistry } from './hooks.js';

export type StartSessionResult =
  | { url: string; session_id: string }
  | { error: true; message: string };

/** Status answer while another process is still disposing the session. */
export const STATUS_DISPOSING = 2;
/** Status answer meaning "stop polling, the session is over". */
export const STATUS_FINISHED = -1;

const DRAIN_STEP_MS = 100;
/** Grace added to the slot length before the active record expires on its own. */
const ACTIVE_RECORD_GRACE_SECONDS = 30;

export interface SessionManagerDeps {
  backend: WeblabBackend;
  settings: WeblabSettings;
  hooks: HookRegistry;
}

/**
 * Session lifecycle: Current from creation, Expired once disposed (or timed
 * out), gone when the inactive record expires. There is no in-process lock;
 * every transition relies on the backend's atomic round trips.
 */
export class SessionManager {
  private readonly backend: WeblabBackend;
  private readonly settings: WeblabSettings;
  private readonly hooks: HookRegistry;

  constructor(deps: SessionManagerDeps) {
    this.backend = deps.backend;
    this.settings = deps.settings;
    this.hooks = deps.hooks;
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  async getUser(sessionId: string | null): Promise<WeblabUser> {
    if (sessionId === null) return new AnonymousUser();
    return toWeblabUser(await this.backend.getUser(sessionId), this.hooks.userLoader);
  }

  async sessionExists(sessionId: string): Promise<boolean> {
    return this.backend.sessionExists(sessionId);
  }

  /**
   * Seconds until the scheduler should ask again, capped by the poll
   * interval; `STATUS_FINISHED` when the session is over and
   * `STATUS_DISPOSING` while its resources are still being released.
   */
  async statusTime(sessionId: string): Promise<number> {
    const user = await this.getUser(sessionId);

    if (user.kind === 'expired' && user.disposingResources) return STATUS_DISPOSING;
    if (user.kind !== 'current') return STATUS_FINISHED;
    if (user.exited) return STATUS_FINISHED;

    const timeout = this.settings.timeoutSeconds;
    // A timeout <= 0 never expires on polling (only on exit or max date)
    if (timeout > 0 && user.timeWithoutPolling >= timeout) return STATUS_FINISHED;

    const timeLeft = user.timeLeft;
    if (timeLeft <= 0) return STATUS_FINISHED;

    return Math.min(this.settings.pollIntervalSeconds, Math.floor(timeLeft));
  }

  // ── Mutations ───────────────────────────────────────────────────────────

  /**
   * Register the user the scheduler is sending and run the start hook.
   * `callbackBase` is the public callback URL the session id is appended to.
   */
  async createSession(body: unknown, callbackBase: string): Promise<StartSessionResult> {
    let request: StartRequest;
    try {
      request = parseStartRequest(body);
    } catch (err) {
      if (err instanceof ValidationError) {
        logger.warn({ err }, 'Invalid start request');
        return { error: true, message: err.message };
      }
      throw err;
    }

    const sessionId = createToken();
    const fields: SessionFields = {
      sessionId,
      back: request.back,
      lastPoll: currentTimestamp(),
      maxDate: request.maxDate,
      startDate: request.startDate,
      username: request.username,
      usernameUnique: request.usernameUnique,
      fullName: request.fullName,
      locale: request.locale,
      experimentName: request.experimentName,
      categoryName: request.categoryName,
      experimentId: request.experimentId,
      exited: false,
      data: {},
      requestClientData: request.clientData,
      requestServerData: request.serverData,
    };

    await this.backend.addUser(sessionId, fields, ACTIVE_RECORD_GRACE_SECONDS + Math.floor(request.slotLength));
    const user = new CurrentUser(structuredClone(fields), this.hooks.userLoader);
    logger.info({ sessionId, username: request.usernameUnique, experiment: request.experimentId }, 'Session created');

    const onStart = this.hooks.onStart;
    if (onStart) {
      try {
        const data = await runWithContext({ sessionId, user }, () =>
          onStart(request.clientData, request.serverData),
        );
        if (isJsonObject(data)) user.data = data;
        await this.storeData(user);
      } catch (err) {
        logger.error({ err, sessionId }, 'Start hook failed');
        try {
          await this.disposeUser(sessionId, true);
        } catch (disposeErr) {
          logger.error({ err: disposeErr, sessionId }, 'Disposal after a failed start failed too');
        }
        return { error: true, message: 'Error initializing laboratory' };
      }
    }

    return { url: `${callbackBase}/${sessionId}`, session_id: sessionId };
  }

  /**
   * Dispose a session. The caller that wins the Current → Expired transition
   * runs the dispose hook, stops and drains the session's tasks, then drops
   * the existence marker. Anyone else returns at once, or with `waiting`,
   * once the winner (possibly in another process) is done.
   *
   * @throws NotFoundError when the session does not exist at all
   */
  async disposeUser(sessionId: string, waiting: boolean): Promise<void> {
    const user = await this.getUser(sessionId);
    if (user.kind === 'anonymous') {
      throw new NotFoundError(`Session ${sessionId} not found`);
    }

    if (user.kind === 'current') {
      const deleted = await this.backend.deleteUser(sessionId, user.toExpiredFields());
      if (deleted) {
        await this.releaseResources(user);
      }
    }

    if (waiting) {
      while (!(await this.backend.isSessionDeleted(sessionId))) {
        await sleep(DRAIN_STEP_MS);
      }
    }
  }

  private async releaseResources(user: CurrentUser): Promise<void> {
    const sessionId = user.sessionId;
    logger.info({ sessionId }, 'Disposing session');

    const onDispose = this.hooks.onDispose;
    if (onDispose) {
      try {
        await runWithContext({ sessionId, user }, () => onDispose());
        await this.storeData(user);
      } catch (err) {
        logger.error({ err, sessionId }, 'Dispose hook failed');
      }
    }

    try {
      let unfinished = await this.backend.getUnfinishedTasks(sessionId);
      for (const taskId of unfinished) {
        await this.backend.requestStopTask(taskId);
      }

      while (unfinished.length > 0) {
        await sleep(DRAIN_STEP_MS);
        unfinished = await this.backend.getUnfinishedTasks(sessionId);
      }
    } finally {
      // Cleared only now, so the scheduler keeps hearing "disposing" until tasks are drained
      await this.backend.finishedDispose(sessionId);
    }

    await this.backend.cleanSessionTasks(sessionId);
    await this.backend.reportSessionDeleted(sessionId);
    logger.info({ sessionId }, 'Session disposed');
  }

  /** Dispose every active session that is over. One failure never stops the sweep. */
  async cleanExpiredUsers(): Promise<void> {
    const expired = await this.backend.findExpiredSessions(this.settings.timeoutSeconds);

    for (const sessionId of expired) {
      try {
        await this.disposeUser(sessionId, false);
      } catch (err) {
        // Another sweep got there first
        if (err instanceof NotFoundError) continue;
        logger.error({ err, sessionId }, 'Failed to dispose expired session');
      }
    }
  }

  async poll(sessionId: string): Promise<void> {
    await this.backend.poll(sessionId);
  }

  /** The user left: the next status answer is `STATUS_FINISHED`. */
  async forceExit(sessionId: string): Promise<void> {
    await this.backend.forceExit(sessionId);
    logger.info({ sessionId }, 'User logged out');
  }

  /** Persist the user's data if it changed since it was loaded or last stored. */
  async storeData(user: WeblabUser): Promise<void> {
    if (user.kind !== 'current' || !user.isDataModified()) return;

    await this.backend.updateData(user.sessionId, user.data);
    user.markDataStored();
  }
}
