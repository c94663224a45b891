import { AsyncLocalStorage } from 'node:async_hooks';
import type { WeblabUser } from '../users/users.js';

/** The task executing in the current async call chain. */
export interface RunningTaskContext {
  taskId: string;
  name: string;
  /** Aborted once the runner sees a stop request for this task. */
  controller: AbortController;
}

/**
 * "Who am I acting as": bound per HTTP request by the session middleware and
 * per task by the runner. Nothing here is shared between concurrent requests.
 */
export interface WeblabContext {
  sessionId: string | null;
  /** Cached for the lifetime of the request so data edits are not lost. */
  user?: WeblabUser;
  task?: RunningTaskContext;
  /** Set once the session was polled, so the request does not poll it again. */
  pollRequested?: boolean;
}

const contextStorage = new AsyncLocalStorage<WeblabContext>();

export function runWithContext<T>(context: WeblabContext, fn: () => T): T {
  return contextStorage.run(context, fn);
}

export function currentContext(): WeblabContext | undefined {
  return contextStorage.getStore();
}

export function currentSessionId(): string | null {
  return contextStorage.getStore()?.sessionId ?? null;
}

export function currentRunningTask(): RunningTaskContext | undefined {
  return contextStorage.getStore()?.task;
}
