import type { TaskManager } from '../tasks/task-manager.js';
import { BackgroundLoop } from './background-loop.js';

const TASK_RUNNER_INTERVAL_MS = 1_000;

/** Claims and runs submitted tasks. Several may run side by side, in one process or many. */
export class TaskRunner extends BackgroundLoop {
  constructor(
    private readonly tasks: TaskManager,
    number: number,
    intervalMs = TASK_RUNNER_INTERVAL_MS,
  ) {
    super(`task-runner-${number}`, intervalMs);
  }

  protected async iterate(): Promise<void> {
    await this.tasks.runTasks(() => this.shouldStop);
  }
}
