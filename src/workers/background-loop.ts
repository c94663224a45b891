import { logger } from '../shared/logger.js';
import { sleep } from '../shared/time.js';
import { isConnectionError } from '../backend/index.js';

/** Sleeps are cut in steps this long so `stop()` is honoured quickly. */
export const LOOP_STEP_MS = 50;
/** Pause after the backend was unreachable. */
export const CONNECTION_BACKOFF_MS = 5_000;

/**
 * A named async loop: run one iteration, sleep, repeat until stopped.
 * Errors are logged and never end the loop.
 */
export abstract class BackgroundLoop {
  private stopping = false;
  private running: Promise<void> | null = null;

  constructor(
    readonly name: string,
    private readonly intervalMs: number,
  ) {}

  protected abstract iterate(): Promise<void>;

  get isRunning(): boolean {
    return this.running !== null;
  }

  protected get shouldStop(): boolean {
    return this.stopping;
  }

  start(): void {
    if (this.running) return;
    this.stopping = false;
    this.running = this.run().finally(() => {
      this.running = null;
    });
    logger.debug({ loop: this.name }, 'Background loop started');
  }

  /**
   * Ask the loop to stop and wait until it has exited. An iteration in
   * progress runs to its end; pauses are cut short.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    await this.running;
  }

  private async run(): Promise<void> {
    while (!this.stopping) {
      let pauseMs = this.intervalMs;
      try {
        await this.iterate();
      } catch (err) {
        if (isConnectionError(err)) {
          logger.error({ err, loop: this.name }, 'Backend unreachable; backing off');
          pauseMs = CONNECTION_BACKOFF_MS;
        } else {
          logger.error({ err, loop: this.name }, 'Background loop iteration failed');
        }
      }
      await this.pause(pauseMs);
    }
    logger.debug({ loop: this.name }, 'Background loop stopped');
  }

  private async pause(ms: number): Promise<void> {
    for (let waited = 0; waited < ms && !this.stopping; waited += LOOP_STEP_MS) {
      await sleep(Math.min(LOOP_STEP_MS, ms - waited));
    }
  }
}
