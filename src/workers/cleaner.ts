import type { SessionManager } from '../session/session-manager.js';
import { BackgroundLoop } from './background-loop.js';

/** Disposes sessions the scheduler never disposed (timed out, exited or past their slot). */
export class CleanerLoop extends BackgroundLoop {
  constructor(
    private readonly sessions: SessionManager,
    intervalSeconds: number,
    number = 1,
  ) {
    super(`cleaner-${number}`, intervalSeconds * 1000);
  }

  protected async iterate(): Promise<void> {
    await this.sessions.cleanExpiredUsers();
  }
}
