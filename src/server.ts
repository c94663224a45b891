import type { Server } from 'node:http';
import type { Express } from 'express';
import { logger } from './shared/logger.js';
import type { Weblab } from './weblab.js';

const SHUTDOWN_TIMEOUT_MS = 10_000;

export interface RunningServer {
  server: Server;
  /** Stop the loops, release the backend and close the server. */
  shutdown: (signal: string) => Promise<void>;
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Start the lab's loops, listen on `port`, and shut everything down on
 * SIGTERM/SIGINT.
 */
export async function startServer(weblab: Weblab, app: Express, port: number): Promise<RunningServer> {
  await weblab.start();

  const server = app.listen(port, () => {
    logger.info({ port, callbackUrl: weblab.settings.callbackUrl }, 'Laboratory server started');
  });

  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received');

    // Give in-flight requests and tasks time to finish
    const forceExit = setTimeout(() => {
      logger.warn('Forceful shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    // Don't keep process alive just for the timer
    forceExit.unref();

    try {
      await closeServer(server);
      logger.info('HTTP server closed');
      await weblab.close();
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }

    logger.info('Graceful shutdown complete');
    process.exit(0);
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  return { server, shutdown };
}
