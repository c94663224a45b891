/**
 * Minimal lab: a light that users switch on and off through a task.
 *
 * Usage:
 *   WEBLAB_USERNAME=scheduler WEBLAB_PASSWORD=test-secret npx tsx examples/simple-lab.ts
 */
import dotenv from 'dotenv';
dotenv.config();

import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { createApp, getConfig, logger, requiresActive, startServer, validateEnv, Weblab } from '../src/index.js';

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception, shutting down');
  process.exit(1);
});

validateEnv();
const config = getConfig();

const weblab = Weblab.fromConfig();

weblab.initialUrl(() => '/lab/');

weblab.onStart(async (clientData) => {
  logger.info({ clientData }, 'New user');
  return { light: false };
});

weblab.onDispose(async () => {
  const user = await weblab.getUser();
  logger.info({ user: user.kind === 'anonymous' ? null : user.username }, 'Switching the light off');
});

const switchLight = weblab.task(
  async function switchLight(on: boolean) {
    // Hardware would be driven here
    return { light: on };
  },
  { unique: 'user' },
);

const lab = Router();

lab.get('/lab/', requiresActive(weblab), async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const user = await weblab.getUser();
    if (user.kind !== 'current') {
      res.status(403).end();
      return;
    }
    res.json({ user: user.username, data: user.data, timeLeft: user.timeLeft });
  } catch (err) {
    next(err);
  }
});

lab.post('/lab/light/:state', requiresActive(weblab), async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const task = await switchLight.delay(req.params.state === 'on');
    res.json({ taskId: task.taskId, status: task.status });
  } catch (err) {
    next(err);
  }
});

const app = createApp({
  weblab,
  lab,
  corsOrigins: config.corsOrigins,
  callbackRateLimit: config.callbackRateLimit,
});

await startServer(weblab, app, config.port);
