import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '../shared/errors.js';
import { schedulerAuth } from '../shared/middleware/auth.js';
import { isJsonObject } from '../backend/store.js';
import type { Weblab } from '../weblab.js';

export const API_VERSION = '1';

/** Absolute callback base URL for a request, honouring a forced scheme. */
export function callbackBaseUrl(weblab: Weblab, req: Request): string {
  const scheme = weblab.settings.scheme ?? req.protocol;
  return `${scheme}://${req.get('host') ?? 'localhost'}${weblab.settings.callbackUrl}`;
}

/**
 * Routes the scheduler calls, mounted at `<base>/weblab/sessions`.
 *
 * Routes:
 *   GET   /api                API version (no credentials)
 *   GET   /test               credential check
 *   POST  /                   new user for the lab
 *   GET   /:id/status         seconds until the next check, or -1
 *   POST  /status/multiple    status of several sessions
 *   POST  /:id               `{ action: 'delete' }` disposes the session
 */
export function createSessionsRouter(weblab: Weblab): Router {
  const router = Router();

  router.use(schedulerAuth({ username: weblab.settings.username, password: weblab.settings.password }));
  // The scheduler does not always send a JSON content type
  router.use(express.json({ limit: '1mb', type: () => true }));

  router.get('/api', (_req: Request, res: Response) => {
    res.json({ api_version: API_VERSION });
  });

  router.get('/test', (_req: Request, res: Response) => {
    res.json({ valid: true });
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const result = await weblab.sessions.createSession(req.body, callbackBaseUrl(weblab, req));
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  router.post('/status/multiple', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const startedAt = Date.now();
      const body: unknown = req.body;
      const sessionIds = isJsonObject(body) ? body.session_ids : undefined;

      if (!Array.isArray(sessionIds)) {
        res.json({
          success: false,
          error_code: 'missing-parameters',
          error_human: 'session_ids expected in POST JSON',
        });
        return;
      }

      // Stop answering once the caller's budget (seconds) is spent
      const timeout = isJsonObject(body) ? Number(body.timeout) : NaN;
      const deadline = Number.isFinite(timeout) && timeout > 0 ? startedAt + timeout * 1000 : null;

      const status: Record<string, number> = {};
      for (const sessionId of sessionIds) {
        if (typeof sessionId !== 'string') continue;
        status[sessionId] = await weblab.sessions.statusTime(sessionId);
        if (deadline !== null && Date.now() > deadline) break;
      }

      res.json({ status });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:sessionId/status', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json({ should_finish: await weblab.sessions.statusTime(req.params.sessionId) });
    } catch (err) {
      next(err);
    }
  });

  router.post('/:sessionId', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: unknown = req.body;
      if (!isJsonObject(body) || body.action !== 'delete') {
        res.json({ message: 'Unknown op' });
        return;
      }

      await weblab.sessions.disposeUser(req.params.sessionId, true);
      res.json({ message: 'Deleted' });
    } catch (err) {
      if (err instanceof NotFoundError) {
        res.json({ message: 'Not found' });
        return;
      }
      next(err);
    }
  });

  return router;
}
