import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { logger } from '../shared/logger.js';
import { serializeSessionCookie } from '../shared/session-cookie.js';
import type { Weblab } from '../weblab.js';
import { sendForbidden, sessionCookieOptions } from './session-context.js';

/**
 * Public routes for the user's browser, mounted at the callback URL. The
 * session id in the path is the secret; no credentials are checked.
 *
 * Routes:
 *   GET  /:id          bind the browser to the session, go to the lab
 *   GET  /:id/poll     the browser is still there
 *   GET  /:id/logout   the user left
 */
export function createCallbackRouter(weblab: Weblab): Router {
  const router = Router();
  const cookie = sessionCookieOptions(weblab);

  router.get('/:sessionId', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const initialUrl = weblab.hooks.initialUrl;
      if (!initialUrl) {
        logger.error('No initial URL registered: call weblab.initialUrl() to say where users go');
        res.status(500).type('text/plain').send("ERROR: laboratory not properly configured, didn't call initialUrl");
        return;
      }

      const { sessionId } = req.params;
      if (!(await weblab.sessions.sessionExists(sessionId))) {
        sendForbidden(weblab, res);
        return;
      }

      res.setHeader('Set-Cookie', serializeSessionCookie(sessionId, cookie));
      res.redirect(initialUrl());
    } catch (err) {
      next(err);
    }
  });

  router.get('/:sessionId/poll', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { sessionId } = req.params;
      if (weblab.currentSessionId() !== sessionId) {
        res.json({ success: false, reason: 'Different session identifier' });
        return;
      }
      if (!(await weblab.sessions.sessionExists(sessionId))) {
        res.json({ success: false, reason: 'Not found' });
        return;
      }

      const user = await weblab.getUser();
      if (!user.active) {
        res.json({ success: false, reason: 'User inactive' });
        return;
      }

      await weblab.poll();
      res.json({ success: true });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:sessionId/logout', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      if (weblab.currentSessionId() !== req.params.sessionId) {
        res.json({ success: false, reason: 'Different session identifier' });
        return;
      }

      await weblab.logout();
      res.json({ success: true });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
