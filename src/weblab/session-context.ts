import path from 'node:path';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../shared/logger.js';
import { readSessionCookie } from '../shared/session-cookie.js';
import type { SessionCookieOptions } from '../shared/session-cookie.js';
import { runWithContext } from '../tasks/context.js';
import type { WeblabContext } from '../tasks/context.js';
import type { Weblab } from '../weblab.js';

export function sessionCookieOptions(weblab: Weblab): SessionCookieOptions {
  return {
    name: weblab.settings.sessionIdName,
    secret: weblab.settings.cookieSecret,
    secure: weblab.settings.scheme === 'https',
  };
}

/**
 * Binds the session of the request's cookie to everything the request runs.
 * Before the response goes out, modified user data is stored and, with
 * autopoll, the session is polled.
 */
export function sessionContext(weblab: Weblab): RequestHandler {
  const cookie = sessionCookieOptions(weblab);

  return (req: Request, res: Response, next: NextFunction): void => {
    const context: WeblabContext = { sessionId: readSessionCookie(req.headers.cookie, cookie) };
    if (context.sessionId !== null) {
      holdResponseUntilStored(weblab, context, res, next);
    }

    runWithContext(context, () => next());
  };
}

/**
 * Delays `res.end` until the session is updated, so the browser's next
 * request reads what this one wrote. A failed update goes to the error
 * handler in place of the lab's response.
 */
function holdResponseUntilStored(weblab: Weblab, context: WeblabContext, res: Response, next: NextFunction): void {
  const end = res.end;
  let held = false;

  res.end = (...args: unknown[]): Response => {
    if (held) return Reflect.apply(end, res, args);
    held = true;

    beforeResponse(weblab, context)
      .then(() => {
        Reflect.apply(end, res, args);
      })
      .catch((err: unknown) => {
        logger.error({ err, sessionId: context.sessionId }, 'Failed to update the session before responding');
        if (res.headersSent) {
          Reflect.apply(end, res, args);
          return;
        }
        next(err);
      });
    return res;
  };
}

async function beforeResponse(weblab: Weblab, context: WeblabContext): Promise<void> {
  if (context.sessionId === null) return;

  if (context.user) {
    await weblab.sessions.storeData(context.user);
  }
  if (weblab.settings.autopoll && !context.pollRequested) {
    await weblab.sessions.poll(context.sessionId);
  }
}

/** Redirect to the configured link, send the configured page, or a plain 403. */
export function sendForbidden(weblab: Weblab, res: Response): void {
  const { unauthorizedLink, unauthorizedPage } = weblab.settings;

  if (unauthorizedLink) {
    res.redirect(unauthorizedLink);
    return;
  }
  if (unauthorizedPage) {
    res.status(403).sendFile(path.resolve(unauthorizedPage));
    return;
  }
  res.status(403).type('text/plain').send('Access forbidden');
}

/** Lab routes for any user who came through the scheduler, even after their time is over. */
export function requiresLogin(weblab: Weblab): RequestHandler {
  return async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = await weblab.getUser();
      if (user.kind === 'anonymous') {
        sendForbidden(weblab, res);
        return;
      }
      next();
    } catch (err) {
      next(err);
    }
  };
}

/** Lab routes for active users only. Expired users are sent back to the scheduler. */
export function requiresActive(weblab: Weblab): RequestHandler {
  return async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = await weblab.getUser();
      if (user.kind === 'anonymous') {
        sendForbidden(weblab, res);
        return;
      }
      if (!user.active) {
        res.redirect(user.back);
        return;
      }
      next();
    } catch (err) {
      next(err);
    }
  };
}
