import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../logger.js';
import { parseBasicAuth, safeCompare } from '../security.js';

export interface SchedulerCredentials {
  username: string;
  password: string;
}

const CHALLENGE = 'Basic realm="Login Required"';

/**
 * HTTP Basic authentication of the scheduler, with the credential pair it
 * shares with the lab. `/api` stays public; `/test` answers in JSON so the
 * scheduler can show why the check failed.
 */
export function schedulerAuth(expected: SchedulerCredentials): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.path.endsWith('/api')) {
      next();
      return;
    }

    const provided = parseBasicAuth(req.headers.authorization);
    // Both compared so the failure takes the same time either way
    const usernameMatches = safeCompare(provided?.username ?? '', expected.username);
    const passwordMatches = safeCompare(provided?.password ?? '', expected.password);

    if (provided && usernameMatches && passwordMatches) {
      next();
      return;
    }

    res.setHeader('WWW-Authenticate', CHALLENGE);

    if (req.path.endsWith('/test')) {
      const message = provided?.username
        ? 'Invalid credentials: wrong username provided. Check the lab logs for further information.'
        : 'Invalid credentials: no username provided';
      res.status(401).json({ valid: false, error_messages: [message] });
      return;
    }

    logger.warn(
      { url: req.originalUrl, username: provided?.username ?? null },
      'Invalid scheduler credentials',
    );
    res.status(401).type('text/plain').send("You don't seem to be a WebLab-Instance");
  };
}
