import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { createHealthHandler } from './shared/health.js';
import { errorHandler } from './shared/middleware/error-handler.js';
import { requestLogger } from './shared/middleware/request-logger.js';
import { createSessionsRouter } from './weblab/sessions-router.js';
import { createCallbackRouter } from './weblab/callback-router.js';
import { sessionContext } from './weblab/session-context.js';
import type { Weblab } from './weblab.js';

export interface AppDeps {
  weblab: Weblab;
  /** CORS origins, comma separated; `*` allows all. */
  corsOrigins?: string;
  /** Requests per minute and client on the public callback routes. */
  callbackRateLimit?: number;
  /** Lab routes, mounted after the lab plumbing and before the error handler. */
  lab?: express.Router;
}

const POWERED_BY = 'WebLab-Deusto unmanaged lab runtime';

// ─── CORS Configuration ─────────────────────────────────────────────────────

function buildCorsOptions(allowedOrigins: string | undefined): cors.CorsOptions {
  if (!allowedOrigins || allowedOrigins === '*') {
    return {}; // Allow all origins
  }
  const origins = allowedOrigins.split(',').map((o) => o.trim());
  return { origin: origins };
}

/**
 * Create the Express app: the scheduler routes under
 * `<baseUrl>/weblab/sessions`, the public callback routes, and the lab's
 * own routes, all inside the session context.
 */
export function createApp(deps: AppDeps): express.Express {
  const { weblab } = deps;
  const app = express();

  app.disable('x-powered-by');
  app.use((_req, res, next) => {
    res.setHeader('powered-by', POWERED_BY);
    next();
  });

  // CORS (before helmet so preflight works)
  app.use(cors(buildCorsOptions(deps.corsOrigins)));

  // Request logging
  app.use(requestLogger);

  // Strict security headers
  app.use(helmet());

  // JSON body parser with size limit
  app.use(express.json({ limit: '1mb' }));

  // Health check (no rate limiting, no auth)
  app.get('/health', createHealthHandler(weblab.backend));

  // Scheduler routes (basic auth inside)
  app.use(`${weblab.settings.baseUrl}/weblab/sessions`, createSessionsRouter(weblab));

  // Everything the browser reaches runs in its session
  app.use(sessionContext(weblab));

  const callbackRateLimit = rateLimit({
    windowMs: 60_000, // 1 minute
    max: deps.callbackRateLimit ?? 300,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
  });
  app.use(weblab.settings.callbackUrl, callbackRateLimit, createCallbackRouter(weblab));

  if (deps.lab) {
    app.use(deps.lab);
  }

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
