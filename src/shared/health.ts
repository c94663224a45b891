import type { Request, Response, RequestHandler } from 'express';
import type { WeblabBackend } from '../backend/store.js';

const startTime = Date.now();

/**
 * Health check handler.
 * Returns server status, uptime, memory usage and backend reachability;
 * answers 503 when the backend does not respond.
 */
export function createHealthHandler(backend: WeblabBackend): RequestHandler {
  return async (_req: Request, res: Response): Promise<void> => {
    const mem = process.memoryUsage();
    const reachable = await backend.ping();

    res.status(reachable ? 200 : 503).json({
      status: reachable ? 'ok' : 'degraded',
      version: process.env.npm_package_version ?? '0.1.0',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
      memory: {
        rss: Math.round(mem.rss / 1024 / 1024),
        heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
        heapTotal: Math.round(mem.heapTotal / 1024 / 1024),
      },
      backend: {
        kind: backend.kind,
        status: reachable ? 'connected' : 'disconnected',
      },
    });
  };
}
