import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { JobOrchestrator } from '../jobs/JobOrchestrator.js';
import { requestLoggingMiddleware } from '../monitoring/logger.js';
import type { SessionRegistry } from '../sessions/SessionRegistry.js';
import type { WorkerPool } from '../workers/WorkerPool.js';
import { errorHandler } from './middleware/index.js';
import { createHealthRoutes } from './routes/health.js';
import { createJobRoutes } from './routes/jobs.js';

export interface AppDeps {
  orchestrator: JobOrchestrator;
  registry: SessionRegistry;
  pool: WorkerPool;
  corsOrigin?: string;
}

/**
 * Create and configure the Hono API application.
 * Used by the process entry point and directly by tests via `app.request()`.
 */
export function createApp(deps: AppDeps) {
  const app = new Hono();

  // ─── Global Middleware ─────────────────────────────────────────

  app.use('*', requestLoggingMiddleware());

  app.use('*', cors({
    origin: deps.corsOrigin ?? '*',
    allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
    maxAge: 86400,
  }));

  // ─── Error Handler ─────────────────────────────────────────────

  app.onError(errorHandler);

  // ─── Routes ────────────────────────────────────────────────────

  app.route('/health', createHealthRoutes({ pool: deps.pool, registry: deps.registry }));
  app.route('/jobs', createJobRoutes(deps.orchestrator));

  // ─── 404 Fallback ─────────────────────────────────────────────

  app.notFound((c) => {
    return c.json({ error: 'not_found', message: 'Route not found' }, 404);
  });

  return app;
}
