import { Hono } from 'hono';
import { getEnv } from '../../config/env.js';
import type { SessionRegistry } from '../../sessions/SessionRegistry.js';
import type { WorkerPool } from '../../workers/WorkerPool.js';

export const SERVICE_VERSION = '0.1.0';

export function createHealthRoutes(deps: { pool: WorkerPool; registry: SessionRegistry }) {
  const health = new Hono();

  health.get('/', (c) => {
    return c.json({
      status: 'ok',
      service: 'inboxforge',
      version: SERVICE_VERSION,
      environment: getEnv().NODE_ENV,
      timestamp: new Date().toISOString(),
      workers: deps.pool.stats(),
      sessions_open: deps.registry.size,
    });
  });

  return health;
}
