import { serve } from '@hono/node-server';
import { createApp } from './api/server.js';
import { PlaywrightLauncher } from './browser/playwright.js';
import { getEnv, loadDetectionRules, loadDriverConfig } from './config/index.js';
import { SignupDriver } from './engine/SignupDriver.js';
import { errorMessage } from './errors.js';
import { ArtifactStore } from './jobs/ArtifactStore.js';
import { JobOrchestrator } from './jobs/JobOrchestrator.js';
import { getLogger } from './monitoring/logger.js';
import { SessionRegistry } from './sessions/SessionRegistry.js';
import { WorkerPool } from './workers/WorkerPool.js';

/**
 * Service entry point
 *
 * 1. Validates the environment and loads detection rules
 * 2. Wires the registry, worker pool, signup driver and orchestrator
 * 3. Serves the HTTP API on IF_API_PORT
 * 4. On SIGINT/SIGTERM closes every open browser, then exits
 */
async function main(): Promise<void> {
  const logger = getLogger({ service: 'main' });
  const env = getEnv();
  const config = loadDriverConfig(env);
  const rules = loadDetectionRules(env.IF_DETECTION_RULES_PATH);

  const artifacts = new ArtifactStore(config.storageDir);
  const registry = new SessionRegistry();
  const pool = new WorkerPool(env.IF_WORKER_CONCURRENCY);
  const driver = new SignupDriver({
    launcher: new PlaywrightLauncher(),
    registry,
    artifacts,
    config,
    rules,
  });
  const orchestrator = new JobOrchestrator({
    driver,
    registry,
    pool,
    artifacts,
    emailDomain: env.IF_EMAIL_DOMAIN,
    passwordLength: env.IF_PASSWORD_LENGTH,
  });

  const app = createApp({ orchestrator, registry, pool, corsOrigin: env.CORS_ORIGIN });
  const server = serve({ fetch: app.fetch, port: env.IF_API_PORT }, (info) => {
    logger.info('API listening', { port: info.port, storage: artifacts.root, concurrency: env.IF_WORKER_CONCURRENCY });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn('Received second signal, exiting immediately', { signal });
      process.exit(1);
    }
    shuttingDown = true;
    logger.info('Received signal, closing open browsers', { signal, sessionsOpen: registry.size });

    server.close();
    await orchestrator.shutdown();
    logger.info('Shut down cleanly');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  });
}

main().catch((err) => {
  getLogger().error('Fatal startup error', { error: errorMessage(err) });
  process.exit(1);
});
