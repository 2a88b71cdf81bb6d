/**
 * HTTP surface, exercised through Hono's app.request() with the real
 * orchestrator and signup driver over the mock browser.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { z } from 'zod';
import { createApp } from '../../../src/api/server.js';
import { MockBrowserLauncher, type MockPage } from '../../../src/browser/mock.js';
import { SignupDriver } from '../../../src/engine/SignupDriver.js';
import { ArtifactStore } from '../../../src/jobs/ArtifactStore.js';
import { JobOrchestrator } from '../../../src/jobs/JobOrchestrator.js';
import { isSettled } from '../../../src/jobs/types.js';
import { Logger } from '../../../src/monitoring/logger.js';
import { SessionRegistry } from '../../../src/sessions/SessionRegistry.js';
import { WorkerPool } from '../../../src/workers/WorkerPool.js';
import { CAPTCHA_PAGE, SUCCESS_PAGE, driverConfig, signupFlow } from '../../helpers/signupPages.js';

// ── Response shapes ────────────────────────────────────────────────────────

const CreatedSchema = z.object({ job_id: z.string().uuid(), status: z.literal('queued'), email: z.string() });
const BatchSchema = z.object({ jobs: z.array(CreatedSchema) });
const LogsSchema = z.object({ job_id: z.string(), logs: z.array(z.object({ step: z.string() })) });

// ── Helpers ────────────────────────────────────────────────────────────────

function post(body?: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  };
}

describe('Jobs API', () => {
  let dir: string;
  let registry: SessionRegistry;
  const logger = new Logger({ level: 'error' });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'inboxforge-api-'));
    registry = new SessionRegistry();
  });

  afterEach(async () => {
    await registry.releaseAll();
    rmSync(dir, { recursive: true, force: true });
  });

  function buildApp(finalPage: MockPage) {
    const artifacts = new ArtifactStore(dir);
    const pool = new WorkerPool(2);
    const launcher = new MockBrowserLauncher({ session: signupFlow(finalPage) });
    const orchestrator = new JobOrchestrator({
      driver: new SignupDriver({ launcher, registry, artifacts, config: driverConfig(dir), logger }),
      registry,
      pool,
      artifacts,
      logger,
    });
    return { app: createApp({ orchestrator, registry, pool }), orchestrator, launcher, pool };
  }

  async function createJob(app: ReturnType<typeof buildApp>['app'], curp = 'ABCD010101HDFXXX01') {
    const res = await app.request('/jobs', post({ curp }));
    expect(res.status).toBe(202);
    return CreatedSchema.parse(await res.json());
  }

  // ── POST /jobs ────────────────────────────────────────────────────

  describe('POST /jobs', () => {
    test('accepts a job and returns 202 with the derived email', async () => {
      const { app } = buildApp(SUCCESS_PAGE);
      const created = await createJob(app);
      expect(created.email).toMatch(/^abcd[0-9]{3}@outlook\.com$/);
    });

    test('rejects a missing curp with 422 and field details', async () => {
      const { app } = buildApp(SUCCESS_PAGE);

      const res = await app.request('/jobs', post({}));

      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({
        error: 'validation_error',
        details: [{ field: 'curp', message: 'Required', code: 'invalid_type' }],
      });
    });

    test('rejects a blank curp', async () => {
      const { app } = buildApp(SUCCESS_PAGE);
      const res = await app.request('/jobs', post({ curp: '   ' }));
      expect(res.status).toBe(422);
    });

    test('rejects a body that is not JSON with 400', async () => {
      const { app } = buildApp(SUCCESS_PAGE);

      const res = await app.request('/jobs', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{ nope',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'bad_request', message: 'Invalid JSON body' });
    });
  });

  describe('POST /jobs/batch', () => {
    test('accepts several jobs at once', async () => {
      const { app } = buildApp(SUCCESS_PAGE);

      const res = await app.request('/jobs/batch', post({ curps: ['AAAA01', 'BBBB02'] }));

      expect(res.status).toBe(202);
      const body = BatchSchema.parse(await res.json());
      expect(body.jobs.map((j) => j.email.slice(0, 4))).toEqual(['aaaa', 'bbbb']);
    });

    test('rejects more than twenty entries', async () => {
      const { app } = buildApp(SUCCESS_PAGE);
      const curps = Array.from({ length: 21 }, (_, i) => `CURP${i}`);

      const res = await app.request('/jobs/batch', post({ curps }));

      expect(res.status).toBe(422);
      const body = z.object({ details: z.array(z.object({ field: z.string(), code: z.string() })) }).parse(
        await res.json(),
      );
      expect(body.details[0]).toEqual({ field: 'curps', code: 'too_big' });
    });
  });

  // ── GET /jobs ─────────────────────────────────────────────────────

  describe('GET /jobs/:id', () => {
    test('returns the full job view once settled', async () => {
      const { app, orchestrator } = buildApp(SUCCESS_PAGE);
      const created = await createJob(app);
      await orchestrator.waitForStatus(created.job_id, isSettled);

      const res = await app.request(`/jobs/${created.job_id}`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        job_id: created.job_id,
        curp: 'ABCD010101HDFXXX01',
        email: created.email,
        status: 'completed',
        browser_open: false,
        last_outcome: 'success',
        error: null,
        created_account: { email: created.email, creation_status: 'success' },
        screenshot_ref: join(dir, `${created.job_id}_success.png`),
      });
    });

    test('404 for an unknown id', async () => {
      const { app } = buildApp(SUCCESS_PAGE);

      const res = await app.request('/jobs/missing');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'not_found', message: 'Job missing not found' });
    });

    test('GET /jobs/:id/logs returns the trace in order', async () => {
      const { app, orchestrator } = buildApp(SUCCESS_PAGE);
      const created = await createJob(app);
      await orchestrator.waitForStatus(created.job_id, isSettled);

      const res = await app.request(`/jobs/${created.job_id}/logs`);
      const body = LogsSchema.parse(await res.json());

      expect(body.job_id).toBe(created.job_id);
      expect(body.logs[0]?.step).toBe('gen_credentials');
      expect(body.logs.at(-1)?.step).toBe('session_released');
    });

    test('GET /jobs lists every job', async () => {
      const { app, orchestrator } = buildApp(SUCCESS_PAGE);
      const created = await createJob(app);
      await orchestrator.waitForStatus(created.job_id, isSettled);

      const res = await app.request('/jobs');

      expect(await res.json()).toEqual({
        jobs: [
          {
            job_id: created.job_id,
            status: 'completed',
            email: created.email,
            browser_open: false,
            creation_status: 'success',
          },
        ],
      });
    });
  });

  // ── Human in the loop ─────────────────────────────────────────────

  describe('POST /jobs/:id/resume', () => {
    test('resumes a waiting job and completes it', async () => {
      const { app, orchestrator, launcher } = buildApp(CAPTCHA_PAGE);
      const created = await createJob(app);
      await orchestrator.waitForStatus(created.job_id, isSettled);
      expect(orchestrator.get(created.job_id).status).toBe('waiting_for_human');

      launcher.lastSession?.setPage(SUCCESS_PAGE);
      const res = await app.request(`/jobs/${created.job_id}/resume`, post());

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ job_id: created.job_id, status: 'resuming' });

      await orchestrator.waitForStatus(created.job_id, isSettled);
      expect(orchestrator.get(created.job_id).status).toBe('completed');
    });

    test('400 when the job is not waiting for a human', async () => {
      const { app, orchestrator } = buildApp(SUCCESS_PAGE);
      const created = await createJob(app);
      await orchestrator.waitForStatus(created.job_id, isSettled);

      const res = await app.request(`/jobs/${created.job_id}/resume`, post());

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_job_state',
        message: 'Job not in waiting_for_human state (current=completed)',
        current_status: 'completed',
      });
      expect(orchestrator.get(created.job_id).status).toBe('completed');
    });

    test('404 for an unknown id', async () => {
      const { app } = buildApp(SUCCESS_PAGE);
      const res = await app.request('/jobs/missing/resume', post());
      expect(res.status).toBe(404);
    });
  });

  describe('DELETE /jobs/:id/browser', () => {
    test('closes the browser and is idempotent', async () => {
      const { app, orchestrator, launcher } = buildApp(CAPTCHA_PAGE);
      const created = await createJob(app);
      await orchestrator.waitForStatus(created.job_id, isSettled);

      const first = await app.request(`/jobs/${created.job_id}/browser`, { method: 'DELETE' });
      const second = await app.request(`/jobs/${created.job_id}/browser`, { method: 'DELETE' });

      expect(first.status).toBe(200);
      expect(await first.json()).toEqual({ job_id: created.job_id, message: 'Browser closed' });
      expect(second.status).toBe(200);
      expect(await second.json()).toEqual({ job_id: created.job_id, message: 'Browser already closed' });
      expect(launcher.lastSession?.isClosed()).toBe(true);
      expect(orchestrator.get(created.job_id)).toMatchObject({ status: 'error', browser_open: false });
    });

    test('answers 200 for an unknown id', async () => {
      const { app } = buildApp(SUCCESS_PAGE);
      const res = await app.request('/jobs/missing/browser', { method: 'DELETE' });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ job_id: 'missing', message: 'Browser already closed' });
    });

    test('resume after closing the browser is rejected', async () => {
      const { app, orchestrator } = buildApp(CAPTCHA_PAGE);
      const created = await createJob(app);
      await orchestrator.waitForStatus(created.job_id, isSettled);
      await app.request(`/jobs/${created.job_id}/browser`, { method: 'DELETE' });

      const res = await app.request(`/jobs/${created.job_id}/resume`, post());

      expect(res.status).toBe(400);
    });
  });

  // ── Service routes ────────────────────────────────────────────────

  test('GET /health reports workers and open sessions', async () => {
    const { app, orchestrator, pool } = buildApp(CAPTCHA_PAGE);
    const created = await createJob(app);
    await orchestrator.waitForStatus(created.job_id, isSettled);
    await pool.drain();

    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'ok',
      service: 'inboxforge',
      version: '0.1.0',
      environment: 'test',
      workers: { active: 0, queued: 0, concurrency: 2 },
      sessions_open: 1,
    });
  });

  test('unknown routes return a JSON 404', async () => {
    const { app } = buildApp(SUCCESS_PAGE);

    const res = await app.request('/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'not_found', message: 'Route not found' });
  });

  test('echoes the caller request id', async () => {
    const { app } = buildApp(SUCCESS_PAGE);
    const res = await app.request('/health', { headers: { 'X-Request-Id': 'req-42' } });
    expect(res.headers.get('X-Request-Id')).toBe('req-42');
  });
});
