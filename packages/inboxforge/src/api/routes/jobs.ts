import { Hono } from 'hono';
import type { JobOrchestrator } from '../../jobs/JobOrchestrator.js';
import { validateBody } from '../middleware/index.js';
import { BatchCreateJobsSchema, CreateJobSchema } from '../schemas/index.js';

export function createJobRoutes(orchestrator: JobOrchestrator) {
  const jobs = new Hono();

  // ─── POST /jobs - Create Job ───────────────────────────────────

  jobs.post('/', validateBody(CreateJobSchema), (c) => {
    const body = c.get('validatedBody');
    return c.json(orchestrator.submit({ curp: body.curp }), 202);
  });

  // ─── POST /jobs/batch - Batch Create Jobs ──────────────────────

  jobs.post('/batch', validateBody(BatchCreateJobsSchema), (c) => {
    const body = c.get('validatedBody');
    const created = body.curps.map((curp) => orchestrator.submit({ curp }));
    return c.json({ jobs: created }, 202);
  });

  // ─── GET /jobs - List Jobs ─────────────────────────────────────

  jobs.get('/', (c) => {
    return c.json({ jobs: orchestrator.list() });
  });

  // ─── GET /jobs/:id - Get Job ───────────────────────────────────

  jobs.get('/:id', (c) => {
    return c.json(orchestrator.get(c.req.param('id')));
  });

  // ─── GET /jobs/:id/logs - Execution Trace ──────────────────────

  jobs.get('/:id/logs', (c) => {
    const jobId = c.req.param('id');
    return c.json({ job_id: jobId, logs: orchestrator.logs(jobId) });
  });

  // ─── POST /jobs/:id/resume - Resume After Human Step ───────────

  jobs.post('/:id/resume', (c) => {
    return c.json(orchestrator.resume(c.req.param('id')), 202);
  });

  // ─── DELETE /jobs/:id/browser - Close Browser ──────────────────

  jobs.delete('/:id/browser', async (c) => {
    const result = await orchestrator.closeBrowser(c.req.param('id'));
    return c.json(result);
  });

  return jobs;
}
