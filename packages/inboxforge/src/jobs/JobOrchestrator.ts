import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { OutcomeMarker, SignupOutcome } from '../engine/SignupDriver.js';
import { InvalidJobState, JobNotFound, errorMessage } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { SessionRegistry } from '../sessions/SessionRegistry.js';
import { generateCredentials, type Credentials } from '../utils/credentials.js';
import type { WorkerPool } from '../workers/WorkerPool.js';
import type { ArtifactStore } from './ArtifactStore.js';
import { JobLog, type LogEntry } from './JobLog.js';
import {
  creationStatusFor,
  isSettled,
  type JobStatus,
  type JobStatusEvent,
  type JobSummary,
  type JobView,
  type SignupRunner,
} from './types.js';

// --- Types ---

interface JobRecord {
  readonly id: string;
  readonly curp: string;
  readonly credentials: Readonly<Credentials>;
  readonly createdAt: string;
  readonly log: JobLog;
  status: JobStatus;
  browserOpen: boolean;
  screenshotRef: string | null;
  lastOutcome: OutcomeMarker | null;
  error: string | null;
  updatedAt: string;
}

export interface SubmitJobInput {
  curp: string;
}

export interface SubmitJobResult {
  job_id: string;
  status: 'queued';
  email: string;
}

export interface OrchestratorEvents {
  status: (event: JobStatusEvent) => void;
}

export interface JobOrchestratorDeps {
  driver: SignupRunner;
  registry: SessionRegistry;
  pool: WorkerPool;
  artifacts: ArtifactStore;
  emailDomain?: string;
  passwordLength?: number;
  logger?: Logger;
}

const DEFAULT_WAIT_TIMEOUT_MS = 30_000;

/**
 * Maps external requests onto the signup driver and the session registry.
 *
 * Jobs live in memory only. Each job runs on at most one worker at a time:
 * a run is scheduled on submit, and a resume is only accepted from
 * `waiting_for_human`, which no running job can be in.
 */
export class JobOrchestrator {
  readonly events = new EventEmitter<OrchestratorEvents>();
  private readonly jobs = new Map<string, JobRecord>();
  private readonly driver: SignupRunner;
  private readonly registry: SessionRegistry;
  private readonly pool: WorkerPool;
  private readonly artifacts: ArtifactStore;
  private readonly emailDomain: string;
  private readonly passwordLength: number;
  private readonly logger: Logger;

  constructor(deps: JobOrchestratorDeps) {
    this.driver = deps.driver;
    this.registry = deps.registry;
    this.pool = deps.pool;
    this.artifacts = deps.artifacts;
    this.emailDomain = deps.emailDomain ?? 'outlook.com';
    this.passwordLength = deps.passwordLength ?? 12;
    this.logger = deps.logger ?? getLogger({ service: 'JobOrchestrator' });
  }

  // --- Commands ---

  /** Create a job in `queued` and schedule its run. Returns immediately. */
  submit(input: SubmitJobInput): SubmitJobResult {
    const id = randomUUID();
    const credentials = Object.freeze(
      generateCredentials(input.curp, { domain: this.emailDomain, passwordLength: this.passwordLength }),
    );
    const now = new Date().toISOString();

    const job: JobRecord = {
      id,
      curp: input.curp,
      credentials,
      createdAt: now,
      updatedAt: now,
      log: new JobLog(id, this.artifacts.logPath(id), this.logger.child({ jobId: id })),
      status: 'queued',
      browserOpen: false,
      screenshotRef: null,
      lastOutcome: null,
      error: null,
    };
    this.jobs.set(id, job);
    job.log.append('gen_credentials', true, `email=${credentials.email}`);
    this.logger.info('Job queued', { jobId: id });

    const result: SubmitJobResult = { job_id: id, status: 'queued', email: credentials.email };
    this.schedule(job, 'run');
    return result;
  }

  /**
   * Accept a resume request for a job waiting on a human. The status moves
   * to `resuming` before this returns.
   */
  resume(jobId: string): { job_id: string; status: 'resuming' } {
    const job = this.require(jobId);
    if (job.status !== 'waiting_for_human') {
      throw new InvalidJobState(jobId, job.status, 'waiting_for_human');
    }

    this.transition(job, 'resuming');
    this.schedule(job, 'resume');
    return { job_id: job.id, status: 'resuming' };
  }

  /**
   * Close the job's browser, whatever the job is doing. A job that was
   * waiting for a human can no longer be resumed and moves to `error`; a
   * job whose browser is still launching ends in `error` once the launch
   * returns. Calling it again, or for an id with no job, is a no-op.
   */
  async closeBrowser(jobId: string): Promise<{ job_id: string; message: string }> {
    const job = this.jobs.get(jobId);
    if (!job || this.registry.isCloseRequested(jobId)) {
      return { job_id: jobId, message: 'Browser already closed' };
    }

    const released = await this.registry.close(jobId);
    job.browserOpen = false;
    if (!released && isSettled(job.status)) {
      return { job_id: jobId, message: 'Browser already closed' };
    }

    job.log.append(
      'close_browser',
      true,
      released ? 'Browser closed by operator' : 'Browser close requested before the session opened',
    );
    if (job.status === 'waiting_for_human') {
      job.lastOutcome = 'session_lost';
      job.error = 'Browser closed by operator while waiting for human';
      this.transition(job, 'error');
    }
    return { job_id: jobId, message: 'Browser closed' };
  }

  /** Close every open browser (process shutdown). */
  async shutdown(): Promise<void> {
    await this.registry.releaseAll();
    for (const job of this.jobs.values()) {
      job.browserOpen = false;
    }
  }

  // --- Queries ---

  get(jobId: string): JobView {
    const job = this.require(jobId);
    return {
      job_id: job.id,
      curp: job.curp,
      email: job.credentials.email,
      status: job.status,
      browser_open: job.browserOpen,
      created_at: job.createdAt,
      updated_at: job.updatedAt,
      created_account: {
        email: job.credentials.email,
        password: job.credentials.password,
        creation_status: creationStatusFor(job.status),
      },
      screenshot_ref: job.screenshotRef,
      last_outcome: job.lastOutcome,
      error: job.error,
      logs: job.log.entries(),
    };
  }

  list(): JobSummary[] {
    return [...this.jobs.values()].map((job) => ({
      job_id: job.id,
      status: job.status,
      email: job.credentials.email,
      browser_open: job.browserOpen,
      creation_status: creationStatusFor(job.status),
    }));
  }

  logs(jobId: string): LogEntry[] {
    return this.require(jobId).log.entries();
  }

  /**
   * Resolve with the job's status once `predicate` accepts it (immediately
   * if it already does); reject after `timeoutMs`.
   */
  waitForStatus(
    jobId: string,
    predicate: (status: JobStatus) => boolean,
    timeoutMs: number = DEFAULT_WAIT_TIMEOUT_MS,
  ): Promise<JobStatus> {
    const job = this.require(jobId);
    if (predicate(job.status)) return Promise.resolve(job.status);

    return new Promise((resolve, reject) => {
      const onStatus = (event: JobStatusEvent) => {
        if (event.jobId !== jobId || !predicate(event.to)) return;
        cleanup();
        resolve(event.to);
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new Error(`Timed out after ${timeoutMs}ms waiting on job ${jobId} (status=${job.status})`));
      }, timeoutMs);
      const cleanup = () => {
        clearTimeout(timer);
        this.events.off('status', onStatus);
      };
      this.events.on('status', onStatus);
    });
  }

  // --- Execution ---

  private schedule(job: JobRecord, mode: 'run' | 'resume'): void {
    this.pool.submit(`${mode}:${job.id}`, async () => {
      let outcome: SignupOutcome;
      try {
        if (mode === 'run') {
          this.transition(job, 'running');
          outcome = await this.driver.run(
            { jobId: job.id, email: job.credentials.email, password: job.credentials.password },
            job.log,
          );
        } else {
          outcome = await this.driver.resume(job.id, job.log);
        }
      } catch (err) {
        const message = errorMessage(err);
        job.log.append('worker_exception', false, message);
        outcome = { status: 'error', marker: 'internal_error', screenshotRef: null, error: message };
      }
      await this.applyOutcome(job, outcome);
    });
  }

  private async applyOutcome(job: JobRecord, outcome: SignupOutcome): Promise<void> {
    let status = outcome.status;
    job.lastOutcome = outcome.marker;
    job.error = outcome.error;
    if (outcome.screenshotRef) job.screenshotRef = outcome.screenshotRef;

    if (status === 'waiting_for_human' && !this.registry.has(job.id)) {
      status = 'error';
      job.lastOutcome = 'session_lost';
      job.error = 'Browser session closed before the job could wait for a human';
      job.log.append('session_lost', false, job.error);
    }
    if (status !== 'waiting_for_human') {
      await this.registry.release(job.id);
    }

    job.browserOpen = this.registry.has(job.id);
    this.transition(job, status);
  }

  private transition(job: JobRecord, to: JobStatus): void {
    const from = job.status;
    job.status = to;
    job.updatedAt = new Date().toISOString();
    this.logger.info('Job status changed', { jobId: job.id, from, to });
    this.events.emit('status', { jobId: job.id, from, to });
  }

  private require(jobId: string): JobRecord {
    const job = this.jobs.get(jobId);
    if (!job) throw new JobNotFound(jobId);
    return job;
  }
}
