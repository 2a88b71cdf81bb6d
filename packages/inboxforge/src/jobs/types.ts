import type { OutcomeMarker, SignupOutcome, SignupTarget } from '../engine/SignupDriver.js';
import type { JobLogSink, LogEntry } from './JobLog.js';

export const JOB_STATUSES = [
  'queued',
  'running',
  'waiting_for_human',
  'resuming',
  'completed',
  'failed',
  'error',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

/** Statuses from which no automated transition happens without an external request. */
export const SETTLED_STATUSES: readonly JobStatus[] = ['completed', 'waiting_for_human', 'failed', 'error'];

export function isSettled(status: JobStatus): boolean {
  return SETTLED_STATUSES.includes(status);
}

export type CreationStatus = 'pending' | 'success' | 'blocked_by_captcha' | 'failed' | 'error';

export function creationStatusFor(status: JobStatus): CreationStatus {
  switch (status) {
    case 'completed':
      return 'success';
    case 'waiting_for_human':
      return 'blocked_by_captcha';
    case 'failed':
      return 'failed';
    case 'error':
      return 'error';
    default:
      return 'pending';
  }
}

/** What the orchestrator needs from the signup driver. */
export interface SignupRunner {
  run(target: SignupTarget, log: JobLogSink): Promise<SignupOutcome>;
  resume(jobId: string, log: JobLogSink): Promise<SignupOutcome>;
}

// --- Read model ---

export interface JobView {
  job_id: string;
  curp: string;
  email: string;
  status: JobStatus;
  browser_open: boolean;
  created_at: string;
  updated_at: string;
  created_account: {
    email: string;
    password: string;
    creation_status: CreationStatus;
  };
  screenshot_ref: string | null;
  last_outcome: OutcomeMarker | null;
  error: string | null;
  logs: LogEntry[];
}

export interface JobSummary {
  job_id: string;
  status: JobStatus;
  email: string;
  browser_open: boolean;
  creation_status: CreationStatus;
}

export interface JobStatusEvent {
  jobId: string;
  from: JobStatus;
  to: JobStatus;
}
