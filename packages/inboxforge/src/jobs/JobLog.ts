import { appendFileSync } from 'node:fs';
import type { Logger } from '../monitoring/logger.js';
import { errorMessage } from '../errors.js';

export interface LogEntry {
  readonly timestamp: string;
  readonly step: string;
  readonly success: boolean;
  readonly message: string;
  readonly extra: Readonly<Record<string, unknown>>;
}

/** Anything that accepts job trace entries. */
export interface JobLogSink {
  append(step: string, success: boolean, message: string, extra?: Record<string, unknown>): LogEntry;
}

/**
 * Append-only execution trace of one job.
 *
 * Entries are kept in memory for the read model and mirrored to a JSONL
 * file, one object per line. Timestamps never go backwards within a job.
 */
export class JobLog implements JobLogSink {
  private readonly items: LogEntry[] = [];
  private lastMs = 0;

  constructor(
    readonly jobId: string,
    private readonly filePath: string | null,
    private readonly logger: Logger,
  ) {}

  append(step: string, success: boolean, message: string, extra: Record<string, unknown> = {}): LogEntry {
    const ms = Math.max(Date.now(), this.lastMs);
    this.lastMs = ms;

    const entry: LogEntry = Object.freeze({
      timestamp: new Date(ms).toISOString(),
      step,
      success,
      message,
      extra: Object.freeze({ ...extra }),
    });
    this.items.push(entry);

    if (this.filePath) {
      try {
        appendFileSync(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
      } catch (err) {
        this.logger.warn('Job log write failed', { step, error: errorMessage(err) });
      }
    }

    this.logger.debug(`job_step:${step}`, { success, message });
    return entry;
  }

  entries(): LogEntry[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}
