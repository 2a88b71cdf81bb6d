/**
 * Session Registry
 *
 * Owns every live browser session, keyed by job id, so a job that stopped
 * for a human can later be resumed against the same open page instead of
 * a fresh navigation.
 *
 * Mutations for one job id are serialized through a per-job lock; entries
 * for different jobs never wait on each other.
 */

import type { BrowserSession } from '../browser/types.js';
import { errorMessage } from '../errors.js';
import { getLogger } from '../monitoring/logger.js';

const logger = getLogger({ service: 'SessionRegistry' });

export class SessionRegistry {
  private sessions = new Map<string, BrowserSession>();
  private locks = new Map<string, Promise<unknown>>();
  private closeRequested = new Set<string>();

  /**
   * Register the live session for a job. Last writer wins; a different
   * session already stored under the id is dropped from the registry
   * (callers must not store twice for a live job).
   *
   * Resolves to false, after closing the session, when the job's browser
   * was closed by request: a launch that finishes after the close must
   * not bring the job back to life.
   */
  async store(jobId: string, session: BrowserSession): Promise<boolean> {
    return this.withLock(jobId, async () => {
      if (this.closeRequested.has(jobId)) {
        logger.info('Refusing session for a closed job', { jobId });
        await this.closeQuietly(jobId, session);
        return false;
      }
      const previous = this.sessions.get(jobId);
      if (previous && previous !== session) {
        logger.warn('Overwriting live session', { jobId });
      }
      this.sessions.set(jobId, session);
      return true;
    });
  }

  /**
   * Close the job's browser for good: release the current session and
   * refuse any session stored for the job afterwards.
   */
  async close(jobId: string): Promise<boolean> {
    this.closeRequested.add(jobId);
    return this.release(jobId);
  }

  isCloseRequested(jobId: string): boolean {
    return this.closeRequested.has(jobId);
  }

  /**
   * The live session for a job, if any. A session whose browser has gone
   * away underneath us is not live and is treated as absent.
   */
  lookup(jobId: string): BrowserSession | undefined {
    const session = this.sessions.get(jobId);
    if (!session || session.isClosed()) return undefined;
    return session;
  }

  has(jobId: string): boolean {
    return this.lookup(jobId) !== undefined;
  }

  /**
   * Close and forget the session for a job. Idempotent: releasing an
   * absent id, or releasing twice, resolves to false.
   */
  async release(jobId: string): Promise<boolean> {
    return this.withLock(jobId, async () => {
      const session = this.sessions.get(jobId);
      if (!session) return false;

      this.sessions.delete(jobId);
      await this.closeQuietly(jobId, session);
      return true;
    });
  }

  /** Release every session (shutdown). */
  async releaseAll(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((jobId) => this.release(jobId)));
  }

  /** Number of sessions that are still live. */
  get size(): number {
    let live = 0;
    for (const session of this.sessions.values()) {
      if (!session.isClosed()) live++;
    }
    return live;
  }

  private async closeQuietly(jobId: string, session: BrowserSession): Promise<void> {
    try {
      await session.close();
    } catch (err) {
      logger.warn('Session close failed', { jobId, error: errorMessage(err) });
    }
  }

  private async withLock<T>(jobId: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.locks.get(jobId) ?? Promise.resolve();
    const run = previous.then(fn, fn);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(jobId, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(jobId) === tail) {
        this.locks.delete(jobId);
      }
    }
  }
}
