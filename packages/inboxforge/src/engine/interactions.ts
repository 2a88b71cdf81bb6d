/**
 * Interaction primitives.
 *
 * Each primitive wraps one browser call, writes exactly one job log entry
 * describing the attempt, and converts any engine failure into
 * `{ ok: false, detail }`. Nothing thrown by the engine escapes.
 */

import type { BrowserSession } from '../browser/types.js';
import type { PacingConfig } from '../config/driver.js';
import { classifyError, errorMessage } from '../errors.js';
import type { JobLogSink } from '../jobs/JobLog.js';
import type { Logger } from '../monitoring/logger.js';

export interface InteractionResult {
  ok: boolean;
  detail: string;
}

export interface ScreenshotResult extends InteractionResult {
  bytes: Buffer | null;
}

export interface ContentResult extends InteractionResult {
  text: string;
}

export interface UrlResult extends InteractionResult {
  url: string;
  frameUrls: string[];
}

export interface InteractionOptions extends PacingConfig {
  /** Bounded wait for a target element to become visible */
  elementTimeoutMs: number;
}

export interface SetTextOptions {
  /** Label used in the log entry, e.g. "email" */
  label: string;
  /** Keep the value out of the log */
  secret?: boolean;
}

export const sleep = (ms: number): Promise<void> =>
  ms > 0 ? new Promise((resolve) => setTimeout(resolve, ms)) : Promise.resolve();

export class Interactions {
  constructor(
    private readonly session: BrowserSession,
    private readonly log: JobLogSink,
    private readonly options: InteractionOptions,
    private readonly logger: Logger,
  ) {}

  async trySetText(selector: string, value: string, opts: SetTextOptions): Promise<InteractionResult> {
    const shown = opts.secret ? `${value.length} chars` : value;
    try {
      await this.session.waitForVisible(selector, this.options.elementTimeoutMs);
      await this.withHighlight(selector, 'green', async () => {
        await this.session.clear(selector);
        await this.session.typeText(selector, value, this.options.typingDelayMs);
      });
      const detail = `Filled ${opts.label} (${shown})`;
      this.log.append('set_text', true, detail, { selector, field: opts.label });
      return { ok: true, detail };
    } catch (err) {
      return this.failure('set_text', `Could not fill ${opts.label}`, err, { selector, field: opts.label });
    }
  }

  async tryClick(selector: string, label: string): Promise<InteractionResult> {
    try {
      await this.session.waitForVisible(selector, this.options.elementTimeoutMs);
      await this.withHighlight(selector, 'red', () =>
        this.session.click(selector, this.options.elementTimeoutMs),
      );
      const detail = `Clicked ${label}`;
      this.log.append('click', true, detail, { selector, control: label });
      return { ok: true, detail };
    } catch (err) {
      return this.failure('click', `Could not click ${label}`, err, { selector, control: label });
    }
  }

  async captureScreenshot(): Promise<ScreenshotResult> {
    try {
      const bytes = await this.session.screenshot();
      const detail = `Captured screenshot (${bytes.length} bytes)`;
      this.log.append('screenshot', true, detail);
      return { ok: true, detail, bytes };
    } catch (err) {
      return { ...this.failure('screenshot', 'Screenshot failed', err), bytes: null };
    }
  }

  async readContent(): Promise<ContentResult> {
    try {
      const text = await this.session.content();
      const detail = `Read page text (${text.length} chars)`;
      this.log.append('read_content', true, detail);
      return { ok: true, detail, text };
    } catch (err) {
      return { ...this.failure('read_content', 'Could not read page text', err), text: '' };
    }
  }

  async currentUrl(): Promise<UrlResult> {
    try {
      const url = this.session.url();
      const frameUrls = this.session.frameUrls();
      const detail = `url=${url}`;
      this.log.append('current_url', true, detail, { frame_count: frameUrls.length });
      return { ok: true, detail, url, frameUrls };
    } catch (err) {
      return { ...this.failure('current_url', 'Could not read page URL', err), url: '', frameUrls: [] };
    }
  }

  // --- Helpers ---

  /**
   * Outline the target while acting on it. Highlight failures are
   * cosmetic and never change the outcome of `action`.
   */
  private async withHighlight<T>(
    selector: string,
    color: 'green' | 'red',
    action: () => Promise<T>,
  ): Promise<T> {
    await this.session.highlight(selector, color).catch((err: unknown) => {
      this.logger.debug('Highlight failed', { selector, error: errorMessage(err) });
    });
    try {
      const result = await action();
      await sleep(this.options.highlightMs);
      return result;
    } finally {
      await this.session.removeHighlight(selector).catch((err: unknown) => {
        this.logger.debug('Highlight removal failed', { selector, error: errorMessage(err) });
      });
    }
  }

  private failure(
    step: string,
    prefix: string,
    err: unknown,
    extra: Record<string, unknown> = {},
  ): InteractionResult {
    const detail = `${prefix}: ${errorMessage(err)}`;
    this.log.append(step, false, detail, { ...extra, error_code: classifyError(err) });
    return { ok: false, detail };
  }
}
