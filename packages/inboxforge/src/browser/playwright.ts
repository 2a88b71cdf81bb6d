import { chromium, type BrowserContext, type Page } from 'playwright-core';
import { errorMessage } from '../errors.js';
import { getLogger } from '../monitoring/logger.js';
import {
  BANNER_ELEMENT_ID,
  type BrowserLauncher,
  type BrowserSession,
  type HighlightColor,
  type LaunchOptions,
} from './types.js';

const logger = getLogger({ service: 'PlaywrightLauncher' });

// The element may be gone after a click navigates; never wait long for it.
const MARKER_TIMEOUT_MS = 1_000;

const OUTLINE_COLORS: Record<HighlightColor, string> = {
  green: '3px solid #22c55e',
  red: '3px solid #ef4444',
};

/**
 * Launches a visible, persistent Chromium-family context. The profile
 * directory is reused when the driver falls back to another channel, so
 * cookies set by a half-finished attempt survive the relaunch.
 */
export class PlaywrightLauncher implements BrowserLauncher {
  async launch(options: LaunchOptions): Promise<BrowserSession> {
    const context = await chromium.launchPersistentContext(options.profileDir, {
      channel: options.channel,
      headless: options.headless,
      args: ['--start-maximized'],
      viewport: null,
    });

    let page: Page;
    try {
      page = context.pages()[0] ?? (await context.newPage());
      page.setDefaultTimeout(options.defaultTimeoutMs);
    } catch (err) {
      await context.close().catch((closeErr: unknown) => {
        logger.warn('Could not close half-open browser context', { error: errorMessage(closeErr) });
      });
      throw err;
    }

    logger.debug('Browser context launched', {
      channel: options.channel ?? 'bundled',
      headless: options.headless,
    });

    return new PlaywrightSession(context, page);
  }
}

export class PlaywrightSession implements BrowserSession {
  private closed = false;

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
  ) {
    context.on('close', () => {
      this.closed = true;
    });
    page.on('close', () => {
      this.closed = true;
    });
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState('networkidle', { timeout: timeoutMs });
  }

  async isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible();
  }

  async waitForVisible(selector: string, timeoutMs: number): Promise<void> {
    await this.page.locator(selector).first().waitFor({ state: 'visible', timeout: timeoutMs });
  }

  async clear(selector: string): Promise<void> {
    await this.page.locator(selector).first().clear();
  }

  async typeText(selector: string, text: string, delayMs: number): Promise<void> {
    await this.page.locator(selector).first().pressSequentially(text, { delay: delayMs });
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    await this.page.locator(selector).first().click({ timeout: timeoutMs });
  }

  async highlight(selector: string, color: HighlightColor): Promise<void> {
    await this.page
      .locator(selector)
      .first()
      .evaluate((el, outline) => {
        el.style.outline = outline;
        el.style.outlineOffset = '2px';
      }, OUTLINE_COLORS[color], { timeout: MARKER_TIMEOUT_MS });
  }

  async removeHighlight(selector: string): Promise<void> {
    await this.page
      .locator(selector)
      .first()
      .evaluate((el) => {
        el.style.outline = '';
        el.style.outlineOffset = '';
      }, undefined, { timeout: MARKER_TIMEOUT_MS });
  }

  async showBanner(message: string): Promise<void> {
    await this.page.evaluate(
      ({ id, text }) => {
        document.getElementById(id)?.remove();
        const banner = document.createElement('div');
        banner.id = id;
        banner.textContent = text;
        banner.style.cssText = [
          'position:fixed',
          'top:0',
          'left:0',
          'right:0',
          'z-index:2147483647',
          'padding:10px 16px',
          'background:#f59e0b',
          'color:#111827',
          'font:600 14px/1.4 system-ui,sans-serif',
          'text-align:center',
        ].join(';');
        document.body.appendChild(banner);
      },
      { id: BANNER_ELEMENT_ID, text: message },
    );
  }

  async removeBanner(): Promise<void> {
    await this.page.evaluate((id) => {
      document.getElementById(id)?.remove();
    }, BANNER_ELEMENT_ID);
  }

  async screenshot(): Promise<Buffer> {
    return this.page.screenshot();
  }

  async content(): Promise<string> {
    return this.page.locator('body').innerText();
  }

  url(): string {
    return this.page.url();
  }

  frameUrls(): string[] {
    return this.page
      .frames()
      .map((frame) => frame.url())
      .filter((url) => url !== '' && url !== 'about:blank');
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.context.close();
  }

  isClosed(): boolean {
    return this.closed || this.page.isClosed();
  }
}
