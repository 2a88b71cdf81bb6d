import type { BrowserLauncher, BrowserSession, HighlightColor, LaunchOptions } from './types.js';

export interface MockPage {
  url: string;
  text?: string;
  frameUrls?: string[];
  /** Selectors that are present and visible on this page */
  visible?: string[];
}

export type MockOperation =
  | 'goto'
  | 'networkIdle'
  | 'highlight'
  | 'showBanner'
  | 'removeBanner'
  | 'screenshot'
  | 'content';

export interface MockBrowserSessionConfig {
  /** Page presented once goto() resolves */
  page: MockPage;
  /** Clicking one of these selectors swaps in the mapped page */
  onClick?: Record<string, MockPage>;
  /** Operations that reject with the given error */
  failures?: Partial<Record<MockOperation, Error>>;
  /** Selectors that are visible but reject every click or keystroke */
  brokenSelectors?: string[];
}

export interface MockCall {
  op: string;
  selector?: string;
  value?: string;
}

const BLANK_PAGE: MockPage = { url: 'about:blank', text: '', visible: [] };

/**
 * In-process stand-in for a browser page. Does NOT launch a browser;
 * it walks a scripted set of pages and records every call so tests can
 * assert on what the driver did.
 */
export class MockBrowserSession implements BrowserSession {
  readonly calls: MockCall[] = [];
  readonly typed = new Map<string, string>();
  readonly highlighted = new Set<string>();
  bannerText: string | null = null;
  private current: MockPage = BLANK_PAGE;
  private closed = false;
  private readonly failures: Partial<Record<MockOperation, Error>>;

  constructor(private readonly config: MockBrowserSessionConfig) {
    this.failures = { ...config.failures };
  }

  /** Replace the current page, e.g. after a human solved a challenge */
  setPage(page: MockPage): void {
    this.current = page;
  }

  /** Make an operation reject from now on */
  failOn(op: MockOperation, error: Error): void {
    this.failures[op] = error;
  }

  async goto(url: string, _timeoutMs: number): Promise<void> {
    this.record({ op: 'goto', value: url });
    this.maybeFail('goto');
    this.current = this.config.page;
  }

  async waitForNetworkIdle(_timeoutMs: number): Promise<void> {
    this.record({ op: 'networkIdle' });
    this.maybeFail('networkIdle');
  }

  async isVisible(selector: string): Promise<boolean> {
    this.ensureOpen();
    return this.visible(selector);
  }

  async waitForVisible(selector: string, timeoutMs: number): Promise<void> {
    this.ensureOpen();
    if (!this.visible(selector)) {
      throw new Error(`Timeout ${timeoutMs}ms exceeded waiting for ${selector}`);
    }
  }

  async clear(selector: string): Promise<void> {
    this.record({ op: 'clear', selector });
    this.ensureInteractive(selector);
    this.typed.delete(selector);
  }

  async typeText(selector: string, text: string, _delayMs: number): Promise<void> {
    this.record({ op: 'type', selector, value: text });
    this.ensureInteractive(selector);
    this.typed.set(selector, (this.typed.get(selector) ?? '') + text);
  }

  async click(selector: string, _timeoutMs: number): Promise<void> {
    this.record({ op: 'click', selector });
    this.ensureInteractive(selector);
    const next = this.config.onClick?.[selector];
    if (next) this.current = next;
  }

  async highlight(selector: string, _color: HighlightColor): Promise<void> {
    this.record({ op: 'highlight', selector });
    this.maybeFail('highlight');
    this.highlighted.add(selector);
  }

  async removeHighlight(selector: string): Promise<void> {
    this.record({ op: 'removeHighlight', selector });
    this.ensureOpen();
    this.highlighted.delete(selector);
  }

  async showBanner(message: string): Promise<void> {
    this.record({ op: 'showBanner', value: message });
    this.maybeFail('showBanner');
    this.bannerText = message;
  }

  async removeBanner(): Promise<void> {
    this.record({ op: 'removeBanner' });
    this.maybeFail('removeBanner');
    this.bannerText = null;
  }

  async screenshot(): Promise<Buffer> {
    this.record({ op: 'screenshot' });
    this.maybeFail('screenshot');
    return Buffer.from(`png:${this.current.url}`);
  }

  async content(): Promise<string> {
    this.record({ op: 'content' });
    this.maybeFail('content');
    return this.current.text ?? '';
  }

  url(): string {
    this.ensureOpen();
    return this.current.url;
  }

  frameUrls(): string[] {
    this.ensureOpen();
    return this.current.frameUrls ?? [];
  }

  async close(): Promise<void> {
    this.record({ op: 'close' });
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Number of recorded calls with the given operation name */
  count(op: string): number {
    return this.calls.filter((call) => call.op === op).length;
  }

  private visible(selector: string): boolean {
    return (this.current.visible ?? []).includes(selector);
  }

  private record(call: MockCall): void {
    this.calls.push(call);
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error('Target page, context or browser has been closed');
    }
  }

  private ensureInteractive(selector: string): void {
    this.ensureOpen();
    if (!this.visible(selector)) {
      throw new Error(`Element not found: ${selector}`);
    }
    if (this.config.brokenSelectors?.includes(selector)) {
      throw new Error(`Element is not interactable: ${selector}`);
    }
  }

  private maybeFail(op: MockOperation): void {
    this.ensureOpen();
    const failure = this.failures[op];
    if (failure) throw failure;
  }
}

export interface MockLauncherConfig {
  /** Session script, or a factory receiving the launch options */
  session: MockBrowserSessionConfig | ((options: LaunchOptions) => MockBrowserSessionConfig);
  /** Channels that fail to launch; use 'bundled' for the fallback engine */
  failChannels?: string[];
}

/** Launcher that hands out MockBrowserSession instances. */
export class MockBrowserLauncher implements BrowserLauncher {
  readonly launches: LaunchOptions[] = [];
  readonly sessions: MockBrowserSession[] = [];

  constructor(private readonly config: MockLauncherConfig) {}

  async launch(options: LaunchOptions): Promise<BrowserSession> {
    this.launches.push(options);
    const channel = options.channel ?? 'bundled';
    if (this.config.failChannels?.includes(channel)) {
      throw new Error(`Failed to launch ${channel}: executable doesn't exist`);
    }

    const script =
      typeof this.config.session === 'function' ? this.config.session(options) : this.config.session;
    const session = new MockBrowserSession(script);
    this.sessions.push(session);
    return session;
  }

  /** The most recently launched session */
  get lastSession(): MockBrowserSession | undefined {
    return this.sessions[this.sessions.length - 1];
  }
}
