/**
 * Capability surface of a live browser page.
 *
 * The signup driver and the interaction primitives only talk to the browser
 * through this interface. Only launcher implementations import the
 * browser engine directly.
 */
export interface BrowserSession {
  // -- Navigation --

  goto(url: string, timeoutMs: number): Promise<void>;

  /** Resolve once the network has been idle, or reject after the timeout */
  waitForNetworkIdle(timeoutMs: number): Promise<void>;

  // -- Element queries --

  isVisible(selector: string): Promise<boolean>;

  /** Resolve once the element is visible, or reject after the timeout */
  waitForVisible(selector: string, timeoutMs: number): Promise<void>;

  // -- Input --

  clear(selector: string): Promise<void>;

  /** Type one character at a time, waiting `delayMs` between keystrokes */
  typeText(selector: string, text: string, delayMs: number): Promise<void>;

  click(selector: string, timeoutMs: number): Promise<void>;

  // -- Visual markers (cosmetic only) --

  highlight(selector: string, color: HighlightColor): Promise<void>;
  removeHighlight(selector: string): Promise<void>;

  /** Pin a status banner to the top of the page for the human operator */
  showBanner(message: string): Promise<void>;

  /** Remove any status banner previously injected into the page */
  removeBanner(): Promise<void>;

  // -- State --

  screenshot(): Promise<Buffer>;

  /** Visible text of the page body */
  content(): Promise<string>;

  url(): string;

  /** URLs of every embedded frame (excluding blank frames) */
  frameUrls(): string[];

  // -- Lifecycle --

  close(): Promise<void>;
  isClosed(): boolean;
}

export type HighlightColor = 'green' | 'red';

export interface LaunchOptions {
  /** Installed browser channel (e.g. "msedge"); undefined selects the bundled engine */
  channel?: string;
  /** Persistent profile directory, shared across fallback launches of a job */
  profileDir: string;
  headless: boolean;
  /** Default timeout applied to page operations */
  defaultTimeoutMs: number;
}

export interface BrowserLauncher {
  launch(options: LaunchOptions): Promise<BrowserSession>;
}

/** Id of the status banner element injected while a job waits for a human. */
export const BANNER_ELEMENT_ID = 'inboxforge-banner';
