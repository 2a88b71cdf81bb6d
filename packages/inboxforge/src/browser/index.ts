export { PlaywrightLauncher, PlaywrightSession } from './playwright.js';
export { MockBrowserLauncher, MockBrowserSession } from './mock.js';
export type { MockPage, MockBrowserSessionConfig, MockLauncherConfig } from './mock.js';
export { BANNER_ELEMENT_ID } from './types.js';
export type { BrowserSession, BrowserLauncher, LaunchOptions, HighlightColor } from './types.js';
