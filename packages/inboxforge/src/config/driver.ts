import type { Env } from './env.js';

export interface PacingConfig {
  /** Delay between typed characters */
  typingDelayMs: number;
  /** Pause after each completed step, mimicking a human reading the page */
  actionPauseMs: number;
  /** How long the outline stays around a field before it is removed */
  highlightMs: number;
}

export interface SignupDriverConfig {
  signupUrl: string;
  /** Installed browser channel tried first; the bundled engine is the fallback */
  preferredChannel: string;
  headless: boolean;
  storageDir: string;
  navigationTimeoutMs: number;
  networkIdleTimeoutMs: number;
  elementTimeoutMs: number;
  pacing: PacingConfig;
}

export function loadDriverConfig(env: Env): SignupDriverConfig {
  return {
    signupUrl: env.IF_SIGNUP_URL,
    preferredChannel: env.IF_BROWSER_CHANNEL,
    headless: env.IF_HEADLESS,
    storageDir: env.IF_STORAGE_DIR,
    navigationTimeoutMs: env.IF_NAVIGATION_TIMEOUT_MS,
    networkIdleTimeoutMs: env.IF_NETWORK_IDLE_TIMEOUT_MS,
    elementTimeoutMs: env.IF_ELEMENT_TIMEOUT_MS,
    pacing: {
      typingDelayMs: env.IF_TYPING_DELAY_MS,
      actionPauseMs: env.IF_ACTION_PAUSE_MS,
      highlightMs: env.IF_HIGHLIGHT_MS,
    },
  };
}
