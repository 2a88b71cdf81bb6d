import type { MockBrowserSessionConfig, MockPage } from '../../src/browser/mock.js';
import type { SignupDriverConfig } from '../../src/config/driver.js';

// ── Scripted signup pages ──────────────────────────────────────────────────

export const EMAIL_INPUT = 'input[type="email"]';
export const USERNAME_INPUT = 'input[name="username"]';
export const PASSWORD_INPUT = 'input[type="password"]';
export const EMAIL_NEXT = '#iSignupAction';
export const PASSWORD_NEXT = 'button[data-testid="primaryButton"]';

export const SUCCESS_PAGE: MockPage = {
  url: 'https://account.microsoft.com/?new=1',
  text: 'Welcome to your new account',
};

export const CAPTCHA_PAGE: MockPage = {
  url: 'https://signup.live.com/?step=verify',
  text: 'Please help us beat the robots. Press and hold the button.',
};

export const UNKNOWN_PAGE: MockPage = {
  url: 'https://signup.live.com/?step=birthdate',
  text: 'Add your birth date',
};

export const PASSWORD_PAGE: MockPage = {
  url: 'https://signup.live.com/?step=password',
  text: 'Create a password',
  visible: [PASSWORD_INPUT, PASSWORD_NEXT],
};

export const EMAIL_PAGE: MockPage = {
  url: 'https://signup.live.com/',
  text: 'Create account',
  visible: [EMAIL_INPUT, EMAIL_NEXT],
};

/** Email step → password step → `finalPage` */
export function signupFlow(finalPage: MockPage, overrides: Partial<MockBrowserSessionConfig> = {}): MockBrowserSessionConfig {
  return {
    page: EMAIL_PAGE,
    onClick: { [EMAIL_NEXT]: PASSWORD_PAGE, [PASSWORD_NEXT]: finalPage },
    ...overrides,
  };
}

export function driverConfig(storageDir: string): SignupDriverConfig {
  return {
    signupUrl: 'https://signup.live.com',
    preferredChannel: 'msedge',
    headless: true,
    storageDir,
    navigationTimeoutMs: 1_000,
    networkIdleTimeoutMs: 0,
    elementTimeoutMs: 0,
    pacing: { typingDelayMs: 0, actionPauseMs: 0, highlightMs: 0 },
  };
}
