import { beforeEach, describe, expect, test, vi } from 'vitest';

const context = vi.hoisted(() => ({
  pages: vi.fn(() => []),
  newPage: vi.fn(async () => {
    throw new Error('Target page, context or browser has been closed');
  }),
  close: vi.fn(async () => undefined),
  on: vi.fn(),
}));

vi.mock('playwright-core', () => ({
  chromium: { launchPersistentContext: vi.fn(async () => context) },
}));

import { PlaywrightLauncher } from '../../../src/browser/playwright.js';

describe('PlaywrightLauncher', () => {
  beforeEach(() => {
    context.close.mockClear();
  });

  test('closes the context when no page can be opened', async () => {
    const launcher = new PlaywrightLauncher();

    await expect(
      launcher.launch({ channel: 'msedge', profileDir: '/tmp/profile', headless: true, defaultTimeoutMs: 1_000 }),
    ).rejects.toThrow('Target page, context or browser has been closed');
    expect(context.close).toHaveBeenCalledTimes(1);
  });

  test('still reports the page error when closing the context fails too', async () => {
    context.close.mockRejectedValueOnce(new Error('Browser has been closed'));
    const launcher = new PlaywrightLauncher();

    await expect(
      launcher.launch({ profileDir: '/tmp/profile', headless: true, defaultTimeoutMs: 1_000 }),
    ).rejects.toThrow('Target page, context or browser has been closed');
    expect(context.close).toHaveBeenCalledTimes(1);
  });
});
