/**
 * SignupDriver: the signup state machine.
 *
 *   launching → navigating → protection_check → filling_email → submitting_email
 *     → filling_password → submitting_password → outcome_check
 *     → { completed | waiting_for_human | failed | error }
 *
 * Every browser call goes through the interaction primitives, so engine
 * exceptions become logged failures and never reach the orchestrator.
 * A job that stops for a human keeps its session in the registry; resume()
 * re-enters at outcome_check against that same page.
 */

import type { BrowserLauncher, BrowserSession } from '../browser/types.js';
import { DEFAULT_DETECTION_RULES, type DetectionRules } from '../config/detection.js';
import type { SignupDriverConfig } from '../config/driver.js';
import {
  CONTINUE_PROBES,
  EMAIL_FIELD_PROBES,
  PASSWORD_FIELD_PROBES,
  PASSWORD_SUBMIT_PROBES,
  emailValueFor,
  type FieldProbe,
} from '../detection/selectors.js';
import { classifyPage, matchProtectionHost } from '../detection/PageClassifier.js';
import {
  ClassificationAmbiguous,
  InteractionFailure,
  LaunchFailure,
  NavigationFailure,
  SessionNotFound,
  classifyError,
  errorMessage,
} from '../errors.js';
import type { ArtifactStore, ScreenshotKind } from '../jobs/ArtifactStore.js';
import type { JobLogSink } from '../jobs/JobLog.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { SessionRegistry } from '../sessions/SessionRegistry.js';
import { Interactions, sleep } from './interactions.js';
import { runProbes } from './probes.js';

// --- Types ---

export type OutcomeStatus = 'completed' | 'waiting_for_human' | 'failed' | 'error';

/**
 * Why the driver stopped. `captcha` and `unknown_state` both surface as
 * waiting_for_human but stay distinguishable here.
 */
export type OutcomeMarker =
  | 'success'
  | 'protection'
  | 'captcha'
  | 'unknown_state'
  | 'launch_failed'
  | 'navigation_failed'
  | 'session_not_found'
  | 'session_lost'
  | 'internal_error';

export interface SignupOutcome {
  status: OutcomeStatus;
  marker: OutcomeMarker;
  screenshotRef: string | null;
  error: string | null;
}

export interface SignupTarget {
  jobId: string;
  email: string;
  password: string;
}

export interface SignupDriverDeps {
  launcher: BrowserLauncher;
  registry: SessionRegistry;
  artifacts: ArtifactStore;
  config: SignupDriverConfig;
  rules?: DetectionRules;
  logger?: Logger;
}

type Phase = 'initial' | 'resume';

type AttemptResult =
  | { kind: 'outcome'; outcome: SignupOutcome }
  | { kind: 'retry'; marker: 'launch_failed' | 'navigation_failed'; error: string };

const SCREENSHOT_KINDS: Record<Phase, Record<'captcha' | 'unknown_state' | 'success', ScreenshotKind>> = {
  initial: { captcha: 'captcha', unknown_state: 'unknown_state', success: 'success' },
  resume: { captcha: 'resume_captcha', unknown_state: 'resume_unknown_state', success: 'resume_success' },
};

const HUMAN_BANNER = 'Automation paused: finish the check in this window, then resume the job.';

// --- Driver ---

export class SignupDriver {
  private readonly launcher: BrowserLauncher;
  private readonly registry: SessionRegistry;
  private readonly artifacts: ArtifactStore;
  private readonly config: SignupDriverConfig;
  private readonly rules: DetectionRules;
  private readonly logger: Logger;

  constructor(deps: SignupDriverDeps) {
    this.launcher = deps.launcher;
    this.registry = deps.registry;
    this.artifacts = deps.artifacts;
    this.config = deps.config;
    this.rules = deps.rules ?? DEFAULT_DETECTION_RULES;
    this.logger = deps.logger ?? getLogger({ service: 'SignupDriver' });
  }

  /** Run the whole flow from a fresh browser launch. Never throws. */
  async run(target: SignupTarget, log: JobLogSink): Promise<SignupOutcome> {
    log.append('start', true, 'Launching signup automation', { email: target.email });
    try {
      return await this.runWithFallback(target, log);
    } catch (err) {
      return this.abort(target.jobId, log, err);
    }
  }

  /**
   * Re-classify the live page of a job that was waiting for a human.
   * No navigation and no re-fill. Never throws.
   */
  async resume(jobId: string, log: JobLogSink): Promise<SignupOutcome> {
    log.append('resume_start', true, 'Resuming against the live session');
    try {
      const session = this.registry.lookup(jobId);
      if (!session) {
        const failure = new SessionNotFound(jobId);
        log.append('resume', false, failure.message, { error_code: failure.code });
        await this.registry.release(jobId);
        return { status: 'error', marker: 'session_not_found', screenshotRef: null, error: failure.message };
      }

      try {
        await session.removeBanner();
        log.append('remove_banner', true, 'Removed status banner');
      } catch (err) {
        log.append('remove_banner', false, `Could not remove status banner: ${errorMessage(err)}`);
      }

      return await this.checkOutcome(jobId, session, this.interactions(jobId, session, log), log, 'resume');
    } catch (err) {
      return this.abort(jobId, log, err);
    }
  }

  // --- launching / navigating ---

  private async runWithFallback(target: SignupTarget, log: JobLogSink): Promise<SignupOutcome> {
    const channels: Array<string | undefined> = [this.config.preferredChannel, undefined];
    let marker: 'launch_failed' | 'navigation_failed' = 'launch_failed';
    let lastError = '';

    for (const [index, channel] of channels.entries()) {
      if (index > 0) {
        log.append('fallback', true, 'Falling back to the bundled Chromium engine');
      }
      const attempt = await this.attempt(target, log, channel);
      if (attempt.kind === 'outcome') return attempt.outcome;

      // A navigation failure on any channel outranks a plain launch failure
      if (attempt.marker === 'navigation_failed') marker = 'navigation_failed';
      lastError = attempt.error;
    }

    const message =
      marker === 'launch_failed'
        ? 'Could not launch any browser'
        : `No browser channel could open the signup page: ${lastError}`;
    log.append('fatal_error', false, message, { error: lastError });
    return { status: 'failed', marker, screenshotRef: null, error: message };
  }

  private async attempt(
    target: SignupTarget,
    log: JobLogSink,
    channel: string | undefined,
  ): Promise<AttemptResult> {
    const label = channel ?? 'bundled';
    if (this.registry.isCloseRequested(target.jobId)) {
      return { kind: 'outcome', outcome: await this.lost(target.jobId, log) };
    }

    let session: BrowserSession;
    try {
      session = await this.launcher.launch({
        channel,
        profileDir: this.artifacts.profileDir(target.jobId),
        headless: this.config.headless,
        defaultTimeoutMs: this.config.navigationTimeoutMs,
      });
    } catch (err) {
      const failure = new LaunchFailure(errorMessage(err), channel ?? null);
      log.append('launch', false, `Channel=${label} failed to launch: ${failure.message}`, {
        channel: label,
        error_code: failure.code,
      });
      return { kind: 'retry', marker: 'launch_failed', error: failure.message };
    }

    log.append('launch', true, `Launched browser channel=${label}`, { channel: label });
    if (!(await this.registry.store(target.jobId, session))) {
      return { kind: 'outcome', outcome: await this.lost(target.jobId, log) };
    }

    try {
      await this.navigate(session, log);
    } catch (err) {
      if (session.isClosed()) {
        return { kind: 'outcome', outcome: await this.lost(target.jobId, log) };
      }
      const failure =
        err instanceof NavigationFailure ? err : new NavigationFailure(errorMessage(err), this.config.signupUrl);
      log.append('channel_exception', false, `Channel=${label} exception: ${failure.message}`, {
        channel: label,
        error_code: failure.code,
      });
      await this.registry.release(target.jobId);
      return { kind: 'retry', marker: 'navigation_failed', error: failure.message };
    }

    return { kind: 'outcome', outcome: await this.drive(target, session, log) };
  }

  private async navigate(session: BrowserSession, log: JobLogSink): Promise<void> {
    const url = this.config.signupUrl;
    log.append('goto', true, `Navigating to ${url}`);
    try {
      await session.goto(url, this.config.navigationTimeoutMs);
    } catch (err) {
      throw new NavigationFailure(errorMessage(err), url);
    }
    try {
      await session.waitForNetworkIdle(this.config.networkIdleTimeoutMs);
    } catch (err) {
      throw new NavigationFailure(`Signup page never settled: ${errorMessage(err)}`, url);
    }
    await sleep(this.config.pacing.actionPauseMs);
  }

  // --- protection_check → outcome_check ---

  private async drive(target: SignupTarget, session: BrowserSession, log: JobLogSink): Promise<SignupOutcome> {
    const { jobId } = target;
    const ui = this.interactions(jobId, session, log);

    // protection_check
    const location = await ui.currentUrl();
    if (session.isClosed()) return this.lost(jobId, log);
    const host = matchProtectionHost(location.url, location.frameUrls, this.rules);
    if (host) {
      log.append('protection', false, `Protection detected url=${location.url}`, { matched: host });
      return this.suspend(jobId, session, ui, log, 'protection', 'protection');
    }

    // filling_email → submitting_email
    const email = await runProbes(session, EMAIL_FIELD_PROBES, (probe) =>
      ui.trySetText(probe.selector, emailValueFor(probe, target.email), { label: 'email' }),
    );
    if (session.isClosed()) return this.lost(jobId, log);
    if (email.matched) {
      log.append('fill_email', true, `Filled email via ${email.matched.name}`, { probe: email.matched.name });
      await this.submit(session, ui, log, CONTINUE_PROBES, 'submit_email');
    } else {
      this.logExhausted(
        log,
        'fill_email',
        email.found ? 'Every visible email field rejected input' : 'No email field found',
        email.failed,
      );
    }

    // filling_password → submitting_password
    if (session.isClosed()) return this.lost(jobId, log);
    const password = await runProbes(session, PASSWORD_FIELD_PROBES, (probe) =>
      ui.trySetText(probe.selector, target.password, { label: 'password', secret: true }),
    );
    if (session.isClosed()) return this.lost(jobId, log);
    if (password.matched) {
      log.append('fill_password', true, `Filled password via ${password.matched.name}`, {
        probe: password.matched.name,
      });
      await this.submit(session, ui, log, PASSWORD_SUBMIT_PROBES, 'submit_password');
    } else {
      this.logExhausted(
        log,
        'fill_password',
        password.found ? 'Every visible password field rejected input' : 'No password field found',
        password.failed,
      );
    }

    // outcome_check
    if (session.isClosed()) return this.lost(jobId, log);
    return this.checkOutcome(jobId, session, ui, log, 'initial');
  }

  private async submit(
    session: BrowserSession,
    ui: Interactions,
    log: JobLogSink,
    probes: readonly FieldProbe[],
    step: 'submit_email' | 'submit_password',
  ): Promise<void> {
    const clicked = await runProbes(session, probes, (probe) => ui.tryClick(probe.selector, probe.name));
    if (!clicked.matched) {
      this.logExhausted(
        log,
        step,
        clicked.found ? 'Every visible submit control failed' : 'No submit control found',
        clicked.failed,
      );
      return;
    }
    log.append(step, true, `Submitted via ${clicked.matched.name}`, { probe: clicked.matched.name });
    await this.settle(session, log, step);
  }

  private async checkOutcome(
    jobId: string,
    session: BrowserSession,
    ui: Interactions,
    log: JobLogSink,
    phase: Phase,
  ): Promise<SignupOutcome> {
    const content = await ui.readContent();
    const location = await ui.currentUrl();
    if (session.isClosed()) return this.lost(jobId, log);

    const { verdict, matched } = classifyPage(
      { text: content.text, url: location.url, frameUrls: location.frameUrls },
      this.rules,
    );
    const kinds = SCREENSHOT_KINDS[phase];

    switch (verdict) {
      case 'captcha':
      case 'protection':
        log.append('captcha_or_protection', false, `Detected ${verdict} (matched "${matched}")`, {
          matched,
          url: location.url,
        });
        return this.suspend(jobId, session, ui, log, kinds.captcha, verdict);

      case 'success': {
        log.append('completed', true, 'Signup completed', { matched });
        const shot = await ui.captureScreenshot();
        const screenshotRef = shot.bytes ? this.persist(jobId, kinds.success, shot.bytes, log) : null;
        await this.registry.release(jobId);
        log.append('session_released', true, 'Browser session closed');
        return { status: 'completed', marker: 'success', screenshotRef, error: null };
      }

      case 'unknown': {
        const ambiguity = new ClassificationAmbiguous(`Unknown state url=${location.url}`, location.url);
        log.append('unknown_state', false, ambiguity.message, { error_code: ambiguity.code });
        return this.suspend(jobId, session, ui, log, kinds.unknown_state, 'unknown_state');
      }
    }
  }

  // --- Terminal transitions ---

  /** Stop for a human. The session stays registered. */
  private async suspend(
    jobId: string,
    session: BrowserSession,
    ui: Interactions,
    log: JobLogSink,
    kind: ScreenshotKind,
    marker: 'protection' | 'captcha' | 'unknown_state',
  ): Promise<SignupOutcome> {
    const shot = await ui.captureScreenshot();
    const screenshotRef = shot.bytes ? this.persist(jobId, kind, shot.bytes, log) : null;

    try {
      await session.showBanner(HUMAN_BANNER);
    } catch (err) {
      this.logger.debug('Banner injection failed', { jobId, error: errorMessage(err) });
    }

    if (!this.registry.has(jobId)) return this.lost(jobId, log);

    log.append('waiting_for_human', true, `Waiting for human (${marker})`, { marker, screenshot: screenshotRef });
    return { status: 'waiting_for_human', marker, screenshotRef, error: null };
  }

  /** The browser went away underneath the run (manual close or crash). */
  private async lost(jobId: string, log: JobLogSink): Promise<SignupOutcome> {
    const message = 'Browser session was closed during the run';
    log.append('session_lost', false, message, { error_code: 'browser_closed' });
    await this.registry.release(jobId);
    return { status: 'error', marker: 'session_lost', screenshotRef: null, error: message };
  }

  private async abort(jobId: string, log: JobLogSink, err: unknown): Promise<SignupOutcome> {
    const message = errorMessage(err);
    this.logger.error('Signup driver aborted', { jobId, error: message });
    log.append('driver_exception', false, message, { error_code: classifyError(err) });
    await this.registry.release(jobId);
    return { status: 'error', marker: 'internal_error', screenshotRef: null, error: message };
  }

  // --- Helpers ---

  private interactions(jobId: string, session: BrowserSession, log: JobLogSink): Interactions {
    return new Interactions(
      session,
      log,
      { ...this.config.pacing, elementTimeoutMs: this.config.elementTimeoutMs },
      this.logger.child({ jobId }),
    );
  }

  /** Bounded network-idle wait plus the human pause after a click. A timeout is tolerated. */
  private async settle(session: BrowserSession, log: JobLogSink, after: string): Promise<void> {
    try {
      await session.waitForNetworkIdle(this.config.networkIdleTimeoutMs);
    } catch (err) {
      log.append('network_idle', false, `Network did not settle after ${after}: ${errorMessage(err)}`, {
        error_code: classifyError(err),
      });
    }
    await sleep(this.config.pacing.actionPauseMs);
  }

  private logExhausted(log: JobLogSink, step: string, reason: string, failed: readonly FieldProbe[]): void {
    const failure = new InteractionFailure(reason, step);
    const extra: Record<string, unknown> = { error_code: failure.code };
    if (failed.length > 0) extra.failed_probes = failed.map((probe) => probe.name);
    log.append(step, false, failure.message, extra);
  }

  private persist(jobId: string, kind: ScreenshotKind, bytes: Buffer, log: JobLogSink): string | null {
    try {
      const path = this.artifacts.saveScreenshot(jobId, kind, bytes);
      log.append('save_screenshot', true, `Saved ${kind} screenshot`, { kind, path });
      return path;
    } catch (err) {
      log.append('save_screenshot', false, `Could not save ${kind} screenshot: ${errorMessage(err)}`, { kind });
      return null;
    }
  }
}
