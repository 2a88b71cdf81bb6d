// --- Base ---

export class InboxForgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'InboxForgeError';
  }
}

// --- Browser / driver ---

/** No usable browser engine could be started. Terminal `failed`. */
export class LaunchFailure extends InboxForgeError {
  constructor(
    message: string,
    public readonly channel: string | null,
  ) {
    super(message, 'launch_failed');
    this.name = 'LaunchFailure';
  }
}

/** Opening the signup URL failed. Triggers the fallback channel. */
export class NavigationFailure extends InboxForgeError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message, 'navigation_failed');
    this.name = 'NavigationFailure';
  }
}

/** Every candidate for a required field or control failed. */
export class InteractionFailure extends InboxForgeError {
  constructor(
    message: string,
    public readonly step: string,
  ) {
    super(message, 'interaction_failed');
    this.name = 'InteractionFailure';
  }
}

/** The page matched neither a success nor a challenge pattern. */
export class ClassificationAmbiguous extends InboxForgeError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message, 'classification_ambiguous');
    this.name = 'ClassificationAmbiguous';
  }
}

// --- Orchestration ---

export class SessionNotFound extends InboxForgeError {
  constructor(public readonly jobId: string) {
    super(`No live browser session for job ${jobId}`, 'session_not_found');
    this.name = 'SessionNotFound';
  }
}

export class InvalidJobState extends InboxForgeError {
  constructor(
    public readonly jobId: string,
    public readonly currentStatus: string,
    public readonly expectedStatus: string,
  ) {
    super(
      `Job not in ${expectedStatus} state (current=${currentStatus})`,
      'invalid_job_state',
    );
    this.name = 'InvalidJobState';
  }
}

export class JobNotFound extends InboxForgeError {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} not found`, 'not_found');
    this.name = 'JobNotFound';
  }
}

export class ConfigError extends InboxForgeError {
  constructor(message: string) {
    super(message, 'config_error');
    this.name = 'ConfigError';
  }
}

// --- Error classification ---

const ERROR_CLASSIFICATIONS: Array<{ pattern: RegExp; code: string }> = [
  { pattern: /browser.*(closed|disconnected)|target.*closed|context.*closed|page.*closed/i, code: 'browser_closed' },
  { pattern: /timeout|timed out/i, code: 'timeout' },
  { pattern: /net::|navigation|ERR_NAME_NOT_RESOLVED|ERR_CONNECTION/i, code: 'navigation_failed' },
  { pattern: /executable doesn't exist|failed to launch|chromium distribution/i, code: 'launch_failed' },
];

/**
 * Map any thrown value to a short code for job log entries.
 * Typed errors keep their own code.
 */
export function classifyError(err: unknown): string {
  if (err instanceof InboxForgeError) return err.code;
  const message = errorMessage(err);
  for (const { pattern, code } of ERROR_CLASSIFICATIONS) {
    if (pattern.test(message)) return code;
  }
  return 'internal_error';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
