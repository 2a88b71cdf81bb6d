import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])
  .transform((raw) => ['true', '1', 'yes', 'on'].includes(raw));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  CORS_ORIGIN: z.string().min(1).default('*'),

  IF_API_PORT: z.coerce.number().int().min(1).max(65535).default(3100),
  IF_STORAGE_DIR: z.string().min(1).default('./storage'),
  IF_SIGNUP_URL: z.string().url().default('https://signup.live.com'),
  IF_EMAIL_DOMAIN: z.string().min(3).default('outlook.com'),
  IF_PASSWORD_LENGTH: z.coerce.number().int().min(8).max(64).default(12),
  IF_WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(2),

  // Browser
  IF_HEADLESS: booleanFlag.default('false'),
  IF_BROWSER_CHANNEL: z.string().min(1).default('msedge'),
  IF_NAVIGATION_TIMEOUT_MS: z.coerce.number().int().min(1_000).default(60_000),
  IF_NETWORK_IDLE_TIMEOUT_MS: z.coerce.number().int().min(0).default(15_000),
  IF_ELEMENT_TIMEOUT_MS: z.coerce.number().int().min(0).default(5_000),

  // Pacing (all zero-able so tests can run without delays)
  IF_TYPING_DELAY_MS: z.coerce.number().int().min(0).default(80),
  IF_ACTION_PAUSE_MS: z.coerce.number().int().min(0).default(1_000),
  IF_HIGHLIGHT_MS: z.coerce.number().int().min(0).default(400),

  IF_DETECTION_RULES_PATH: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/** Parse an environment map without touching the cached process env. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

export function getEnv(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}

/** Drop the cached env so the next getEnv() re-reads process.env (tests only). */
export function resetEnv(): void {
  _env = null;
}
