import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';

/**
 * Pattern sets used to classify signup pages. All matching is
 * case-insensitive substring matching.
 */
export interface DetectionRules {
  /** Bot-protection vendor hosts, matched against page and frame URLs */
  protectionHosts: string[];
  /** Phrases that indicate an interactive challenge on the page */
  captchaKeywords: string[];
  /** Phrases or URL fragments that indicate the account was created */
  successIndicators: string[];
}

export const DEFAULT_DETECTION_RULES: DetectionRules = {
  protectionHosts: ['hsprotect', 'perimeterx', 'arkoselabs', 'crcldu', 'fpt.live.com', 'funcaptcha'],
  captchaKeywords: [
    'help us',
    'captcha',
    "prove you're not",
    'press and hold',
    'solve this challenge',
    'verify you are human',
    'are you a robot',
  ],
  successIndicators: ['welcome', 'account.microsoft.com', 'outlook.live.com/mail'],
};

const patternList = z.array(z.string().trim().min(1)).min(1);

const DetectionRulesFileSchema = z
  .object({
    protectionHosts: patternList.optional(),
    captchaKeywords: patternList.optional(),
    successIndicators: patternList.optional(),
  })
  .strict();

/**
 * Resolve the active rules. Each category present in the file replaces the
 * default list for that category; absent categories keep the defaults.
 */
export function loadDetectionRules(path?: string): DetectionRules {
  if (!path) return DEFAULT_DETECTION_RULES;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read detection rules from ${path}: ${errorMessage(err)}`);
  }

  const parsed = DetectionRulesFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid detection rules in ${path}: ${issues}`);
  }

  return {
    protectionHosts: parsed.data.protectionHosts ?? DEFAULT_DETECTION_RULES.protectionHosts,
    captchaKeywords: parsed.data.captchaKeywords ?? DEFAULT_DETECTION_RULES.captchaKeywords,
    successIndicators: parsed.data.successIndicators ?? DEFAULT_DETECTION_RULES.successIndicators,
  };
}
