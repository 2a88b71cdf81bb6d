/**
 * Heuristic page classification for the signup flow.
 *
 * Pure functions over the page's text, URL and frame URLs. Matching is
 * case-insensitive substring matching against the active DetectionRules;
 * false negatives fall through to the `unknown` verdict.
 */

import { DEFAULT_DETECTION_RULES, type DetectionRules } from '../config/detection.js';

export type PageVerdict = 'protection' | 'captcha' | 'success' | 'unknown';

export interface PageSnapshot {
  text: string;
  url: string;
  frameUrls: string[];
}

export interface Classification {
  verdict: PageVerdict;
  /** The pattern that decided the verdict, if any */
  matched: string | null;
}

function firstMatch(haystacks: string[], needles: readonly string[]): string | null {
  const lowered = haystacks.filter(Boolean).map((h) => h.toLowerCase());
  for (const needle of needles) {
    const n = needle.toLowerCase();
    if (lowered.some((h) => h.includes(n))) return needle;
  }
  return null;
}

export function matchProtectionHost(
  url: string,
  frameUrls: string[],
  rules: DetectionRules = DEFAULT_DETECTION_RULES,
): string | null {
  return firstMatch([url, ...frameUrls], rules.protectionHosts);
}

export function matchCaptchaKeyword(
  pageText: string,
  rules: DetectionRules = DEFAULT_DETECTION_RULES,
): string | null {
  return firstMatch([pageText], rules.captchaKeywords);
}

export function matchSuccessIndicator(
  pageText: string,
  url: string,
  rules: DetectionRules = DEFAULT_DETECTION_RULES,
): string | null {
  return firstMatch([pageText, url], rules.successIndicators);
}

/** True if a known bot-protection host appears in the page URL or any frame URL. */
export function looksLikeProtection(
  url: string,
  frameUrls: string[],
  rules: DetectionRules = DEFAULT_DETECTION_RULES,
): boolean {
  return matchProtectionHost(url, frameUrls, rules) !== null;
}

export function looksLikeCaptcha(pageText: string, rules: DetectionRules = DEFAULT_DETECTION_RULES): boolean {
  return matchCaptchaKeyword(pageText, rules) !== null;
}

export function looksLikeSuccess(
  pageText: string,
  url: string,
  rules: DetectionRules = DEFAULT_DETECTION_RULES,
): boolean {
  return matchSuccessIndicator(pageText, url, rules) !== null;
}

/**
 * Classify a page after the final submit (or on resume).
 *
 * Challenge evidence always beats success evidence: a welcome message
 * rendered next to a challenge banner is still a challenge.
 */
export function classifyPage(
  snapshot: PageSnapshot,
  rules: DetectionRules = DEFAULT_DETECTION_RULES,
): Classification {
  const captcha = matchCaptchaKeyword(snapshot.text, rules);
  if (captcha) return { verdict: 'captcha', matched: captcha };

  const host = matchProtectionHost(snapshot.url, snapshot.frameUrls, rules);
  if (host) return { verdict: 'protection', matched: host };

  const success = matchSuccessIndicator(snapshot.text, snapshot.url, rules);
  if (success) return { verdict: 'success', matched: success };

  return { verdict: 'unknown', matched: null };
}
