import { describe, expect, test } from 'vitest';
import {
  classifyPage,
  looksLikeCaptcha,
  looksLikeProtection,
  looksLikeSuccess,
  matchProtectionHost,
} from '../../../src/detection/PageClassifier.js';
import type { DetectionRules } from '../../../src/config/detection.js';

const SIGNUP_URL = 'https://signup.live.com/signup';

describe('PageClassifier', () => {
  // ── Protection hosts ──────────────────────────────────────────────

  describe('looksLikeProtection', () => {
    test('matches a vendor host in the page URL', () => {
      expect(looksLikeProtection('https://iframe.arkoselabs.com/fc/gc', [])).toBe(true);
    });

    test('matches a vendor host in an embedded frame only', () => {
      expect(looksLikeProtection(SIGNUP_URL, ['https://client.hsprotect.net/challenge'])).toBe(true);
    });

    test('is case-insensitive', () => {
      expect(looksLikeProtection('https://CAPTCHA.PerimeterX.net/', [])).toBe(true);
    });

    test('returns false for the plain signup page', () => {
      expect(looksLikeProtection(SIGNUP_URL, ['https://signup.live.com/frame'])).toBe(false);
    });

    test('reports the matched host', () => {
      expect(matchProtectionHost(SIGNUP_URL, ['https://fpt.live.com/?session=1'])).toBe('fpt.live.com');
    });
  });

  // ── Text heuristics ───────────────────────────────────────────────

  describe('looksLikeCaptcha', () => {
    test.each([
      ['Please help us beat the robots'],
      ['PRESS AND HOLD the button'],
      ["Prove you're not a robot"],
      ['Enter the CAPTCHA characters'],
    ])('detects "%s"', (text) => {
      expect(looksLikeCaptcha(text)).toBe(true);
    });

    test('ignores ordinary form text', () => {
      expect(looksLikeCaptcha('Create a password. Enter the password you would like to use.')).toBe(false);
    });
  });

  describe('looksLikeSuccess', () => {
    test('matches the welcome text', () => {
      expect(looksLikeSuccess('Welcome to your new account', SIGNUP_URL)).toBe(true);
    });

    test('matches a post-signup URL', () => {
      expect(looksLikeSuccess('', 'https://outlook.live.com/mail/0/')).toBe(true);
    });

    test('returns false for an empty page', () => {
      expect(looksLikeSuccess('', SIGNUP_URL)).toBe(false);
    });
  });

  // ── classifyPage ──────────────────────────────────────────────────

  describe('classifyPage', () => {
    test('challenge text wins over a success phrase on the same page', () => {
      const result = classifyPage({ text: 'Welcome! Please solve this challenge', url: SIGNUP_URL, frameUrls: [] });
      expect(result).toEqual({ verdict: 'captcha', matched: 'solve this challenge' });
    });

    test('a protection frame wins over success', () => {
      const result = classifyPage({
        text: 'Welcome',
        url: SIGNUP_URL,
        frameUrls: ['https://client-api.arkoselabs.com/fc'],
      });
      expect(result).toEqual({ verdict: 'protection', matched: 'arkoselabs' });
    });

    test('success when only success evidence is present', () => {
      const result = classifyPage({ text: 'Welcome, your mailbox is ready', url: SIGNUP_URL, frameUrls: [] });
      expect(result).toEqual({ verdict: 'success', matched: 'welcome' });
    });

    test('unknown when nothing matches', () => {
      const result = classifyPage({ text: 'Enter your birth date', url: SIGNUP_URL, frameUrls: [] });
      expect(result).toEqual({ verdict: 'unknown', matched: null });
    });

    test('uses the supplied rules instead of the defaults', () => {
      const rules: DetectionRules = {
        protectionHosts: ['guard.example'],
        captchaKeywords: ['spot the bicycle'],
        successIndicators: ['all set'],
      };
      expect(classifyPage({ text: 'Welcome', url: SIGNUP_URL, frameUrls: [] }, rules).verdict).toBe('unknown');
      expect(classifyPage({ text: 'You are all set', url: SIGNUP_URL, frameUrls: [] }, rules).verdict).toBe(
        'success',
      );
      expect(
        classifyPage({ text: '', url: SIGNUP_URL, frameUrls: ['https://guard.example/x'] }, rules).verdict,
      ).toBe('protection');
    });
  });
});
