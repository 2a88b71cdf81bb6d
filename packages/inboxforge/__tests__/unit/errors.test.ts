import { describe, expect, test } from 'vitest';
import {
  InboxForgeError,
  InvalidJobState,
  JobNotFound,
  LaunchFailure,
  classifyError,
  errorMessage,
} from '../../src/errors.js';

describe('errors', () => {
  test('typed errors carry their code and stay instanceof the base class', () => {
    const err = new LaunchFailure('no msedge', 'msedge');
    expect(err).toBeInstanceOf(InboxForgeError);
    expect(err.code).toBe('launch_failed');
    expect(err.channel).toBe('msedge');
    expect(err.name).toBe('LaunchFailure');
  });

  test('InvalidJobState names both states in its message', () => {
    const err = new InvalidJobState('job-1', 'running', 'waiting_for_human');
    expect(err.message).toBe('Job not in waiting_for_human state (current=running)');
    expect(err.code).toBe('invalid_job_state');
  });

  test('JobNotFound uses the not_found code', () => {
    expect(new JobNotFound('job-1').code).toBe('not_found');
  });

  describe('classifyError', () => {
    test.each([
      ['Target page, context or browser has been closed', 'browser_closed'],
      ['Timeout 5000ms exceeded waiting for selector', 'timeout'],
      ['net::ERR_CONNECTION_REFUSED at https://signup.live.com', 'navigation_failed'],
      ["Executable doesn't exist at /opt/msedge", 'launch_failed'],
      ['something odd', 'internal_error'],
    ])('"%s" → %s', (message, code) => {
      expect(classifyError(new Error(message))).toBe(code);
    });

    test('typed errors keep their own code', () => {
      expect(classifyError(new JobNotFound('x'))).toBe('not_found');
    });

    test('non-Error values are classified by their string form', () => {
      expect(classifyError('request timed out')).toBe('timeout');
    });
  });

  test('errorMessage stringifies non-Error values', () => {
    expect(errorMessage(42)).toBe('42');
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });
});
