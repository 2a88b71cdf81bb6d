import { randomInt } from 'node:crypto';

const LOWER = 'abcdefghijklmnopqrstuvwxyz';
const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DIGITS = '0123456789';
const SYMBOLS = '!@#$%^&*';
const ALPHABET = LOWER + UPPER + DIGITS + SYMBOLS;

export interface Credentials {
  email: string;
  password: string;
}

/**
 * Mailbox address derived from the applicant's CURP: its first four
 * characters, lower-cased, plus a random three-digit suffix.
 */
export function generateEmail(curp: string, domain = 'outlook.com'): string {
  const trimmed = curp.trim();
  const core = trimmed ? trimmed.slice(0, 4).toLowerCase() : 'user';
  const suffix = randomInt(100, 1000);
  return `${core}${suffix}@${domain}`;
}

/**
 * Random password over mixed case, digits and `!@#$%^&*`, with at least one
 * character from each class.
 */
export function generatePassword(length = 12): string {
  if (!Number.isInteger(length) || length < 4) {
    throw new RangeError(`Password length must be an integer >= 4 (got ${length})`);
  }

  const chars = [LOWER, UPPER, DIGITS, SYMBOLS].map(pick);
  while (chars.length < length) {
    chars.push(pick(ALPHABET));
  }

  // Fisher-Yates so the guaranteed characters are not always up front
  for (let i = chars.length - 1; i > 0; i--) {
    const j = randomInt(0, i + 1);
    [chars[i], chars[j]] = [chars[j], chars[i]];
  }
  return chars.join('');
}

export function generateCredentials(curp: string, options: { domain?: string; passwordLength?: number } = {}): Credentials {
  return {
    email: generateEmail(curp, options.domain),
    password: generatePassword(options.passwordLength),
  };
}

function pick(pool: string): string {
  return pool.charAt(randomInt(0, pool.length));
}
