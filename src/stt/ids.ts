import crypto from 'crypto';

/** Random 128-bit token rendered as 32 lower-case hex characters. */
export function newToken(): string {
  return crypto.randomBytes(16).toString('hex');
}
