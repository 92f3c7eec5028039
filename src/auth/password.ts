/**
 * Credential hashing.
 *
 * PBKDF2 with a per-credential random salt. Stored as
 * `iterations:salt:derivedKey` so the work factor can be raised without
 * invalidating existing hashes.
 */

import { pbkdf2, randomBytes, timingSafeEqual } from 'crypto';
import { promisify } from 'util';

const pbkdf2Async = promisify(pbkdf2);

const PBKDF2_KEYLEN = 64;
const PBKDF2_DIGEST = 'sha512';
const SALT_BYTES = 32;

export const DEFAULT_PBKDF2_ITERATIONS = 100_000;

export class PasswordHasher {
  constructor(private readonly iterations: number = DEFAULT_PBKDF2_ITERATIONS) {}

  /** Hash a password with a fresh random salt. */
  async hash(password: string): Promise<string> {
    const salt = randomBytes(SALT_BYTES).toString('hex');
    const derived = await pbkdf2Async(password, salt, this.iterations, PBKDF2_KEYLEN, PBKDF2_DIGEST);
    return `${this.iterations}:${salt}:${derived.toString('hex')}`;
  }

  /**
   * Verify a password against a stored hash.
   * Uses constant-time comparison; malformed hashes never match.
   */
  async verify(password: string, storedHash: string): Promise<boolean> {
    const [iterationsPart, salt, expectedKey] = storedHash.split(':');
    const iterations = Number(iterationsPart);
    if (!Number.isInteger(iterations) || iterations <= 0 || !salt || !expectedKey) return false;
    const derived = await pbkdf2Async(password, salt, iterations, PBKDF2_KEYLEN, PBKDF2_DIGEST);
    const expected = Buffer.from(expectedKey, 'hex');
    if (derived.length !== expected.length) return false;
    return timingSafeEqual(derived, expected);
  }
}
