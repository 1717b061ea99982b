import { pbkdf2, createSHA256 } from 'hash-wasm';
import { randomBytes, timingSafeEqual } from 'crypto';
import { LIMITS, PBKDF2_PARAMS, TOKEN_ALPHABET } from '@rollcall/shared';

// Bytes at or above this value are discarded so each of the 62 symbols is
// equally likely (256 % 62 would otherwise favour the first eight).
const UNBIASED_LIMIT = 256 - (256 % TOKEN_ALPHABET.length);

const HASH_PATTERN = /^pbkdf2:sha256:(\d+)\$([^$]+)\$([0-9a-f]+)$/;

export function generateToken(length: number = LIMITS.TOKEN_LENGTH): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError(`Token length must be a positive integer, got ${length}`);
  }
  let token = '';
  while (token.length < length) {
    for (const byte of randomBytes(length * 2)) {
      if (byte >= UNBIASED_LIMIT) continue;
      token += TOKEN_ALPHABET[byte % TOKEN_ALPHABET.length];
      if (token.length === length) break;
    }
  }
  return token;
}

async function derive(password: string, salt: string, iterations: number): Promise<string> {
  return pbkdf2({
    password,
    salt,
    iterations,
    hashLength: PBKDF2_PARAMS.hashLength,
    hashFunction: createSHA256(),
  });
}

/**
 * Hash a password as `pbkdf2:sha256:<iterations>$<salt>$<hex digest>`.
 * The iteration count travels with the hash, so raising PBKDF2_PARAMS.iterations
 * later does not invalidate stored hashes.
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = generateToken(PBKDF2_PARAMS.saltLength);
  const digest = await derive(password, salt, PBKDF2_PARAMS.iterations);
  return `${PBKDF2_PARAMS.method}:${PBKDF2_PARAMS.digest}:${PBKDF2_PARAMS.iterations}$${salt}$${digest}`;
}

export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  const match = HASH_PATTERN.exec(hash);
  if (!match) return false;
  const [, iterations, salt, expectedHex] = match;
  const actual = Buffer.from(await derive(password, salt, Number(iterations)), 'hex');
  const expected = Buffer.from(expectedHex, 'hex');
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}
