import { describe, it, expect } from 'vitest';
import { hashPassword, verifyPassword, generateToken } from './crypto.js';
import { LIMITS, PBKDF2_PARAMS } from '@rollcall/shared';

// Real PBKDF2 calls at full strength, allow extra time
describe('hashPassword / verifyPassword', { timeout: 30_000 }, () => {
  it('returns a self-describing pbkdf2 hash string', async () => {
    const hash = await hashPassword('TestPassword1!');
    expect(hash).toMatch(/^pbkdf2:sha256:600000\$[A-Za-z0-9]{16}\$[0-9a-f]{64}$/);
  });

  it('verifies the correct password', async () => {
    const hash = await hashPassword('CorrectHorse42!');
    await expect(verifyPassword('CorrectHorse42!', hash)).resolves.toBe(true);
  });

  it('rejects a wrong password', async () => {
    const hash = await hashPassword('CorrectHorse42!');
    await expect(verifyPassword('WrongPassword1!', hash)).resolves.toBe(false);
  });

  it('produces a different hash each time (unique salts)', async () => {
    const [h1, h2] = await Promise.all([hashPassword('SamePassword1!'), hashPassword('SamePassword1!')]);
    expect(h1).not.toBe(h2);
  });

  it('rejects hashes it cannot parse', async () => {
    await expect(verifyPassword('anything', '$2b$12$notpbkdf2')).resolves.toBe(false);
    await expect(verifyPassword('anything', '')).resolves.toBe(false);
  });

  it('uses the iteration count stored in the hash', async () => {
    const hash = await hashPassword('Iterations1!');
    const lowered = hash.replace(`:${PBKDF2_PARAMS.iterations}$`, ':1000$');
    // Same salt and digest but fewer rounds no longer matches
    await expect(verifyPassword('Iterations1!', lowered)).resolves.toBe(false);
  });
});

describe('generateToken', () => {
  it('defaults to the configured token length', () => {
    expect(generateToken()).toHaveLength(LIMITS.TOKEN_LENGTH);
  });

  it('returns exactly the requested length', () => {
    expect(generateToken(1)).toHaveLength(1);
    expect(generateToken(16)).toHaveLength(16);
    expect(generateToken(200)).toHaveLength(200);
  });

  it('only contains alphanumeric characters', () => {
    expect(generateToken(500)).toMatch(/^[A-Za-z0-9]{500}$/);
  });

  it('produces unique values across calls', () => {
    const values = new Set(Array.from({ length: 50 }, () => generateToken()));
    expect(values.size).toBe(50);
  });

  it('uses the whole alphabet', () => {
    const seen = new Set(generateToken(5000));
    expect(seen.size).toBe(62);
  });

  it('rejects lengths that are not positive integers', () => {
    expect(() => generateToken(0)).toThrow(RangeError);
    expect(() => generateToken(-4)).toThrow(RangeError);
    expect(() => generateToken(2.5)).toThrow(RangeError);
  });
});
