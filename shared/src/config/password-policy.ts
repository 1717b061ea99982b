export const PASSWORD_MIN_LENGTH = 8;

export const PASSWORD_SYMBOLS = '@$!%*?&';

export type PasswordRejection = 'EMPTY_PASSWORD' | 'TOO_SHORT' | 'WEAK_PASSWORD';

export type PasswordValidationResult =
  | { valid: true }
  | { valid: false; reason: PasswordRejection };

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

// One lookahead per character class; the symbol class is the fixed set above.
const STRENGTH_PATTERN = /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d)(?=.*[@$!%*?&]).+$/s;

// Shape check only: no MX lookup, no deliverability.
export function validateEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

export function validatePassword(password: string): PasswordValidationResult {
  if (!password) {
    return { valid: false, reason: 'EMPTY_PASSWORD' };
  }
  if (password.length < PASSWORD_MIN_LENGTH) {
    return { valid: false, reason: 'TOO_SHORT' };
  }
  if (!STRENGTH_PATTERN.test(password)) {
    return { valid: false, reason: 'WEAK_PASSWORD' };
  }
  return { valid: true };
}
