export const PBKDF2_PARAMS = {
  method: 'pbkdf2',
  digest: 'sha256',
  iterations: 600_000,
  hashLength: 32,     // bytes
  saltLength: 16,     // characters, drawn from TOKEN_ALPHABET
} as const;

export const TOKEN_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
