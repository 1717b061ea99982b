export type EnvironmentName = 'dev' | 'beta' | 'prod';

export type StorageBackendName = 'dynamodb' | 'file';

export interface FeatureFlags {
  honeypotEnabled: boolean;
  // Reset tokens are returned in the HTTP response instead of being mailed.
  exposeResetTokens: boolean;
}

export interface SessionConfig {
  tokenExpiryHours: number;
}

export interface StorageConfig {
  backend: StorageBackendName;
  fallbackToFile: boolean;
}

export interface AccessConfig {
  publicBaseUrl: string;
  sweepIntervalMinutes: number;
}

export interface EnvironmentConfig {
  environment: EnvironmentName;
  region: string;
  adminUsername: string;
  features: FeatureFlags;
  session: SessionConfig;
  storage: StorageConfig;
  access: AccessConfig;
}
