import type { EnvironmentConfig, EnvironmentName } from '../types/environment.js';

export const devConfig: EnvironmentConfig = {
  environment: 'dev',
  region: 'us-east-1',
  adminUsername: 'admin',
  features: {
    honeypotEnabled: true,
    exposeResetTokens: true,
  },
  session: {
    tokenExpiryHours: 12,
  },
  storage: {
    backend: 'file',
    fallbackToFile: true,
  },
  access: {
    publicBaseUrl: 'http://localhost:8501',
    sweepIntervalMinutes: 15,
  },
};

export const betaConfig: EnvironmentConfig = {
  environment: 'beta',
  region: 'us-east-1',
  adminUsername: 'admin',
  features: {
    honeypotEnabled: true,
    exposeResetTokens: false,
  },
  session: {
    tokenExpiryHours: 12,
  },
  storage: {
    backend: 'dynamodb',
    fallbackToFile: false,
  },
  access: {
    publicBaseUrl: 'https://beta.rollcall.example.com',
    sweepIntervalMinutes: 15,
  },
};

export const prodConfig: EnvironmentConfig = {
  environment: 'prod',
  region: 'us-east-1',
  adminUsername: 'admin',
  features: {
    honeypotEnabled: true,
    exposeResetTokens: false,
  },
  session: {
    tokenExpiryHours: 8,
  },
  storage: {
    backend: 'dynamodb',
    fallbackToFile: false,
  },
  access: {
    publicBaseUrl: 'https://rollcall.example.com',
    sweepIntervalMinutes: 60,
  },
};

const configs: Record<EnvironmentName, EnvironmentConfig> = {
  dev: devConfig,
  beta: betaConfig,
  prod: prodConfig,
};

function isEnvironmentName(env: string): env is EnvironmentName {
  return Object.hasOwn(configs, env);
}

export function getEnvironmentConfig(env: string): EnvironmentConfig {
  if (!isEnvironmentName(env)) {
    throw new Error(`Unknown environment: ${env}. Valid: dev, beta, prod`);
  }
  return configs[env];
}
