import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import {
  COLLECTIONS,
  getEnvironmentConfig,
  type EnvironmentConfig,
  type StorageBackendName,
  type StorageConfig,
} from '@rollcall/shared';

const env = process.env.ENVIRONMENT || 'dev';

export const config: EnvironmentConfig = getEnvironmentConfig(env);

export const TABLES = {
  users: process.env.USERS_TABLE || `rollcall-${COLLECTIONS.USERS}-${env}`,
  attendance: process.env.ATTENDANCE_TABLE || `rollcall-${COLLECTIONS.ATTENDANCE}-${env}`,
  sessions: process.env.SESSIONS_TABLE || `rollcall-${COLLECTIONS.SESSIONS}-${env}`,
  links: process.env.LINKS_TABLE || `rollcall-${COLLECTIONS.LINKS}-${env}`,
  students: process.env.STUDENTS_TABLE || `rollcall-${COLLECTIONS.STUDENTS}-${env}`,
};

export type TableNames = typeof TABLES;

export const DATA_DIR = process.env.DATA_DIR || 'data';

export function configuredBackend(): StorageBackendName {
  const override = process.env.STORAGE_BACKEND;
  if (override === 'dynamodb' || override === 'file') return override;
  return config.storage.backend;
}

// A Lambda container has no shared writable disk, so a file store there
// would hold state no other container sees.
export function fileFallbackAllowed(
  storage: Pick<StorageConfig, 'fallbackToFile'> = config.storage,
  runtime: NodeJS.ProcessEnv = process.env,
): boolean {
  return storage.fallbackToFile && !runtime.AWS_LAMBDA_FUNCTION_NAME;
}

let jwtSecretCache: string | undefined;

export async function getJwtSecret(): Promise<string> {
  if (jwtSecretCache) return jwtSecretCache;
  if (process.env.JWT_SECRET) {
    jwtSecretCache = process.env.JWT_SECRET;
    return jwtSecretCache;
  }
  const paramName = process.env.JWT_SECRET_PARAM;
  if (!paramName) throw new Error('JWT_SECRET or JWT_SECRET_PARAM env var is required');
  const ssm = new SSMClient({ region: config.region });
  const res = await ssm.send(new GetParameterCommand({ Name: paramName, WithDecryption: true }));
  if (!res.Parameter?.Value) throw new Error('JWT secret not found in SSM');
  jwtSecretCache = res.Parameter.Value;
  return jwtSecretCache;
}
