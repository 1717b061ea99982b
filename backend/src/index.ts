export { buildServices, getServices, type Services } from './app.js';
export { AccountManager, type AccountManagerOptions, type ResetIssued } from './services/accounts.js';
export { AccessIssuer } from './services/access.js';
export { AttendanceLedger, coerceStatus, type MarkInput } from './services/attendance.js';
export { startExpirySweep, type ExpirySweep } from './services/sweeper.js';
export { rejectingVerifier, type SecondFactorVerifier } from './services/two-factor.js';
export { generateToken, hashPassword, verifyPassword } from './utils/crypto.js';
export {
  DuplicateKeyError,
  StorageError,
  openStore,
  selectBackend,
  type BackendSelection,
  type DocumentCollection,
  type Filter,
  type Store,
  type StoreOptions,
  type Update,
} from './store/index.js';
export { createJsonFileStore, JsonFileCollection } from './store/json-file.js';
export { createDynamoStore, createTableClient, DynamoCollection, type TableClient } from './store/dynamodb.js';
