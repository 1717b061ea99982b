import { DATA_DIR, TABLES, config, configuredBackend, fileFallbackAllowed } from './config.js';
import { AccessIssuer } from './services/access.js';
import { AccountManager } from './services/accounts.js';
import { AttendanceLedger } from './services/attendance.js';
import { rosterDirectory } from './services/students.js';
import { startExpirySweep, type ExpirySweep } from './services/sweeper.js';
import { openStore, selectBackend, type BackendSelection, type Store } from './store/index.js';
import { probeDynamo } from './store/dynamodb.js';

export interface Services {
  selection: BackendSelection;
  accounts: AccountManager;
  access: AccessIssuer;
  attendance: AttendanceLedger;
  sweep: ExpirySweep | null;
}

export function buildServices(store: Store, selection: BackendSelection): Services {
  const attendance = new AttendanceLedger(store.attendance);
  return {
    selection,
    accounts: new AccountManager(store.users, { protectedUsername: config.adminUsername }),
    access: new AccessIssuer(store.sessions, store.links, attendance, rosterDirectory(store.students)),
    attendance,
    sweep: null,
  };
}

async function createServices(): Promise<Services> {
  const selection = await selectBackend(configuredBackend(), { fallbackToFile: fileFallbackAllowed() }, () =>
    probeDynamo(config.region, TABLES.users),
  );
  console.info(`Storage backend: ${selection.backend}${selection.fellBack ? ' (fallback)' : ''}`);
  const store = openStore(selection, { region: config.region, tables: TABLES, dataDir: DATA_DIR });
  const services = buildServices(store, selection);
  // DynamoDB expires items through its own TTL attribute.
  if (store.backend === 'file') {
    services.sweep = startExpirySweep(services.access, config.access.sweepIntervalMinutes * 60 * 1000);
  }
  return services;
}

let servicesPromise: Promise<Services> | undefined;

// The backend is chosen on first use and kept for the life of the process.
export function getServices(): Promise<Services> {
  servicesPromise ??= createServices().catch((err: unknown) => {
    servicesPromise = undefined;
    throw err;
  });
  return servicesPromise;
}
