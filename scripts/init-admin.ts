#!/usr/bin/env npx tsx
/**
 * Rollcall admin initialisation script.
 *
 * Creates the admin account with a generated password when the users
 * collection is still empty. Run once after the first deploy, or once
 * against a fresh data directory for the file backend.
 *
 * Usage:
 *   ENVIRONMENT=dev npm run init-admin
 *   ADMIN_EMAIL=ops@school.example ENVIRONMENT=prod npm run init-admin
 *
 * The DynamoDB backend needs AWS credentials in the environment and the
 * tables to exist already.
 */

import { validatePassword } from '@rollcall/shared';
import { getServices } from '../backend/src/app.js';
import { config, DATA_DIR } from '../backend/src/config.js';
import { generateToken } from '../backend/src/utils/crypto.js';

// Alphanumeric tokens may miss a character class; draw until the policy accepts one.
function generateAdminPassword(): string {
  let password = '';
  do {
    password = `${generateToken(20)}!`;
  } while (!validatePassword(password).valid);
  return password;
}

async function main() {
  const adminUsername = config.adminUsername;
  const email = process.env.ADMIN_EMAIL ?? `${adminUsername}@rollcall.example.com`;
  const { accounts, selection } = await getServices();

  console.log(`\nRollcall Admin Init`);
  console.log(`  Environment : ${config.environment}`);
  console.log(`  Storage     : ${selection.backend}${selection.backend === 'file' ? ` (${DATA_DIR})` : ''}`);
  console.log(`  Admin user  : ${adminUsername}\n`);

  const password = generateAdminPassword();
  const result = await accounts.bootstrapAdmin({ username: adminUsername, password, email, name: 'Administrator' });
  if (!result.ok) {
    console.error(`✗ ${result.error.message}`);
    process.exit(1);
  }
  if (!result.data.created) {
    console.error(`✗ ${result.message}.`);
    console.error(`  Reset the admin password from an existing admin session instead.`);
    process.exit(1);
  }

  console.log(`✓ ${result.message}.\n`);
  console.log(`  Username : ${adminUsername}`);
  console.log(`  Password : ${password}\n`);
  console.log(`The password is shown only once. Change it after the first login.\n`);
}

main().catch(err => {
  console.error('Fatal:', err instanceof Error ? err.message : err);
  process.exit(1);
});
