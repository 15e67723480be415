import * as argon2 from 'argon2';
import type { BaseLogger } from 'pino';
import type { Database } from './index.js';
import { users } from './schema/index.js';

// Initial admin account: override via environment variables
const ADMIN_USERNAME = process.env.SEED_ADMIN_USERNAME || 'admin';
const ADMIN_EMAIL = process.env.SEED_ADMIN_EMAIL || 'admin@bookledger.local';
const ADMIN_PASSWORD = process.env.SEED_ADMIN_PASSWORD || 'changeme';
const ADMIN_FULL_NAME = process.env.SEED_ADMIN_FULL_NAME || 'Administrator';

/**
 * Idempotent: an existing account with the same username or email is left
 * untouched. Returns true when the admin was created by this call.
 */
export async function runSeed(database: Database, log: BaseLogger): Promise<boolean> {
  const passwordHash = await argon2.hash(ADMIN_PASSWORD);

  const created = await database
    .insert(users)
    .values({
      username: ADMIN_USERNAME,
      email: ADMIN_EMAIL.toLowerCase(),
      fullName: ADMIN_FULL_NAME,
      passwordHash,
      role: 'admin',
    })
    .onConflictDoNothing()
    .returning({ id: users.id });

  if (created.length > 0) {
    log.info({ service: 'Seed', username: ADMIN_USERNAME }, 'Admin user created');
    if (!process.env.SEED_ADMIN_PASSWORD) {
      log.warn({ service: 'Seed' }, 'Admin created with the default password; change it');
    }
    return true;
  }

  log.debug({ service: 'Seed', username: ADMIN_USERNAME }, 'Admin user already present');
  return false;
}
