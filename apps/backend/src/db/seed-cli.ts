import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { createLogger } from '../utils/logger.js';
import { db, pool } from './index.js';
import { runSeed } from './seed.js';

const logger = createLogger('Seed');

async function main(): Promise<void> {
  try {
    await migrate(db, {
      migrationsFolder: new URL('./migrations', import.meta.url).pathname,
    });
    await runSeed(db, logger);
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Seed failed');
  process.exit(1);
});
