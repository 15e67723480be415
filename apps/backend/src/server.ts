import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { buildApp } from './app.js';
import { config } from './config/index.js';
import { db, pool } from './db/index.js';
import { runSeed } from './db/seed.js';

async function main(): Promise<void> {
  const app = await buildApp();

  // Run database migrations before accepting traffic
  try {
    await migrate(db, {
      migrationsFolder: new URL('./db/migrations', import.meta.url).pathname,
    });
    app.log.info({ service: 'Server' }, 'Database migrations complete');
  } catch (err) {
    app.log.error({ service: 'Server', err }, 'Database migration failed');
    await pool.end();
    process.exit(1);
  }

  // Seed the initial admin; non-fatal if it fails
  try {
    await runSeed(db, app.log);
  } catch (err) {
    app.log.warn({ service: 'Server', err }, 'Database seed failed, continuing startup');
  }

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ service: 'Server', signal }, 'Shutting down');
    await app.close();
    await pool.end();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((err: unknown) => {
      app.log.error({ service: 'Server', err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      { service: 'Server', port: config.port, host: config.host, env: config.nodeEnv },
      'Bookledger backend started',
    );
  } catch (err) {
    app.log.error({ service: 'Server', err }, 'Failed to start server');
    await pool.end();
    process.exit(1);
  }
}

void main();
