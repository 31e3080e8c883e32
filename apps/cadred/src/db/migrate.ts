import { drizzle } from 'drizzle-orm/postgres-js';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { resolve } from 'path';
import postgres from 'postgres';

import { PROJECT_ROOT, config } from '../config.js';
import { logger } from '../logger.js';

async function main() {
  logger.info('Running migrations...');

  const client = postgres(config.databaseUrl, { max: 1 });
  const db = drizzle(client);

  await migrate(db, { migrationsFolder: resolve(PROJECT_ROOT, 'drizzle') });

  logger.info('Migrations complete');
  await client.end();
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Migration failed');
  process.exitCode = 1;
});
