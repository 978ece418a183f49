/**
 * Apply pending migrations.
 * Usage: npm run migrate --workspace @claimaudit/backend
 */
import { db } from './connection.js';
import { logger } from '../logger.js';

async function main(): Promise<void> {
  try {
    const [batch, applied]: [number, string[]] = await db.migrate.latest();
    if (applied.length === 0) {
      logger.info('Database schema is up to date');
    } else {
      logger.info({ batch, applied }, 'Applied migrations');
    }
  } finally {
    await db.destroy();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Migration failed');
  process.exit(1);
});
