import { loadConfig } from '../config';
import { createPool } from '../db/client';
import { readSchema, SCHEMA_PATH } from '../db/schema';
import { createLogger } from '../utils/logger';

/**
 * Database migration script
 * Runs the schema.sql file to set up the database
 */
async function migrate(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('migrate', config.logLevel);
  const pool = createPool(config.database, logger);

  try {
    logger.info('Starting database migration...', { schema: SCHEMA_PATH });
    await pool.query(readSchema());

    logger.info('Database migration completed successfully');
  } finally {
    await pool.end();
  }
}

migrate().then(
  () => process.exit(0),
  (error) => {
    createLogger('migrate').error('Database migration failed', error);
    process.exit(1);
  }
);
