import path from 'path';
import knex, { Knex } from 'knex';
import { z } from 'zod';
import { appConfig } from '../config';
import { buildDatabaseConfig } from '../config/database';
import { logger } from '../config/logger';

// Migrations and seeds load with the extension this file runs under (.ts or .js)
const loadExtensions = [path.extname(__filename)];

const migrationsConfig: Knex.MigratorConfig = {
  tableName: 'knex_migrations',
  directory: path.resolve(__dirname, '../database/migrations'),
  loadExtensions,
};

const seedsConfig: Knex.SeederConfig = {
  directory: path.resolve(__dirname, '../database/seeds'),
  loadExtensions,
};

const pgRowsSchema = z.object({ rows: z.array(z.unknown()) });

/**
 * Database Initialization Service
 * Handles automatic database creation, migrations, and seeding
 */
export class DatabaseInitService {
  /**
   * Ensure main database exists, create if it doesn't
   */
  async ensureMainDatabase(): Promise<void> {
    const adminDb = knex({ ...buildDatabaseConfig('postgres'), pool: { min: 0, max: 1 } });
    const dbName = appConfig.database.database;

    try {
      const result = pgRowsSchema.parse(await adminDb.raw('SELECT 1 FROM pg_database WHERE datname = ?', [dbName]));

      if (result.rows.length === 0) {
        logger.info({ message: 'Main database does not exist, creating...', database: dbName });
        await adminDb.raw('CREATE DATABASE ??', [dbName]);
        logger.info({ message: 'Main database created successfully', database: dbName });
      } else {
        logger.debug({ message: 'Main database already exists', database: dbName });
      }
    } catch (error) {
      logger.error({
        message: 'Failed to ensure main database exists',
        error: error instanceof Error ? error.message : String(error),
        database: dbName,
      });
      throw error;
    } finally {
      await adminDb.destroy();
    }
  }

  /**
   * Run migrations on main database
   */
  async runMigrations(db: Knex): Promise<void> {
    try {
      logger.info({ message: 'Running database migrations...' });
      const [batchNo, log] = await db.migrate.latest(migrationsConfig);

      if (log.length === 0) {
        logger.info({ message: 'Database is up to date, no migrations to run' });
      } else {
        logger.info({ message: 'Migrations completed successfully', batch: batchNo, migrations: log });
      }
    } catch (error) {
      logger.error({
        message: 'Failed to run migrations',
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Run seeds on main database. Seeds upsert reference data, so re-running is safe.
   */
  async runSeeds(db: Knex): Promise<void> {
    try {
      logger.info({ message: 'Running database seeds...' });
      const [seedFiles] = await db.seed.run(seedsConfig);

      if (seedFiles.length === 0) {
        logger.info({ message: 'No seeds to run' });
      } else {
        logger.info({ message: 'Seeds completed successfully', seedFiles });
      }
    } catch (error) {
      // Reference data is optional for startup
      logger.error({
        message: 'Failed to run seeds',
        error: error instanceof Error ? error.message : String(error),
      });
      logger.warn({ message: 'Continuing without seeds' });
    }
  }

  /**
   * Initialize database: create, migrate, and seed
   */
  async initialize(): Promise<void> {
    await this.ensureMainDatabase();

    const db = knex(buildDatabaseConfig());
    try {
      await this.runMigrations(db);
      await this.runSeeds(db);
      logger.info({ message: 'Database initialization completed successfully' });
    } catch (error) {
      logger.error({
        message: 'Database initialization failed',
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      await db.destroy();
    }
  }
}
