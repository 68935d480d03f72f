import knex, { Knex } from 'knex';
import { types } from 'pg';
import { appConfig } from './index';
import { logger } from './logger';

// Calendar dates stay 'YYYY-MM-DD' strings; money comes back as numbers
const PG_DATE_OID = 1082;
const PG_NUMERIC_OID = 1700;
const PG_INT8_OID = 20;
types.setTypeParser(PG_DATE_OID, (value: string) => value);
types.setTypeParser(PG_NUMERIC_OID, (value: string) => parseFloat(value));
types.setTypeParser(PG_INT8_OID, (value: string) => parseInt(value, 10));

interface KnexQueryData {
  __knexQueryUid: string;
  sql?: string;
}

// Build database configuration from appConfig
export function buildDatabaseConfig(database: string = appConfig.database.database): Knex.Config {
  return {
    client: 'pg',
    connection: {
      host: appConfig.database.host,
      port: appConfig.database.port,
      user: appConfig.database.user,
      password: appConfig.database.password,
      database,
      ssl: appConfig.database.ssl,
    },
    pool: {
      min: appConfig.database.pool.min,
      max: appConfig.database.pool.max,
      acquireTimeoutMillis: 30000,
      createTimeoutMillis: 30000,
      idleTimeoutMillis: 30000,
      reapIntervalMillis: 1000,
      createRetryIntervalMillis: 100,
    },
    log: {
      warn: (message: string) => {
        logger.warn({ message: 'Knex warning', details: message });
      },
      error: (message: string) => {
        logger.error({ message: 'Knex error', details: message });
      },
      deprecate: (message: string) => {
        logger.warn({ message: 'Knex deprecation', details: message });
      },
      debug: (message: string) => {
        if (appConfig.isDevelopment) {
          logger.debug({ message: 'Knex debug', details: message });
        }
      },
    },
  };
}

/**
 * Log queries slower than the configured threshold.
 */
export function attachQueryProfiling(instance: Knex, thresholdMs: number): void {
  const queryTimes = new Map<string, number>();

  const finish = (queryData: KnexQueryData) => {
    const startTime = queryTimes.get(queryData.__knexQueryUid);
    if (startTime === undefined) {
      return;
    }
    queryTimes.delete(queryData.__knexQueryUid);
    const duration = Date.now() - startTime;
    if (duration > thresholdMs) {
      logger.warn({
        message: 'Slow query detected',
        query: (queryData.sql || '').substring(0, 200),
        duration,
        threshold: thresholdMs,
      });
    }
  };

  instance.on('query', (queryData: KnexQueryData) => {
    queryTimes.set(queryData.__knexQueryUid, Date.now());
  });
  instance.on('query-response', (_response: unknown, queryData: KnexQueryData) => finish(queryData));
  instance.on('query-error', (_error: unknown, queryData: KnexQueryData) => finish(queryData));
}

let dbInstance: Knex | null = null;

export function getDb(): Knex {
  if (!dbInstance) {
    dbInstance = knex(buildDatabaseConfig());
    attachQueryProfiling(dbInstance, appConfig.database.slowQueryThreshold);
  }
  return dbInstance;
}

// Test database connection
export async function testConnection(instance: Knex = getDb()): Promise<boolean> {
  try {
    const startTime = Date.now();
    await instance.raw('SELECT 1');
    const duration = Date.now() - startTime;

    logger.info({
      message: 'Database connection test successful',
      duration,
      config: {
        host: appConfig.database.host,
        port: appConfig.database.port,
        database: appConfig.database.database,
      },
    });

    return true;
  } catch (error) {
    logger.error({
      message: 'Database connection failed',
      error: error instanceof Error ? error.message : String(error),
      config: {
        host: appConfig.database.host,
        port: appConfig.database.port,
        database: appConfig.database.database,
      },
    });
    return false;
  }
}

// Graceful shutdown
export async function closeConnection(): Promise<void> {
  if (!dbInstance) {
    return;
  }
  try {
    await dbInstance.destroy();
    dbInstance = null;
    logger.info('Database connection closed');
  } catch (error) {
    logger.error({
      message: 'Error closing database connection',
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
