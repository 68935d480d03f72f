import { appConfig } from './config';
import { testConnection, closeConnection } from './config/database';
import { logger } from './config/logger';
import { connectRedis, disconnectRedis, getRedisClient, testRedisConnection } from './config/redis';
import { buildServer } from './app';
import { DatabaseInitService } from './services/database-init.service';
import { LedgerEvents } from './services/ledger-events.service';

async function start() {
  try {
    // Initialize database (create if not exists, run migrations, seed)
    if (appConfig.autoInitDb) {
      logger.info('Initializing database (auto-create, migrations, seeds)...');
      try {
        const dbInitService = new DatabaseInitService();
        await dbInitService.initialize();
      } catch (error) {
        logger.warn({
          message: 'Database auto-initialization failed, continuing with connection test',
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    // Test database connection
    logger.info('Testing database connection...');
    const dbConnected = await testConnection();
    if (!dbConnected) {
      logger.error('Failed to connect to database. Exiting...');
      process.exit(1);
    }

    // Connect to Redis; the ledger runs without events if it is unavailable
    let events = new LedgerEvents();
    try {
      logger.info('Connecting to Redis...');
      await connectRedis();
      if (await testRedisConnection()) {
        events = new LedgerEvents(getRedisClient());
        logger.info('Redis connected successfully, ledger events enabled');
      } else {
        logger.warn('Redis ping failed, ledger events disabled');
      }
    } catch (error) {
      logger.warn({
        message: 'Redis connection failed, continuing without ledger events',
        error: error instanceof Error ? error.message : String(error),
      });
    }

    // Build and start server
    const server = await buildServer({ options: { events }, redisHealth: testRedisConnection });

    await server.listen({ port: appConfig.port, host: appConfig.host });

    logger.info({
      message: 'Server started successfully',
      port: appConfig.port,
      host: appConfig.host,
      environment: appConfig.env,
      docs: `http://${appConfig.host}:${appConfig.port}/docs`,
    });

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info({ message: `Received ${signal}, shutting down gracefully...` });

      try {
        await server.close();
        await closeConnection();
        await disconnectRedis();
        logger.info('Server closed successfully');
        process.exit(0);
      } catch (error) {
        logger.error({ error, message: 'Error during shutdown' });
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.error({
      message: 'Failed to start server',
      error: error instanceof Error ? { message: error.message, stack: error.stack, name: error.name } : String(error),
    });
    process.exit(1);
  }
}

void start();
