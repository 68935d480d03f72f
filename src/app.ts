import { randomUUID } from 'crypto';
import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { Knex } from 'knex';
import { appConfig } from './config';
import { getDb, testConnection } from './config/database';
import { loggerStream } from './config/logger';
import { errorHandler } from './middleware/error-handler';
import { adminRoutes } from './routes/admin.routes';
import { driversRoutes } from './routes/drivers.routes';
import { dskRoutes } from './routes/dsk.routes';
import { invoicesRoutes } from './routes/invoices.routes';
import { leavesRoutes } from './routes/leaves.routes';
import { plansRoutes } from './routes/plans.routes';
import { stationsRoutes } from './routes/stations.routes';
import { subscriptionsRoutes } from './routes/subscriptions.routes';
import { swapsRoutes } from './routes/swaps.routes';
import { createLedgerServices } from './services';
import { LedgerServiceOptions } from './types';

export interface ServerDependencies {
  db?: Knex;
  options?: LedgerServiceOptions;
  /** Reports Redis reachability on /health; omitted means events are disabled. */
  redisHealth?: () => Promise<boolean>;
}

export async function buildServer(deps: ServerDependencies = {}): Promise<FastifyInstance> {
  const db = deps.db ?? getDb();
  const services = createLedgerServices(db, deps.options);

  const fastify = Fastify({
    logger: appConfig.isTest
      ? false
      : {
          stream: loggerStream,
          level: appConfig.logging.level,
        },
    requestIdLogLabel: 'reqId',
    genReqId: () => randomUUID(),
  });

  // Register plugins
  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(cors, {
    origin: appConfig.cors.origin,
    credentials: true,
  });

  // Swagger documentation
  await fastify.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: 'Swap Ledger API',
        description: `Entitlement and billing ledger for battery-swap subscriptions.

- Swaps are decided covered or charged against the driver's current plan; charged swaps produce invoices numbered \`INV-YYYYMM-NNNNNN\`.
- Penalties for unreturned batteries are computed on read and materialized only by \`POST /api/admin/sweeps/penalties\`.
- Dates are calendar dates in the ${appConfig.ledger.timezone} business timezone.`,
        version: '1.0.0',
      },
      servers: [
        {
          url: `http://localhost:${appConfig.port}`,
          description: appConfig.isProduction ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'Drivers', description: 'Driver registry' },
        { name: 'Entitlements', description: 'Current subscriptions, quota and custody' },
        { name: 'Subscriptions', description: 'Subscription lifecycle and battery custody' },
        { name: 'Swaps', description: 'Swap recording and history' },
        { name: 'Invoices', description: 'Invoice lookup and payment status' },
        { name: 'Penalties', description: 'Overdue battery penalties' },
        { name: 'Leaves', description: 'Monthly leave allowance and requests' },
        { name: 'Plans', description: 'Subscription plan catalog' },
        { name: 'Stations', description: 'Nearest swap stations' },
        { name: 'DSK', description: 'Driver service kiosks' },
        { name: 'Admin', description: 'Sweeps and settlements run by scheduled jobs' },
      ],
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
    staticCSP: true,
    transformStaticCSP: (header) => header,
  });

  // Set error handler
  fastify.setErrorHandler(errorHandler);

  // Health check
  fastify.get('/health', async () => {
    const dbConnected = await testConnection(db);
    const redisConnected = deps.redisHealth ? await deps.redisHealth() : null;
    return {
      status: dbConnected ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: appConfig.env,
      database: dbConnected ? 'connected' : 'disconnected',
      redis: redisConnected === null ? 'disabled' : redisConnected ? 'connected' : 'disconnected',
    };
  });

  // Register routes
  await fastify.register(driversRoutes, { prefix: '/api/drivers', services });
  await fastify.register(subscriptionsRoutes, { prefix: '/api/subscriptions', services });
  await fastify.register(swapsRoutes, { prefix: '/api/swaps', services });
  await fastify.register(invoicesRoutes, { prefix: '/api/invoices', services });
  await fastify.register(leavesRoutes, { prefix: '/api/leaves', services });
  await fastify.register(plansRoutes, { prefix: '/api/plans', services });
  await fastify.register(stationsRoutes, { prefix: '/api/stations', services });
  await fastify.register(dskRoutes, { prefix: '/api/dsk', services });
  await fastify.register(adminRoutes, { prefix: '/api/admin', services });

  return fastify;
}
