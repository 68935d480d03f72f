import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

// Load environment variables based on NODE_ENV
const env = process.env.NODE_ENV || 'development';
const envFile = env === 'production' ? '.env.production' : '.env.local';

// Load .env file
dotenv.config({ path: path.resolve(process.cwd(), envFile) });
// Also load base .env if it exists
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

// Configuration schema validation
const configSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  PORT: z.string().default('3000'),
  HOST: z.string().default('0.0.0.0'),

  // Database
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.string().default('5432'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('password'),
  DB_NAME: z.string().default('swap_ledger'),
  DB_SSL: z.string().optional(),
  DB_POOL_MIN: z.string().default('2'),
  DB_POOL_MAX: z.string().default('10'),

  // CORS
  CORS_ORIGIN: z.string().default('*'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE_PATH: z.string().default('./logs'),
  SLOW_QUERY_THRESHOLD: z.string().regex(/^\d+$/).default('1000'), // milliseconds

  // Redis
  REDIS_HOST: z.string().default('127.0.0.1'),
  REDIS_PORT: z.string().default('6379'),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.string().default('0'),

  // Ledger
  BUSINESS_TIMEZONE: z.string().default('Asia/Kolkata'),
  PENALTY_GRACE_DAYS: z.string().regex(/^\d+$/).default('4'),
  PENALTY_DAILY_RATE: z.string().regex(/^\d+(\.\d{1,2})?$/).default('80'),
  PAY_PER_SWAP_PRICE: z.string().regex(/^\d+(\.\d{1,2})?$/).default('35'),
  DEFAULT_GST_PERCENTAGE: z.string().regex(/^\d+(\.\d{1,2})?$/).default('18'),
  LEAVES_PER_MONTH: z.string().regex(/^\d+$/).default('4'),

  // Development
  AUTO_INIT_DB: z.string().default('true'), // Auto-create database and run migrations on startup
});

// Parse and validate environment variables
function getConfig() {
  try {
    return configSchema.parse({
      ...process.env,
      NODE_ENV: env,
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      process.exit(1);
    }
    throw error;
  }
}

const config = getConfig();

// Export typed configuration
export const appConfig = {
  // Server
  env: config.NODE_ENV,
  port: parseInt(config.PORT),
  host: config.HOST,
  isDevelopment: config.NODE_ENV === 'development',
  isProduction: config.NODE_ENV === 'production',
  isTest: config.NODE_ENV === 'test',

  // Database
  database: {
    host: config.DB_HOST,
    port: parseInt(config.DB_PORT),
    user: config.DB_USER,
    password: config.DB_PASSWORD,
    database: config.DB_NAME,
    ssl: config.DB_SSL === 'true' ? { rejectUnauthorized: false } : false,
    pool: {
      min: parseInt(config.DB_POOL_MIN),
      max: parseInt(config.DB_POOL_MAX),
    },
    slowQueryThreshold: parseInt(config.SLOW_QUERY_THRESHOLD),
  },

  // CORS
  cors: {
    origin: config.CORS_ORIGIN.split(',').map((o) => o.trim()),
  },

  // Logging
  logging: {
    level: config.LOG_LEVEL,
    filePath: config.LOG_FILE_PATH,
  },

  // Redis
  redis: {
    host: config.REDIS_HOST,
    port: parseInt(config.REDIS_PORT),
    password: config.REDIS_PASSWORD,
    db: parseInt(config.REDIS_DB),
  },

  // Ledger rules
  ledger: {
    timezone: config.BUSINESS_TIMEZONE,
    penalty: {
      gracePeriodDays: parseInt(config.PENALTY_GRACE_DAYS),
      dailyRate: parseFloat(config.PENALTY_DAILY_RATE),
    },
    payPerSwapPrice: parseFloat(config.PAY_PER_SWAP_PRICE),
    defaultGstPercentage: parseFloat(config.DEFAULT_GST_PERCENTAGE),
    leavesPerMonth: parseInt(config.LEAVES_PER_MONTH),
  },

  // Development
  autoInitDb: config.AUTO_INIT_DB === 'true',
};

export type LedgerRules = typeof appConfig.ledger;

export default appConfig;
