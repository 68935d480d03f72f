import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { appConfig } from './index';

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

function rotatingFile(name: string, maxFiles: string, level?: string): DailyRotateFile {
  return new DailyRotateFile({
    filename: path.join(appConfig.logging.filePath, `${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles,
    format: logFormat,
    level,
  });
}

// Tests log to a silenced console only, so no files are written
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: appConfig.isProduction ? logFormat : consoleFormat,
    level: appConfig.logging.level,
    silent: appConfig.isTest,
  }),
];

if (!appConfig.isTest) {
  transports.push(
    rotatingFile('application', '14d', appConfig.logging.level),
    rotatingFile('error', '30d', 'error')
  );
}

export const logger = winston.createLogger({
  level: appConfig.logging.level,
  format: logFormat,
  transports,
  ...(appConfig.isTest
    ? {}
    : {
        exceptionHandlers: [rotatingFile('exceptions', '30d')],
        rejectionHandlers: [rotatingFile('rejections', '30d')],
      }),
});

// Stream for Fastify
export const loggerStream = {
  write: (message: string) => {
    logger.info(message.trim());
  },
};
