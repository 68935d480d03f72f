/**
 * Error taxonomy shared by the ledger services and the HTTP layer.
 *
 * NOT_FOUND, INVALID_INPUT and CONFLICT are thrown. Integrity violations are
 * never thrown: they are logged and reported on the returned view instead.
 */

import { FastifyReply } from 'fastify';
import { z, ZodError } from 'zod';
import { logger } from '../config/logger';
import { sendError } from './response.util';

export type ErrorCode = 'NOT_FOUND' | 'INVALID_INPUT' | 'CONFLICT' | 'INTERNAL_ERROR';

export class AppError extends Error {
  statusCode: number;
  code: ErrorCode;
  details?: unknown;

  constructor(message: string, statusCode: number = 500, code: ErrorCode = 'INTERNAL_ERROR', details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function zodIssues(error: ZodError): Array<{ field: string; message: string; code: string }> {
  return error.errors.map((issue) => ({
    field: issue.path.join('.') || 'unknown',
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Common error creators
 */
export const Errors = {
  notFound: (resource: string, id?: string) =>
    new AppError(`${resource} not found${id ? ` with ID: ${id}` : ''}`, 404, 'NOT_FOUND'),

  invalidInput: (message: string, details?: unknown) =>
    new AppError(message, 400, 'INVALID_INPUT', details),

  fromZod: (error: ZodError, message: string = 'Validation error') =>
    new AppError(message, 400, 'INVALID_INPUT', zodIssues(error)),

  conflict: (message: string, details?: unknown) =>
    new AppError(message, 409, 'CONFLICT', details),

  internal: (message: string = 'Internal server error') =>
    new AppError(message, 500, 'INTERNAL_ERROR'),
};

const RETRYABLE_PG_CODES = new Set(['40001', '40P01']);

/**
 * Serialization failure or deadlock reported by Postgres.
 */
export function isRetryableConflict(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    RETRYABLE_PG_CODES.has(error.code)
  );
}

/**
 * Parse untrusted input with a zod schema, raising INVALID_INPUT on failure.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw Errors.fromZod(result.error);
  }
  return result.data;
}

/**
 * Send standardized error response
 */
export function sendErrorResponse(reply: FastifyReply, error: unknown): void {
  if (error instanceof AppError) {
    sendError(reply, error.statusCode, error.message, error.code, error.details);
    return;
  }
  if (error instanceof ZodError) {
    sendError(reply, 400, 'Validation error', 'INVALID_INPUT', zodIssues(error));
    return;
  }
  logger.error({
    message: 'Unhandled error',
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  sendError(reply, 500, 'Internal server error', 'INTERNAL_ERROR');
}
