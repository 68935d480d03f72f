import { FastifyReply } from 'fastify';
import type { ErrorCode } from './error-handler.util';

export interface StandardResponse<T> {
  success: true;
  data: T;
  message?: string;
}

export interface ErrorResponse {
  success: false;
  error: string;
  code?: ErrorCode;
  details?: unknown;
}

/**
 * Send a successful response
 */
export function sendSuccess<T>(reply: FastifyReply, data: T, statusCode: number = 200, message?: string): void {
  const response: StandardResponse<T> = {
    success: true,
    data,
    ...(message && { message }),
  };
  reply.code(statusCode).send(response);
}

/**
 * Send an error response
 */
export function sendError(
  reply: FastifyReply,
  statusCode: number,
  error: string,
  code?: ErrorCode,
  details?: unknown
): void {
  const response: ErrorResponse = {
    success: false,
    error,
    ...(code && { code }),
    ...(details !== undefined && { details }),
  };
  reply.code(statusCode).send(response);
}
