import { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { appConfig } from '../config';
import { logger } from '../config/logger';
import { AppError, sendErrorResponse } from '../utils/error-handler.util';
import { sendError } from '../utils/response.util';

export function errorHandler(
  error: FastifyError | AppError | ZodError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  const context = {
    method: request.method,
    url: request.url,
    params: request.params,
    query: request.query,
  };

  if (error instanceof AppError || error instanceof ZodError) {
    logger.warn({ message: 'Request rejected', error: error.message, request: context });
    sendErrorResponse(reply, error);
    return;
  }

  // Fastify schema validation
  if (error.validation) {
    logger.warn({ message: 'Request validation failed', error: error.message, request: context });
    sendError(reply, 400, 'Validation error', 'INVALID_INPUT', error.validation);
    return;
  }

  logger.error({
    error: {
      message: error.message,
      stack: error.stack,
      code: error.code,
      statusCode: error.statusCode,
    },
    request: context,
  });

  if (error.statusCode && error.statusCode < 500) {
    sendError(reply, error.statusCode, error.message);
    return;
  }

  sendError(reply, 500, appConfig.isProduction ? 'Internal Server Error' : error.message, 'INTERNAL_ERROR');
}
