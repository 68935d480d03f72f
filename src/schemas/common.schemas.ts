/**
 * Common Swagger/OpenAPI schemas for reuse across all routes
 */

const DATE_PATTERN = '^\\d{4}-\\d{2}-\\d{2}$';

export const commonSchemas = {
  // Error Responses
  ErrorResponse: {
    type: 'object',
    properties: {
      success: { type: 'boolean', enum: [false] },
      error: {
        type: 'string',
        description: 'Error message',
      },
      code: {
        type: 'string',
        enum: ['NOT_FOUND', 'INVALID_INPUT', 'CONFLICT', 'INTERNAL_ERROR'],
        description: 'Error code',
      },
    },
    // `details` varies by error (zod issues, overlapping ids, balances)
    additionalProperties: true,
    required: ['error'],
  },

  // UUID Parameter
  UUIDParam: {
    type: 'object',
    properties: {
      id: {
        type: 'string',
        format: 'uuid',
        description: 'Resource UUID',
      },
    },
    required: ['id'],
  },

  CalendarDate: {
    type: 'string',
    pattern: DATE_PATTERN,
    description: 'Calendar date (YYYY-MM-DD) in the business timezone',
  },

  ActorBody: {
    type: 'object',
    properties: {
      actor: { type: 'string', description: 'Who processed the request' },
      reason: { type: 'string' },
    },
    required: ['actor'],
  },
};

function errorResponse(description: string) {
  return {
    description,
    content: {
      'application/json': {
        schema: commonSchemas.ErrorResponse,
      },
    },
  };
}

export const commonResponses = {
  400: errorResponse('Bad Request - Invalid input or validation error'),
  404: errorResponse('Not Found - Resource does not exist'),
  409: errorResponse('Conflict - Concurrent update or duplicate resource, safe to retry'),
  500: errorResponse('Internal Server Error'),
};
