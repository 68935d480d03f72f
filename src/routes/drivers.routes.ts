import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { commonResponses, commonSchemas } from '../schemas/common.schemas';
import { SWAP_PERIODS, swapPeriodSchema } from '../services/swap.service';
import { parseInput, sendErrorResponse } from '../utils/error-handler.util';
import { sendSuccess } from '../utils/response.util';
import { LedgerRouteOptions } from './route-options';

const idParamSchema = z.object({ id: z.string().uuid() });

const registerSchema = z.object({
  phone_number: z.string().min(1),
  name: z.string().optional(),
  email: z.string().optional(),
  preferred_language: z.enum(['hi', 'en', 'hi-en']).optional(),
  city: z.string().optional(),
  vehicle_number: z.string().optional(),
});

const historyQuerySchema = z.object({
  period: swapPeriodSchema.optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  limit: z.coerce.number().int().positive().optional(),
});

const leaveRequestSchema = z.object({
  start_date: z.string(),
  end_date: z.string(),
  reason: z.string().max(200).optional(),
});

export async function driversRoutes(fastify: FastifyInstance, opts: LedgerRouteOptions) {
  const { drivers, entitlements, swaps, leaves, invoices, penalties } = opts.services;

  // Driver profile by phone
  fastify.get(
    '/by-phone/:phone',
    {
      schema: {
        description: 'Driver profile with current subscription, swaps this month and pending leaves',
        tags: ['Drivers'],
        params: {
          type: 'object',
          required: ['phone'],
          properties: { phone: { type: 'string', description: '10-digit mobile, +91/0 prefixes accepted' } },
        },
        response: { 400: commonResponses[400], 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { phone } = parseInput(z.object({ phone: z.string() }), request.params);
        sendSuccess(reply, await drivers.getDriver(phone));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  // Register driver
  fastify.post(
    '/',
    {
      schema: {
        description: 'Register a driver',
        tags: ['Drivers'],
        body: {
          type: 'object',
          required: ['phone_number'],
          properties: {
            phone_number: { type: 'string' },
            name: { type: 'string' },
            email: { type: 'string' },
            preferred_language: { type: 'string', enum: ['hi', 'en', 'hi-en'] },
            city: { type: 'string' },
            vehicle_number: { type: 'string' },
          },
        },
        response: { 400: commonResponses[400], 409: commonResponses[409] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const data = parseInput(registerSchema, request.body);
        sendSuccess(reply, await drivers.register(data), 201);
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.post(
    '/:id/deactivate',
    {
      schema: {
        description: 'Deactivate a driver (soft delete)',
        tags: ['Drivers'],
        params: commonSchemas.UUIDParam,
        response: { 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        sendSuccess(reply, await drivers.deactivate(id));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  // Current entitlement
  fastify.get(
    '/:id/entitlement',
    {
      schema: {
        description: 'Current subscription with swaps remaining, days remaining, custody and penalty',
        tags: ['Entitlements'],
        params: commonSchemas.UUIDParam,
        response: { 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        sendSuccess(reply, await entitlements.getActiveEntitlement(id));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.get(
    '/:id/subscriptions',
    {
      schema: {
        description: 'Subscription history, most recent first',
        tags: ['Entitlements'],
        params: commonSchemas.UUIDParam,
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        sendSuccess(reply, await entitlements.listForDriver(id));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  // Swap history
  fastify.get(
    '/:id/swaps',
    {
      schema: {
        description: 'Swap history for a named period or an explicit date range',
        tags: ['Swaps'],
        params: commonSchemas.UUIDParam,
        querystring: {
          type: 'object',
          properties: {
            period: { type: 'string', pattern: `^(${SWAP_PERIODS.join('|')}|\\d+)$` },
            from: commonSchemas.CalendarDate,
            to: commonSchemas.CalendarDate,
            limit: { type: 'integer', minimum: 1, maximum: 200 },
          },
        },
        response: { 400: commonResponses[400], 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        const query = parseInput(historyQuerySchema, request.query);
        sendSuccess(reply, await swaps.listSwapHistory(id, query));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.get(
    '/:id/invoices',
    {
      schema: {
        description: 'Invoices issued to a driver, newest number first',
        tags: ['Invoices'],
        params: commonSchemas.UUIDParam,
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        sendSuccess(reply, await invoices.listForDriver(id));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.get(
    '/:id/penalties',
    {
      schema: {
        description: 'Materialized penalty records of a driver',
        tags: ['Penalties'],
        params: commonSchemas.UUIDParam,
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        sendSuccess(reply, await penalties.listForDriver(id));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  // Leave summary
  fastify.get(
    '/:id/leaves/summary',
    {
      schema: {
        description: 'Leave balance for the current month with pending and upcoming leaves',
        tags: ['Leaves'],
        params: commonSchemas.UUIDParam,
        response: { 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        sendSuccess(reply, await leaves.getLeaveSummary(id));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  // Request leave
  fastify.post(
    '/:id/leaves',
    {
      schema: {
        description: 'Request leave; the request starts as pending',
        tags: ['Leaves'],
        params: commonSchemas.UUIDParam,
        body: {
          type: 'object',
          required: ['start_date', 'end_date'],
          properties: {
            start_date: commonSchemas.CalendarDate,
            end_date: commonSchemas.CalendarDate,
            reason: { type: 'string', maxLength: 200 },
          },
        },
        response: { 400: commonResponses[400], 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        const body = parseInput(leaveRequestSchema, request.body);
        const leave = await leaves.requestLeave(id, body.start_date, body.end_date, body.reason);
        sendSuccess(reply, leave, 201);
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );
}
