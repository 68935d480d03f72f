import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { commonResponses, commonSchemas } from '../schemas/common.schemas';
import { parseInput, sendErrorResponse } from '../utils/error-handler.util';
import { sendSuccess } from '../utils/response.util';
import { LedgerRouteOptions } from './route-options';

const idParamSchema = z.object({ id: z.string().uuid() });

const createSubscriptionSchema = z.object({
  driver_id: z.string().uuid(),
  plan_code: z.string().trim().min(1),
  auto_renew: z.boolean().optional(),
  start_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
});

const returnSchema = z.object({
  returned_at: z.string().datetime({ offset: true }).optional(),
});

const custodySchema = z.object({
  battery_id: z.string().trim().min(1).max(50),
});

export async function subscriptionsRoutes(fastify: FastifyInstance, opts: LedgerRouteOptions) {
  const { entitlements, penalties } = opts.services;

  // Create subscription
  fastify.post(
    '/',
    {
      schema: {
        description: 'Start a subscription on a plan; supersedes active subscriptions and issues the plan invoice',
        tags: ['Subscriptions'],
        body: {
          type: 'object',
          required: ['driver_id', 'plan_code'],
          properties: {
            driver_id: { type: 'string', format: 'uuid' },
            plan_code: { type: 'string', description: 'DAILY, WEEKLY, MONTHLY or YEARLY' },
            auto_renew: { type: 'boolean' },
            start_date: commonSchemas.CalendarDate,
          },
        },
        response: { 400: commonResponses[400], 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { driver_id, plan_code, ...options } = parseInput(createSubscriptionSchema, request.body);
        sendSuccess(reply, await entitlements.createSubscription(driver_id, plan_code, options), 201);
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  // Battery returned
  fastify.post(
    '/:id/return',
    {
      schema: {
        description: 'Mark the battery as returned; repeating the call is a no-op',
        tags: ['Subscriptions'],
        params: commonSchemas.UUIDParam,
        body: {
          type: 'object',
          properties: { returned_at: { type: 'string', format: 'date-time' } },
        },
        response: { 400: commonResponses[400], 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        const { returned_at } = parseInput(returnSchema, request.body ?? {});
        sendSuccess(reply, await entitlements.markReturned(id, returned_at));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.post(
    '/:id/custody',
    {
      schema: {
        description: 'Assign a battery to the subscription',
        tags: ['Subscriptions'],
        params: commonSchemas.UUIDParam,
        body: {
          type: 'object',
          required: ['battery_id'],
          properties: { battery_id: { type: 'string' } },
        },
        response: { 400: commonResponses[400], 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        const { battery_id } = parseInput(custodySchema, request.body);
        sendSuccess(reply, await entitlements.setCustody(id, battery_id));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.post(
    '/:id/misplaced',
    {
      schema: {
        description: 'Flag the assigned battery as misplaced',
        tags: ['Subscriptions'],
        params: commonSchemas.UUIDParam,
        response: { 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        sendSuccess(reply, await entitlements.markMisplaced(id));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  // Lifecycle: active -> cancelled | suspended
  for (const action of ['cancel', 'suspend'] as const) {
    fastify.post(
      `/:id/${action}`,
      {
        schema: {
          description: action === 'cancel' ? 'Cancel an active subscription' : 'Suspend an active subscription',
          tags: ['Subscriptions'],
          params: commonSchemas.UUIDParam,
          response: { 400: commonResponses[400], 404: commonResponses[404] },
        },
      },
      async (request: FastifyRequest, reply: FastifyReply) => {
        try {
          const { id } = parseInput(idParamSchema, request.params);
          const subscription = action === 'cancel' ? await entitlements.cancel(id) : await entitlements.suspend(id);
          sendSuccess(reply, subscription);
        } catch (error) {
          sendErrorResponse(reply, error);
        }
      }
    );
  }

  fastify.post(
    '/:id/reset-usage',
    {
      schema: {
        description: 'Administrative reset of swaps_used to zero',
        tags: ['Subscriptions'],
        params: commonSchemas.UUIDParam,
        response: { 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        sendSuccess(reply, await entitlements.resetUsage(id));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  // Penalty
  fastify.get(
    '/:id/penalty',
    {
      schema: {
        description: 'Overdue-battery penalty as of today; read-only',
        tags: ['Penalties'],
        params: commonSchemas.UUIDParam,
        response: { 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        sendSuccess(reply, await penalties.getPenalty(id));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );
}
