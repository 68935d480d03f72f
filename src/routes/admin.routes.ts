import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { commonResponses, commonSchemas } from '../schemas/common.schemas';
import { parseInput, sendErrorResponse } from '../utils/error-handler.util';
import { sendSuccess } from '../utils/response.util';
import { LedgerRouteOptions } from './route-options';

const sweepSchema = z.object({
  as_of: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
});

const settleSchema = z.object({
  status: z.enum(['paid', 'waived']),
});

const sweepBody = {
  type: 'object',
  properties: { as_of: commonSchemas.CalendarDate },
};

export async function adminRoutes(fastify: FastifyInstance, opts: LedgerRouteOptions) {
  const { penalties, entitlements } = opts.services;

  // Scheduled jobs call these; both are safe to repeat
  fastify.post(
    '/sweeps/penalties',
    {
      schema: {
        description: 'Materialize pending penalty records for batteries overdue past the grace period',
        tags: ['Admin'],
        body: sweepBody,
        response: { 400: commonResponses[400] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { as_of } = parseInput(sweepSchema, request.body ?? {});
        sendSuccess(reply, await penalties.sweep(as_of));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.post(
    '/sweeps/expiry',
    {
      schema: {
        description: 'Expire active subscriptions whose end date has passed',
        tags: ['Admin'],
        body: sweepBody,
        response: { 400: commonResponses[400] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { as_of } = parseInput(sweepSchema, request.body ?? {});
        const expired = await entitlements.expireLapsed(as_of);
        sendSuccess(reply, { expired });
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.post(
    '/penalties/:id/settle',
    {
      schema: {
        description: 'Mark a pending penalty as paid or waived',
        tags: ['Admin'],
        params: commonSchemas.UUIDParam,
        body: {
          type: 'object',
          required: ['status'],
          properties: { status: { type: 'string', enum: ['paid', 'waived'] } },
        },
        response: { 400: commonResponses[400], 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(z.object({ id: z.string().uuid() }), request.params);
        const { status } = parseInput(settleSchema, request.body);
        sendSuccess(reply, await penalties.settle(id, status));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );
}
