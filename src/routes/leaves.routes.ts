import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { commonResponses, commonSchemas } from '../schemas/common.schemas';
import { parseInput, sendErrorResponse } from '../utils/error-handler.util';
import { sendSuccess } from '../utils/response.util';
import { LedgerRouteOptions } from './route-options';

const idParamSchema = z.object({ id: z.string().uuid() });

const decisionSchema = z.object({
  actor: z.string().trim().min(1).max(100),
  reason: z.string().trim().max(200).optional(),
});

export async function leavesRoutes(fastify: FastifyInstance, opts: LedgerRouteOptions) {
  const { leaves } = opts.services;

  fastify.post(
    '/:id/approve',
    {
      schema: {
        description: 'Approve a pending leave request and consume the days from the monthly balance',
        tags: ['Leaves'],
        params: commonSchemas.UUIDParam,
        body: commonSchemas.ActorBody,
        response: { 400: commonResponses[400], 404: commonResponses[404], 409: commonResponses[409] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        const { actor } = parseInput(decisionSchema, request.body);
        sendSuccess(reply, await leaves.approve(id, actor));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.post(
    '/:id/reject',
    {
      schema: {
        description: 'Reject a pending leave request',
        tags: ['Leaves'],
        params: commonSchemas.UUIDParam,
        body: commonSchemas.ActorBody,
        response: { 400: commonResponses[400], 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { id } = parseInput(idParamSchema, request.params);
        const { actor, reason } = parseInput(decisionSchema, request.body);
        sendSuccess(reply, await leaves.reject(id, actor, reason));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );
}
