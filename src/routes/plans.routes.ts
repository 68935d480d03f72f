import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { commonResponses } from '../schemas/common.schemas';
import { upsertPlanSchema } from '../services/plan-catalog.service';
import { parseInput, sendErrorResponse } from '../utils/error-handler.util';
import { sendSuccess } from '../utils/response.util';
import { LedgerRouteOptions } from './route-options';

export async function plansRoutes(fastify: FastifyInstance, opts: LedgerRouteOptions) {
  const { plans } = opts.services;

  fastify.get(
    '/',
    {
      schema: {
        description: 'Active plans ordered by price, with GST breakdown and per-swap cost',
        tags: ['Plans'],
      },
    },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        sendSuccess(reply, await plans.listActive());
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.get(
    '/:code',
    {
      schema: {
        description: 'Plan by code',
        tags: ['Plans'],
        params: {
          type: 'object',
          required: ['code'],
          properties: { code: { type: 'string' } },
        },
        response: { 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { code } = parseInput(z.object({ code: z.string() }), request.params);
        sendSuccess(reply, await plans.getByCode(code));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  // Admin upsert by code
  fastify.put(
    '/',
    {
      schema: {
        description: 'Insert or update a plan by its code. Use -1 for unlimited quotas.',
        tags: ['Plans'],
        body: {
          type: 'object',
          required: ['code', 'name', 'price', 'validity_days', 'swaps_included'],
          properties: {
            code: { type: 'string' },
            name: { type: 'string' },
            name_hi: { type: 'string' },
            price: { type: 'number' },
            validity_days: { type: 'integer' },
            swaps_included: { type: 'integer' },
            swaps_per_day: { type: 'integer' },
            extra_swap_price: { type: 'number' },
            gst_percentage: { type: 'number' },
            description_en: { type: 'string' },
            description_hi: { type: 'string' },
            is_active: { type: 'boolean' },
          },
        },
        response: { 400: commonResponses[400] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const data = parseInput(upsertPlanSchema, request.body);
        sendSuccess(reply, await plans.upsert(data));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );
}
