import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { commonResponses } from '../schemas/common.schemas';
import { recordSwapSchema } from '../services/swap.service';
import { parseInput, sendErrorResponse } from '../utils/error-handler.util';
import { sendSuccess } from '../utils/response.util';
import { LedgerRouteOptions } from './route-options';

const failedSwapSchema = recordSwapSchema.extend({
  reason: z.string().trim().min(1).max(200),
});

const swapBodyProperties = {
  driver_id: { type: 'string', format: 'uuid' },
  station_id: { type: 'string', format: 'uuid' },
  old_battery_id: { type: 'string' },
  new_battery_id: { type: 'string' },
  old_charge_pct: { type: 'integer', description: 'Charge level of the returned battery (0-100)' },
  new_charge_pct: { type: 'integer', description: 'Charge level of the issued battery (0-100)' },
};

const swapBodyRequired = ['driver_id', 'station_id', 'old_battery_id', 'new_battery_id', 'old_charge_pct', 'new_charge_pct'];

export async function swapsRoutes(fastify: FastifyInstance, opts: LedgerRouteOptions) {
  const { swaps } = opts.services;

  // Record swap
  fastify.post(
    '/',
    {
      schema: {
        description:
          'Record a completed battery swap. Decides covered vs charged, updates quota and custody, and issues an invoice when charged.',
        tags: ['Swaps'],
        body: {
          type: 'object',
          required: swapBodyRequired,
          properties: swapBodyProperties,
        },
        response: {
          400: commonResponses[400],
          404: commonResponses[404],
          409: commonResponses[409],
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const data = parseInput(recordSwapSchema, request.body);
        sendSuccess(reply, await swaps.recordSwap(data), 201);
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  // Station-side failure
  fastify.post(
    '/failed',
    {
      schema: {
        description: 'Record a swap the station could not complete; nothing is billed or counted',
        tags: ['Swaps'],
        body: {
          type: 'object',
          required: [...swapBodyRequired, 'reason'],
          properties: { ...swapBodyProperties, reason: { type: 'string' } },
        },
        response: { 400: commonResponses[400], 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { reason, ...data } = parseInput(failedSwapSchema, request.body);
        sendSuccess(reply, await swaps.recordFailedSwap(data, reason), 201);
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );
}
