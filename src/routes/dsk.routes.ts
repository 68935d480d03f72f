import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { parseInput, sendErrorResponse } from '../utils/error-handler.util';
import { sendSuccess } from '../utils/response.util';
import { LedgerRouteOptions } from './route-options';

const dskQuerySchema = z.object({
  city: z.string().optional(),
  service: z.string().optional(),
});

export async function dskRoutes(fastify: FastifyInstance, opts: LedgerRouteOptions) {
  const { dsk } = opts.services;

  fastify.get(
    '/',
    {
      schema: {
        description: 'Active DSK service centers, optionally filtered by city and offered service',
        tags: ['DSK'],
        querystring: {
          type: 'object',
          properties: {
            city: { type: 'string' },
            service: { type: 'string', description: 'activation, repair, support, battery_replacement' },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const filter = parseInput(dskQuerySchema, request.query);
        sendSuccess(reply, await dsk.listDskCenters(filter));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );
}
