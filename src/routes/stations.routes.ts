import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { commonResponses } from '../schemas/common.schemas';
import { MAX_NEARBY_LIMIT } from '../services/station.service';
import { parseInput, sendErrorResponse } from '../utils/error-handler.util';
import { sendSuccess } from '../utils/response.util';
import { LedgerRouteOptions } from './route-options';

const nearbyQuerySchema = z.object({
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  limit: z.coerce.number().int().optional(),
  max_distance_km: z.coerce.number().positive().optional(),
});

export async function stationsRoutes(fastify: FastifyInstance, opts: LedgerRouteOptions) {
  const { stations } = opts.services;

  // Nearest stations
  fastify.get(
    '/nearby',
    {
      schema: {
        description: `Active stations by great-circle distance, nearest first (limit 1-${MAX_NEARBY_LIMIT})`,
        tags: ['Stations'],
        querystring: {
          type: 'object',
          required: ['lat', 'lon'],
          properties: {
            lat: { type: 'number' },
            lon: { type: 'number' },
            limit: { type: 'integer' },
            max_distance_km: { type: 'number' },
          },
        },
        response: { 400: commonResponses[400] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { lat, lon, limit, max_distance_km } = parseInput(nearbyQuerySchema, request.query);
        sendSuccess(reply, await stations.nearestStations(lat, lon, { limit, max_distance_km }));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.get(
    '/code/:code',
    {
      schema: {
        description: 'Station by code, with inventory',
        tags: ['Stations'],
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
        sendSuccess(reply, await stations.getByCode(code));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );
}
