import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { commonResponses } from '../schemas/common.schemas';
import { parseInput, sendErrorResponse } from '../utils/error-handler.util';
import { sendSuccess } from '../utils/response.util';
import { LedgerRouteOptions } from './route-options';

const INVOICE_NUMBER = /^INV-\d{6}-\d{6}$/;

const numberParamSchema = z.object({
  number: z.string().regex(INVOICE_NUMBER, 'Expected INV-YYYYMM-NNNNNN'),
});

const numberParam = {
  type: 'object',
  required: ['number'],
  properties: { number: { type: 'string', description: 'INV-YYYYMM-NNNNNN' } },
};

export async function invoicesRoutes(fastify: FastifyInstance, opts: LedgerRouteOptions) {
  const { invoices } = opts.services;

  fastify.get(
    '/:number',
    {
      schema: {
        description: 'Invoice by number',
        tags: ['Invoices'],
        params: numberParam,
        response: { 400: commonResponses[400], 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { number } = parseInput(numberParamSchema, request.params);
        sendSuccess(reply, await invoices.getByNumber(number));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );

  fastify.patch(
    '/:number/payment-status',
    {
      schema: {
        description: 'Record the payment outcome of an invoice',
        tags: ['Invoices'],
        params: numberParam,
        body: {
          type: 'object',
          required: ['payment_status'],
          properties: { payment_status: { type: 'string', enum: ['paid', 'pending', 'failed'] } },
        },
        response: { 400: commonResponses[400], 404: commonResponses[404] },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { number } = parseInput(numberParamSchema, request.params);
        const { payment_status } = parseInput(
          z.object({ payment_status: z.enum(['paid', 'pending', 'failed']) }),
          request.body
        );
        sendSuccess(reply, await invoices.updatePaymentStatus(number, payment_status));
      } catch (error) {
        sendErrorResponse(reply, error);
      }
    }
  );
}
