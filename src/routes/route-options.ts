import { FastifyPluginOptions } from 'fastify';
import { LedgerServices } from '../services';

export interface LedgerRouteOptions extends FastifyPluginOptions {
  services: LedgerServices;
}
