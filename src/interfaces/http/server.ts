import Fastify from 'fastify';
import type { FastifyBaseLogger } from 'fastify';
import statusRoutes from './status-routes.js';
import type { StatusRoutesOptions } from './status-routes.js';

/** Builds (but does not start) the status server on the process logger. */
export async function buildStatusServer(log: FastifyBaseLogger, opts: StatusRoutesOptions) {
  const fastify = Fastify({ loggerInstance: log });
  await fastify.register(statusRoutes, opts);
  return fastify;
}
