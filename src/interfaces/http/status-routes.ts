import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { PipelineStats } from '../../application/stats.js';
import type { CategoryKind } from '../../domain/index.js';

export interface StatusRoutesOptions {
  stats: PipelineStats;
  activeCategories: readonly CategoryKind[];
}

/**
 * Read-only pipeline status.
 *
 * GET /health        liveness
 * GET /api/v1/stats  generation and delivery counters
 */
async function statusRoutes(fastify: FastifyInstance, opts: StatusRoutesOptions): Promise<void> {

  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const snapshot = opts.stats.snapshot();
      const status = snapshot.tasks_running > 0 ? 'ok' : 'idle';
      return reply.status(200).send({ status, tasks_running: snapshot.tasks_running });
    },
  );

  fastify.get(
    '/api/v1/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      fastify.log.debug('Stats endpoint hit');
      return reply.status(200).send({
        active_categories: opts.activeCategories,
        ...opts.stats.snapshot(),
      });
    },
  );
}

export default fp(statusRoutes, {
  name: 'status-routes',
  fastify: '5.x',
});
