import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { IngestionGateway } from '../../application/ingestion-gateway.js';
import type { ProcessorChain } from '../../application/processor-chain.js';
import type { PipelineStats } from '../../application/pipeline-stats.js';

export interface StatsRoutesOptions {
  gateway: IngestionGateway;
  chain: ProcessorChain;
  stats: PipelineStats;
}

/**
 * Pipeline stats route.
 *
 * GET /api/v1/pipeline/stats — outcome counters, buffer fill and chain order.
 */
async function statsRoutes(fastify: FastifyInstance, opts: StatsRoutesOptions): Promise<void> {

  fastify.get(
    '/api/v1/pipeline/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({
        counters: opts.stats.snapshot(),
        buffer: {
          size: opts.gateway.size,
          capacity: opts.gateway.capacity,
          accepting: opts.gateway.accepting,
        },
        units: opts.chain.unitNames,
      });
    },
  );
}

export default fp(statsRoutes, {
  name: 'stats-routes',
  fastify: '5.x',
});
