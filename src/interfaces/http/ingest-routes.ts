import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { IngestionGateway } from '../../application/ingestion-gateway.js';
import {
  BatchTooLargeError,
  GatewayClosedError,
  MalformedInputError,
  QueueFullError,
} from '../../domain/errors.js';

export interface IngestRoutesOptions {
  gateway: IngestionGateway;
  /** Submission path (default: `/events`). */
  path?: string;
}

const OTHER_METHODS = ['GET', 'PUT', 'PATCH', 'DELETE'] as const;

/**
 * Registers the ingestion routes.
 *
 * POST <path>  — single event or array of events (raw JSON body)
 * GET  /health — liveness probe, always 200
 *
 * Registered without fastify-plugin: the raw-string body parsers below
 * must stay scoped to these routes.
 */
export async function ingestRoutes(fastify: FastifyInstance, opts: IngestRoutesOptions): Promise<void> {
  const { gateway } = opts;
  const path = opts.path ?? '/events';

  // The gateway decodes the body itself; hand it the raw text
  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  /**
   * Submission.
   *
   * 202 accepted · 400 malformed · 413 batch too large · 503 queue full / shutting down.
   * Error bodies are plain text; partial acceptance on 503 is only logged.
   */
  fastify.post(
    path,
    async (request: FastifyRequest, reply: FastifyReply) => {
      const payload = typeof request.body === 'string' ? request.body : '';

      try {
        const result = gateway.submit(payload);
        request.log.debug({ count: result.accepted, remote: request.ip }, 'Submission accepted');

        return reply.status(202).send({
          status: 'accepted',
          count: result.accepted,
          received: result.received,
        });
      } catch (err: unknown) {
        if (err instanceof MalformedInputError) {
          request.log.warn({ err }, 'Rejected malformed submission');
          return reply.status(400).type('text/plain').send(err.message);
        }
        if (err instanceof BatchTooLargeError) {
          return reply.status(413).type('text/plain').send(err.message);
        }
        if (err instanceof QueueFullError) {
          request.log.warn(
            { accepted: err.accepted, total: err.total },
            'Submission partially rejected: event queue full',
          );
          return reply.status(503).type('text/plain').send('Event queue full, try again later');
        }
        if (err instanceof GatewayClosedError) {
          return reply.status(503).type('text/plain').send('Service shutting down');
        }
        throw err;
      }
    },
  );

  fastify.route({
    method: [...OTHER_METHODS],
    url: path,
    handler: async (_request: FastifyRequest, reply: FastifyReply) =>
      reply.status(405).type('text/plain').send('Method not allowed'),
  });

  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) =>
      reply.status(200).send({ status: 'ok' }),
  );
}
