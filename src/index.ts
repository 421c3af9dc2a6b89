import Fastify from 'fastify';
import pino from 'pino';

import { loadPipelineConfig } from './infrastructure/config/index.js';
import { ingestRoutes, statsRoutes } from './interfaces/http/index.js';
import { createPipeline } from './pipeline.js';

/**
 * Bootstrap the ingestion service.
 *
 * Order:
 * 1) Load config (file + env)
 * 2) Build the pipeline (lookup client, chain, sink, gateway, workers)
 * 3) HTTP routes
 * 4) Register shutdown hooks
 * 5) Start workers, then listen()
 */
async function main(): Promise<void> {

  const config = loadPipelineConfig();

  const log = pino({ level: config.server.logLevel });

  const fastify = Fastify({
    loggerInstance: log,
    bodyLimit: config.server.bodyLimit,
  });

  // --------------------------------------------------
  // Pipeline
  // --------------------------------------------------

  const pipeline = await createPipeline(config, log);

  log.info(
    { units: pipeline.chain.unitNames, sink: config.sink.type, workers: config.workers.workers },
    'Pipeline configured',
  );

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(ingestRoutes, {
    gateway: pipeline.gateway,
    path: config.ingest.path,
  });
  await fastify.register(statsRoutes, {
    gateway: pipeline.gateway,
    chain: pipeline.chain,
    stats: pipeline.stats,
  });

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    await pipeline.shutdown();
  });

  const stop = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  // --------------------------------------------------
  // Start
  // --------------------------------------------------

  pipeline.start();

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });

}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
