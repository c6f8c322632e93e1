#!/usr/bin/env node
import pino from 'pino';
import { startPipeline } from './application/index.js';
import { createCommonMetadata } from './domain/index.js';
import type { StampedRecord } from './domain/index.js';
import { HttpLogSink, loadConfig, resolveHostname } from './infrastructure/index.js';
import { parseCliArgs } from './interfaces/cli.js';
import { buildStatusServer } from './interfaces/http/index.js';

/**
 * Generator process.
 *
 * Order:
 * 1) Configuration (env + CLI)
 * 2) Process identity (fatal on failure, nothing starts without it)
 * 3) Sink + pipeline
 * 4) Optional status server
 * 5) Signal handlers: stop generation, flush the partial batch, exit
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

const SHUTDOWN_GRACE_MS = 5000;

async function main(): Promise<void> {
  const config = loadConfig({
    env: process.env,
    overrides: parseCliArgs(process.argv.slice(2)),
  });
  log.level = config.logLevel;

  const hostname = resolveHostname();
  const metadata = createCommonMetadata({
    ddsource: config.metadata.source,
    hostname,
    status: config.metadata.status,
    ddtags: config.metadata.tags,
  });

  const sink = new HttpLogSink<StampedRecord>({
    baseUrl: config.target,
    log: log.child({ component: 'sink' }),
    gzip: config.delivery.gzip,
    timeoutMs: config.delivery.timeoutMs,
  });

  log.info({ endpoint: sink.endpoint, hostname, gzip: config.delivery.gzip }, 'Starting synthlog');

  const pipeline = startPipeline({ config, metadata, sink, log });

  // --------------------------------------------------
  // Status server
  // --------------------------------------------------

  const server = config.statusServer.port > 0
    ? await buildStatusServer(log.child({ component: 'status' }), {
      stats: pipeline.stats,
      activeCategories: pipeline.activeCategories,
    })
    : null;

  if (server) {
    try {
      await server.listen({ host: config.statusServer.host, port: config.statusServer.port });
    } catch (err: unknown) {
      // Generation does not depend on the status server.
      log.error({ err }, 'Status server failed to start, continuing without it');
    }
  }

  // --------------------------------------------------
  // Shutdown
  // --------------------------------------------------

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutting down, flushing partial batch...');
    pipeline.stop().catch((err: unknown) => {
      log.error({ err }, 'Pipeline did not stop cleanly');
    });
    setTimeout(() => {
      log.warn('Shutdown grace period elapsed, forcing exit');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS).unref();
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await pipeline.done;

  if (server) {
    await server.close();
  }

  log.info({ stats: pipeline.stats.snapshot() }, 'synthlog stopped');
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'synthlog failed');
  process.exit(1);
});
