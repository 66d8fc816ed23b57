import Fastify from 'fastify';
import pino from 'pino';

import { loadConfig, dbPlugin, kafkaPlugin, createDbClient, ensureSchema } from './infrastructure/index.js';
import { deviceRoutes } from './interfaces/http/index.js';
import { repeatable, retryOperation } from './application/index.js';

/**
 * Bootstrap the device-management API.
 *
 * Order:
 * 1) Schema bootstrap (retried while the database starts)
 * 2) Infrastructure plugins
 * 3) HTTP routes
 * 4) Shutdown hooks
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.logLevel });

  // --------------------------------------------------
  // Schema
  // --------------------------------------------------

  const bootstrap = createDbClient(config.databaseUrl);
  try {
    await retryOperation(repeatable(() => ensureSchema(bootstrap.sql)), {
      delayMs: 3000,
      maxAttempts: 5,
      onRetry: (err, attempt) => {
        log.warn({ err, attempt }, 'Database not ready, retrying schema bootstrap');
      },
    });
  } finally {
    await bootstrap.sql.end();
  }
  log.info('Database ready (device_item table)');

  const fastify = Fastify({ loggerInstance: log });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(dbPlugin, { databaseUrl: config.databaseUrl });
  await fastify.register(kafkaPlugin, {
    log,
    clientId: config.kafka.clientId,
    brokers: config.kafka.brokers,
    topic: config.kafka.topic,
    partitions: config.kafka.partitions,
    timeoutMs: config.kafka.publishTimeoutMs,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(deviceRoutes, { log });

  // --------------------------------------------------
  // Shutdown
  // --------------------------------------------------

  const shutdown = (): void => {
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.http.host,
    port: config.http.port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
