import pino from 'pino';
import { loadConfig, runDeviceSync } from './infrastructure/index.js';
import { superviseTask } from './application/index.js';

/**
 * Standalone telemetry sync worker.
 *
 * Consumes device lifecycle events from Kafka and keeps the telemetry
 * service's `device_item` table in step with the device-management service.
 * Instances sharing CONSUMER_GROUP_ID split the topic's partitions between
 * them.
 */
const config = loadConfig();
const log = pino({ level: config.logLevel });

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  const outcome = await superviseTask(
    'device-sync',
    (signal) => runDeviceSync(config, log, signal),
    log,
    { ...config.supervisor, signal: ac.signal },
  );

  log.info({ status: outcome.status }, 'Worker stopped');
}

function shutdown(): void {
  if (ac.signal.aborted) return;
  log.info('Shutting down worker...');
  ac.abort();

  // Consumer and pool close on their own; force exit if they hang
  setTimeout(() => process.exit(0), 10_000).unref();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
