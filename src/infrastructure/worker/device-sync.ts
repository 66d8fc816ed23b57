import type { Logger } from 'pino';
import type { AppConfig } from '../config.js';
import { createDbClient, createDeviceStore, ensureSchema } from '../db/index.js';
import { createKafka, openKafkaDeviceEventSource } from '../kafka/index.js';
import { DeviceEventApplier } from '../../application/device-projection.js';
import { DeviceConsumerLoop } from '../../application/consumer-loop.js';
import { repeatable, retryOperation } from '../../application/retry-policy.js';

/** Retry budget for the startup schema bootstrap. */
const SCHEMA_RETRY = { delayMs: 3000, maxAttempts: 5 };

/**
 * One lifetime of the telemetry sync task.
 *
 * Owns its database pool and Kafka client from start to finish; a restart
 * by the supervisor calls this again and gets new ones. Resolves when
 * `signal` aborts.
 */
export async function runDeviceSync(config: AppConfig, log: Logger, signal: AbortSignal): Promise<void> {
  const { sql, db } = createDbClient(config.databaseUrl);

  try {
    const schema = await retryOperation(repeatable(() => ensureSchema(sql)), {
      ...SCHEMA_RETRY,
      signal,
      onRetry: (err, attempt) => {
        log.warn({ err, attempt }, 'Database not ready, retrying schema bootstrap');
      },
    });
    if (schema.status === 'cancelled') return;
    log.info('Database ready (device_item table)');

    const kafka = createKafka({ clientId: config.kafka.clientId, brokers: config.kafka.brokers }, log);
    const applier = new DeviceEventApplier(createDeviceStore(db), log);
    const loop = new DeviceConsumerLoop(
      () => openKafkaDeviceEventSource(kafka, { topic: config.kafka.topic, groupId: config.kafka.groupId }, log),
      applier,
      log,
      { recoveryDelayMs: config.consumer.recoveryDelayMs },
    );

    log.info(
      { topic: config.kafka.topic, groupId: config.kafka.groupId, brokers: config.kafka.brokers },
      'Device sync started',
    );
    await loop.run(signal);
  } finally {
    await sql.end().catch((err: unknown) => {
      log.warn({ err }, 'Failed to close database pool');
    });
  }
}
