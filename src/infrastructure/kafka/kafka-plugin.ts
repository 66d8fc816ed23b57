import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { createKafka } from './client.js';
import { DeviceEventPublisher } from './device-event-publisher.js';
import type { KafkaClientOptions } from './client.js';
import type { PublisherOptions } from './device-event-publisher.js';
import type { DeviceEventPublishing } from '../../application/device-registry.js';

export type KafkaPluginOptions = KafkaClientOptions & PublisherOptions & { log: Logger };

/**
 * Fastify plugin that builds the Kafka client and the device event publisher.
 *
 * Decorates `fastify.devicePublisher`. Producers are created per publish
 * call, so there is no long-lived connection to close on shutdown.
 */
async function kafkaPlugin(fastify: FastifyInstance, opts: KafkaPluginOptions): Promise<void> {
  const kafka = createKafka({ clientId: opts.clientId, brokers: opts.brokers }, opts.log);

  const publisher = new DeviceEventPublisher(
    () => kafka.producer({ allowAutoTopicCreation: false }),
    opts.log,
    { topic: opts.topic, partitions: opts.partitions, timeoutMs: opts.timeoutMs },
  );

  fastify.decorate('devicePublisher', publisher);
  fastify.log.info({ brokers: opts.brokers, topic: opts.topic }, 'Device event publisher ready');
}

export default fp(kafkaPlugin, {
  name: 'kafka',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.devicePublisher` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    devicePublisher: DeviceEventPublishing;
  }
}
