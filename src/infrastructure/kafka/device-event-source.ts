import type { Kafka } from 'kafkajs';
import type { Logger } from 'pino';
import type { DeviceEventSource } from '../../application/consumer-loop.js';
import { DeliveryQueue } from './delivery-queue.js';

export interface SourceOptions {
  topic: string;
  groupId: string;
}

/**
 * Connects a kafkajs consumer to the device topic and exposes it as a
 * pull-based source.
 *
 * kafkajs' own restart-on-crash is disabled: a crash surfaces from `next`
 * and the consumer loop decides when to reconnect. A fresh group member
 * starts from the earliest offset.
 */
export async function openKafkaDeviceEventSource(
  kafka: Kafka,
  options: SourceOptions,
  log: Logger,
): Promise<DeviceEventSource> {
  const consumer = kafka.consumer({
    groupId: options.groupId,
    retry: { restartOnFailure: async () => false },
  });
  const queue = new DeliveryQueue();

  consumer.on(consumer.events.CRASH, (event) => {
    queue.fail(event.payload.error);
  });

  try {
    await consumer.connect();
    await consumer.subscribe({ topics: [options.topic], fromBeginning: true });
    await consumer.run({
      autoCommit: true,
      partitionsConsumedConcurrently: 1,
      eachMessage: async ({ topic, partition, message }) => {
        await queue.push({
          topic,
          partition,
          offset: message.offset,
          key: message.key,
          value: message.value,
        });
      },
    });
  } catch (err: unknown) {
    queue.close();
    await consumer.disconnect().catch((disconnectErr: unknown) => {
      log.warn({ err: disconnectErr }, 'Failed to disconnect consumer after subscribe error');
    });
    throw err;
  }

  log.info({ topic: options.topic, groupId: options.groupId }, 'Kafka consumer subscribed');

  return {
    next: (signal) => queue.next(signal),
    commit: async (record) => {
      queue.commit(record);
    },
    close: async () => {
      queue.close();
      await consumer.disconnect();
      log.info({ groupId: options.groupId }, 'Kafka consumer disconnected');
    },
  };
}
