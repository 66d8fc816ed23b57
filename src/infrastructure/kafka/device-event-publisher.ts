import type { Producer } from 'kafkajs';
import type { Logger } from 'pino';
import type { DeviceDetails, DeviceEventKind } from '../../domain/index.js';
import type { DeviceEventPublishing, PublishAck } from '../../application/device-registry.js';
import { encodeDeviceEvent } from '../../application/event-codec.js';
import { partitionFor } from '../../application/partitioner.js';
import { InvalidDeviceEventError, PublishTimeoutError } from '../../application/errors.js';

/** The part of a kafkajs producer the publisher drives. */
export type EventProducer = Pick<Producer, 'connect' | 'send' | 'disconnect'>;

export interface PublisherOptions {
  topic: string;
  partitions: number;
  /** Upper bound for connect + send + acknowledgment. */
  timeoutMs: number;
}

/** All in-sync replicas must acknowledge. */
const ACKS_ALL = -1;

/**
 * Publishes device lifecycle events.
 *
 * Each call owns a fresh producer: connect → send → disconnect. The
 * partition is chosen from the device id so every event of one device lands
 * in one ordered partition; the id is also the message key. The call
 * resolves only after the broker acknowledged, and the producer is
 * disconnected (flushed) before it returns either way.
 */
export class DeviceEventPublisher implements DeviceEventPublishing {
  constructor(
    private readonly createProducer: () => EventProducer,
    private readonly log: Logger,
    private readonly options: PublisherOptions,
  ) {}

  async publish(entityId: string, eventKind: DeviceEventKind, details?: DeviceDetails): Promise<PublishAck> {
    if (eventKind === 'Registered' && details === undefined) {
      throw new InvalidDeviceEventError('Registered event requires details', entityId);
    }

    // Key, envelope and partition all use the canonical lowercase id
    const deviceId = entityId.toLowerCase();
    const value = encodeDeviceEvent({ entityId: deviceId, eventKind, details });
    const partition = partitionFor(deviceId, this.options.partitions);
    const { topic, timeoutMs } = this.options;

    const producer = this.createProducer();
    try {
      const send = (async () => {
        await producer.connect();
        return producer.send({
          topic,
          acks: ACKS_ALL,
          timeout: timeoutMs,
          messages: [{ key: deviceId, value, partition }],
        });
      })();

      const metadata = await withTimeout(send, timeoutMs, () => new PublishTimeoutError(deviceId, timeoutMs));
      const ack = metadata[0];

      this.log.debug({ deviceId, eventKind, topic, partition }, 'Device event acknowledged');

      return {
        topic,
        partition: ack?.partition ?? partition,
        offset: ack?.baseOffset ?? ack?.offset,
      };
    } finally {
      await producer.disconnect().catch((err: unknown) => {
        this.log.warn({ err, deviceId }, 'Failed to disconnect producer');
      });
    }
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      // The losing send may still settle; its outcome no longer matters
      void promise.catch(() => undefined);
      reject(onTimeout());
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
