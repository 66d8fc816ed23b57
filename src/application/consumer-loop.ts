import type { Logger } from 'pino';
import { decodeDeviceEvent, decodeDeviceKey } from './event-codec.js';
import type { DeviceEventApplier } from './device-projection.js';
import { sleep } from './retry-policy.js';

/** A record pulled from the device topic. */
export interface InboundRecord {
  readonly topic: string;
  readonly partition: number;
  readonly offset: string;
  readonly key: Buffer | null;
  readonly value: Buffer | null;
}

/**
 * Pull-based view of a subscribed topic.
 *
 * `next` is the loop's only suspension point. It resolves `null` once
 * `signal` aborts and rejects when the underlying connection fails.
 * A record not yet passed to `commit` is delivered again after reconnect.
 */
export interface DeviceEventSource {
  next(signal: AbortSignal): Promise<InboundRecord | null>;
  commit(record: InboundRecord): Promise<void>;
  close(): Promise<void>;
}

/** Opens a subscribed source. Called once per connection attempt. */
export type DeviceEventSourceFactory = (signal: AbortSignal) => Promise<DeviceEventSource>;

export type ConsumerState = 'idle' | 'connecting' | 'running' | 'recovering' | 'stopped';

export interface ConsumerLoopOptions {
  /** Backoff before reconnecting after a failure. */
  recoveryDelayMs: number;
  onStateChange?: ((state: ConsumerState) => void) | undefined;
}

/**
 * Consumes device events and applies them to the local projection.
 *
 * Outer loop: connect → run → (on error) recover after a fixed delay →
 * connect again, until the signal aborts. Inner loop: pull → decode →
 * apply → commit, strictly one record at a time so records of a partition
 * are applied in log order.
 *
 * Decode failures and store failures both end the inner loop; the record
 * stays uncommitted and is redelivered once the loop reconnects.
 * Cancellation is a clean stop and is never logged as a failure.
 */
export class DeviceConsumerLoop {
  private current: ConsumerState = 'idle';

  constructor(
    private readonly openSource: DeviceEventSourceFactory,
    private readonly applier: DeviceEventApplier,
    private readonly log: Logger,
    private readonly options: ConsumerLoopOptions,
  ) {}

  get state(): ConsumerState {
    return this.current;
  }

  /** Runs until `signal` aborts. Never rejects on pipeline errors. */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.transition('connecting');

      let source: DeviceEventSource | undefined;
      let failed = false;
      try {
        source = await this.openSource(signal);
        if (signal.aborted) break;

        this.transition('running');
        this.log.info('Subscribed to device events, listening');
        await this.poll(source, signal);
      } catch (err: unknown) {
        if (signal.aborted) break;

        failed = true;
        this.transition('recovering');
        this.log.error(
          { err, retryInMs: this.options.recoveryDelayMs },
          'Device event processing failed, reconnecting',
        );
      } finally {
        await this.closeSource(source);
      }

      if (failed) {
        await sleep(this.options.recoveryDelayMs, signal);
      }
    }

    this.log.info('Device event processing cancelled');
    this.transition('stopped');
  }

  private async poll(source: DeviceEventSource, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const record = await source.next(signal);
      if (record === null) return;

      const deviceId = decodeDeviceKey(record.key);
      const event = decodeDeviceEvent(record.value);
      const result = await this.applier.apply(deviceId, event);
      await source.commit(record);

      this.log.debug(
        { deviceId, eventKind: event.eventKind, result, partition: record.partition, offset: record.offset },
        'Device event applied',
      );
    }
  }

  private async closeSource(source: DeviceEventSource | undefined): Promise<void> {
    if (!source) return;
    try {
      await source.close();
    } catch (err: unknown) {
      this.log.warn({ err }, 'Failed to close device event source');
    }
  }

  private transition(next: ConsumerState): void {
    if (next === this.current) return;
    this.log.debug({ from: this.current, to: next }, 'Consumer state changed');
    this.current = next;
    this.options.onStateChange?.(next);
  }
}
