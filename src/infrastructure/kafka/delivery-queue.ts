import type { InboundRecord } from '../../application/consumer-loop.js';

interface Delivery {
  readonly record: InboundRecord;
  readonly resolve: () => void;
  readonly reject: (err: Error) => void;
}

/**
 * Hands records from a push-style consumer callback to a pulling loop.
 *
 * `push` returns a promise that settles only when the loop commits the
 * record (resolve) or the queue closes first (reject). Handing that promise
 * back to kafkajs' `eachMessage` means an offset is only marked processed
 * after the record was applied.
 */
export class DeliveryQueue {
  private readonly buffered: Delivery[] = [];
  private readonly inFlight = new Map<InboundRecord, Delivery>();
  private wakers: Array<() => void> = [];
  private failure: Error | null = null;
  private closed = false;

  push(record: InboundRecord): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('Delivery queue is closed'));
    }
    return new Promise<void>((resolve, reject) => {
      this.buffered.push({ record, resolve, reject });
      this.wake();
    });
  }

  /** Makes every pending and future `next` call reject with `err`. */
  fail(err: Error): void {
    this.failure ??= err;
    this.wake();
  }

  /** Resolves the next record, or `null` once `signal` aborts. */
  async next(signal: AbortSignal): Promise<InboundRecord | null> {
    for (;;) {
      if (signal.aborted) return null;
      if (this.failure) throw this.failure;

      const delivery = this.buffered.shift();
      if (delivery) {
        this.inFlight.set(delivery.record, delivery);
        return delivery.record;
      }
      if (this.closed) throw new Error('Delivery queue is closed');

      await this.changed(signal);
    }
  }

  commit(record: InboundRecord): void {
    const delivery = this.inFlight.get(record);
    if (!delivery) {
      throw new Error(`Record ${record.topic}/${record.partition}@${record.offset} is not in flight`);
    }
    this.inFlight.delete(record);
    delivery.resolve();
  }

  /** Rejects everything not yet committed so it is redelivered later. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const reason = new Error('Consumer closed before the record was committed');
    for (const delivery of [...this.inFlight.values(), ...this.buffered]) {
      delivery.reject(reason);
    }
    this.inFlight.clear();
    this.buffered.length = 0;
    this.wake();
  }

  get pending(): number {
    return this.buffered.length + this.inFlight.size;
  }

  private changed(signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      const onAbort = (): void => resolve();
      signal.addEventListener('abort', onAbort, { once: true });
      this.wakers.push(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      });
    });
  }

  private wake(): void {
    const wakers = this.wakers;
    this.wakers = [];
    for (const waker of wakers) waker();
  }
}
