import type { Logger } from 'pino';
import type { DecodedDeviceEvent, DeviceRecord } from '../domain/index.js';
import { isRecognizedEvent } from '../domain/index.js';
import { InvalidDeviceEventError } from './errors.js';

/**
 * Local device table of the telemetry service.
 *
 * Both writes must be safe to repeat: the consumer delivers at least once.
 * Per-row atomicity of the backing store is all the concurrency control
 * there is.
 */
export interface DeviceStore {
  /** Inserts unless the id already exists. Resolves true if a row was written. */
  insertIfAbsent(record: DeviceRecord): Promise<boolean>;
  /** Deletes if the id exists. Resolves true if a row was removed. */
  deleteIfPresent(id: string): Promise<boolean>;
  findById(id: string): Promise<DeviceRecord | undefined>;
}

export type ApplyResult = 'registered' | 'deleted' | 'duplicate' | 'absent' | 'skipped';

/**
 * Applies decoded device events to the local store.
 */
export class DeviceEventApplier {
  constructor(
    private readonly store: DeviceStore,
    private readonly log: Logger,
  ) {}

  /** Idempotent create. A second application of the same record is a no-op. */
  async applyRegistered(record: DeviceRecord): Promise<boolean> {
    return this.store.insertIfAbsent(record);
  }

  /** Idempotent delete. Deleting an unknown id is a no-op. */
  async applyDeleted(deviceId: string): Promise<boolean> {
    return this.store.deleteIfPresent(deviceId);
  }

  /**
   * Routes an event by kind.
   *
   * `deviceId` comes from the record key. Unknown kinds are logged and
   * skipped. A Registered event without details is a contract violation
   * and is thrown.
   */
  async apply(deviceId: string, event: DecodedDeviceEvent): Promise<ApplyResult> {
    if (!isRecognizedEvent(event)) {
      this.log.warn({ deviceId, eventKind: event.eventKind }, 'Unknown device event kind, skipping');
      return 'skipped';
    }

    switch (event.eventKind) {
      case 'Registered': {
        if (event.details === undefined) {
          throw new InvalidDeviceEventError('Registered event carries no details', deviceId);
        }
        const inserted = await this.applyRegistered({ id: deviceId, ...event.details });
        if (!inserted) {
          this.log.debug({ deviceId }, 'Device already present, registration skipped');
          return 'duplicate';
        }
        this.log.info({ deviceId }, 'Device added');
        return 'registered';
      }
      case 'Deleted': {
        const deleted = await this.applyDeleted(deviceId);
        if (!deleted) {
          this.log.debug({ deviceId }, 'Device already absent, deletion skipped');
          return 'absent';
        }
        this.log.info({ deviceId }, 'Device removed');
        return 'deleted';
      }
    }
  }
}
