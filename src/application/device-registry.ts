import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { DeviceDetails, DeviceEventKind, DeviceRecord } from '../domain/index.js';
import type { Database } from '../infrastructure/db/index.js';
import { insertDevice, findDeviceById, deleteDeviceById } from '../infrastructure/db/index.js';
import { DevicePublishError } from './errors.js';

/** Broker acknowledgment for one published event. */
export interface PublishAck {
  readonly topic: string;
  readonly partition: number;
  readonly offset: string | undefined;
}

export interface DeviceEventPublishing {
  publish(entityId: string, eventKind: DeviceEventKind, details?: DeviceDetails): Promise<PublishAck>;
}

export interface RegistryDeps {
  db: Database;
  publisher: DeviceEventPublishing;
  log: Logger;
}

/**
 * Stores a new device, then publishes `Registered` and waits for the ack.
 *
 * There is no outbox: if the publish fails the row stays committed and the
 * caller receives a DevicePublishError.
 */
export async function registerDevice(deps: RegistryDeps, input: DeviceDetails): Promise<DeviceRecord> {
  const device = await insertDevice(deps.db, { id: randomUUID(), ...input });
  await publishOrThrow(deps, device.id, 'Registered', input);
  return device;
}

/** Fetch a single device by id. Returns null if not found. */
export async function getDevice(db: Database, deviceId: string): Promise<DeviceRecord | null> {
  const row = await findDeviceById(db, deviceId);
  return row ?? null;
}

/**
 * Deletes a device and publishes `Deleted`.
 *
 * The event goes out even when no row matched, so a projection that drifted
 * still converges. Returns whether a row was removed.
 */
export async function removeDevice(deps: RegistryDeps, deviceId: string): Promise<boolean> {
  const removed = await deleteDeviceById(deps.db, deviceId);
  await publishOrThrow(deps, deviceId, 'Deleted');
  return removed;
}

async function publishOrThrow(
  deps: RegistryDeps,
  deviceId: string,
  eventKind: DeviceEventKind,
  details?: DeviceDetails,
): Promise<void> {
  try {
    const ack = await deps.publisher.publish(deviceId, eventKind, details);
    deps.log.info({ deviceId, eventKind, partition: ack.partition, offset: ack.offset }, 'Device event published');
  } catch (err: unknown) {
    deps.log.error({ err, deviceId, eventKind }, 'Failed to publish device event');
    throw new DevicePublishError(deviceId, { cause: err });
  }
}
