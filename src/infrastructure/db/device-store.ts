import type { DeviceStore } from '../../application/device-projection.js';
import type { Database } from './client.js';
import { insertDeviceIfAbsent, deleteDeviceById, findDeviceById } from './device-repository.js';

/** Postgres-backed projection store used by the telemetry worker. */
export function createDeviceStore(db: Database): DeviceStore {
  return {
    insertIfAbsent: (record) => insertDeviceIfAbsent(db, record),
    deleteIfPresent: (id) => deleteDeviceById(db, id),
    findById: (id) => findDeviceById(db, id),
  };
}
