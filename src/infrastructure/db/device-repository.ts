import { eq } from 'drizzle-orm';
import type { DeviceRecord } from '../../domain/index.js';
import type { Database } from './client.js';
import { deviceItems } from './schema.js';
import type { DeviceItemRow } from './schema.js';

export function toDeviceRecord(row: DeviceItemRow): DeviceRecord {
  return {
    id: row.device_item_id,
    deviceType: row.device_type,
    name: row.name,
    model: row.model,
    deviceAddress: row.device_address,
    serialNumber: row.serial_number,
    status: row.status,
    userId: row.user_id,
    homeId: row.home_id,
  };
}

function toRow(record: DeviceRecord): DeviceItemRow {
  return {
    device_item_id: record.id,
    device_type: record.deviceType,
    name: record.name,
    model: record.model,
    device_address: record.deviceAddress,
    serial_number: record.serialNumber,
    status: record.status,
    user_id: record.userId,
    home_id: record.homeId,
  };
}

/** Plain insert. A duplicate id is a constraint violation. */
export async function insertDevice(db: Database, record: DeviceRecord): Promise<DeviceRecord> {
  const [row] = await db.insert(deviceItems).values(toRow(record)).returning();
  if (!row) {
    throw new Error(`Insert of device ${record.id} returned no row`);
  }
  return toDeviceRecord(row);
}

/**
 * Inserts a device idempotently.
 *
 * Uses ON CONFLICT DO NOTHING on the primary key.
 * Returns true if a row was inserted, false if it was a duplicate.
 */
export async function insertDeviceIfAbsent(db: Database, record: DeviceRecord): Promise<boolean> {
  const rows = await db
    .insert(deviceItems)
    .values(toRow(record))
    .onConflictDoNothing({ target: deviceItems.device_item_id })
    .returning({ id: deviceItems.device_item_id });

  return rows.length > 0;
}

/** Deletes by id. Returns true if a row was removed, false if none matched. */
export async function deleteDeviceById(db: Database, deviceId: string): Promise<boolean> {
  const rows = await db
    .delete(deviceItems)
    .where(eq(deviceItems.device_item_id, deviceId))
    .returning({ id: deviceItems.device_item_id });

  return rows.length > 0;
}

export async function findDeviceById(db: Database, deviceId: string): Promise<DeviceRecord | undefined> {
  const rows = await db.select().from(deviceItems).where(eq(deviceItems.device_item_id, deviceId)).limit(1);
  const row = rows[0];
  return row ? toDeviceRecord(row) : undefined;
}
