import { pgTable, uuid, varchar } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `device_item` table.
 *
 * Shared by both services: the device-management service keeps the source
 * of truth here, the telemetry worker keeps its projection. `device_item_id`
 * is the primary key, which is what makes ON CONFLICT DO NOTHING an
 * idempotent create.
 */
export const deviceItems = pgTable('device_item', {
  device_item_id: uuid('device_item_id').primaryKey().defaultRandom(),
  device_type: varchar('device_type', { length: 255 }).notNull(),
  name: varchar('name', { length: 255 }).notNull(),
  model: varchar('model', { length: 255 }).notNull(),
  device_address: varchar('device_address', { length: 255 }).notNull(),
  serial_number: varchar('serial_number', { length: 255 }).notNull(),
  status: varchar('status', { length: 50 }).notNull(),
  user_id: uuid('user_id').notNull(),
  home_id: uuid('home_id').notNull(),
});

/** Row shape returned by device queries. */
export type DeviceItemRow = typeof deviceItems.$inferSelect;
