export { deviceItems } from './schema.js';
export type { DeviceItemRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, Sql } from './client.js';
export {
  insertDevice,
  insertDeviceIfAbsent,
  deleteDeviceById,
  findDeviceById,
  toDeviceRecord,
} from './device-repository.js';
export { createDeviceStore } from './device-store.js';
export { ensureSchema } from './migrate.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
