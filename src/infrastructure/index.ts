export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export {
  createDbClient,
  createDeviceStore,
  ensureSchema,
  insertDevice,
  insertDeviceIfAbsent,
  deleteDeviceById,
  findDeviceById,
  deviceItems,
  dbPlugin,
} from './db/index.js';
export type { Database, DeviceItemRow } from './db/index.js';
export { createKafka, DeviceEventPublisher, openKafkaDeviceEventSource, kafkaPlugin } from './kafka/index.js';
export type { EventProducer } from './kafka/index.js';
export { runDeviceSync } from './worker/index.js';
