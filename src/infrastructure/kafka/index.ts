export { createKafka } from './client.js';
export type { KafkaClientOptions } from './client.js';
export { DeviceEventPublisher } from './device-event-publisher.js';
export type { EventProducer, PublisherOptions } from './device-event-publisher.js';
export { openKafkaDeviceEventSource } from './device-event-source.js';
export type { SourceOptions } from './device-event-source.js';
export { DeliveryQueue } from './delivery-queue.js';
export { default as kafkaPlugin } from './kafka-plugin.js';
export type { KafkaPluginOptions } from './kafka-plugin.js';
