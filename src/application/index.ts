export { retryAction, retryOperation, repeatable, singleShot, sleep } from './retry-policy.js';
export type { RetryOptions, RetryOutcome, AsyncOperation, RepeatableOperation, SingleShotOperation } from './retry-policy.js';
export { encodeDeviceEvent, decodeDeviceEvent, decodeDeviceKey } from './event-codec.js';
export { deviceDetailsSchema, registeredDetailsSchema, wireEnvelopeSchema, registerDeviceSchema, deviceIdSchema } from './device-event-schema.js';
export type { WireEnvelope, RegisterDeviceInput } from './device-event-schema.js';
export { murmur2, partitionFor } from './partitioner.js';
export { DeviceEventApplier } from './device-projection.js';
export type { DeviceStore, ApplyResult } from './device-projection.js';
export { DeviceConsumerLoop } from './consumer-loop.js';
export type {
  InboundRecord,
  DeviceEventSource,
  DeviceEventSourceFactory,
  ConsumerState,
  ConsumerLoopOptions,
} from './consumer-loop.js';
export { superviseTask } from './worker-supervisor.js';
export type { SupervisorOptions } from './worker-supervisor.js';
export { registerDevice, getDevice, removeDevice } from './device-registry.js';
export type { DeviceEventPublishing, PublishAck, RegistryDeps } from './device-registry.js';
export { EventDecodeError, InvalidDeviceEventError, PublishTimeoutError, DevicePublishError } from './errors.js';
