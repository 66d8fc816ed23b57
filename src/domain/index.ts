export type {
  DeviceEventKind,
  DeviceDetails,
  DeviceEventEnvelope,
  UnrecognizedDeviceEvent,
  RecognizedDeviceEvent,
  DecodedDeviceEvent,
  DeviceRecord,
} from './device.js';
export { DEVICE_EVENT_KINDS, isDeviceEventKind, isRecognizedEvent } from './device.js';
