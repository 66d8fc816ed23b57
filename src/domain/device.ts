/**
 * Core domain types for device lifecycle propagation.
 *
 * These types describe a device as it moves from the device-management
 * service to the telemetry projection. They carry no framework dependencies.
 */

/** Lifecycle events a producer may emit for a device. */
export const DEVICE_EVENT_KINDS = ['Registered', 'Deleted'] as const;

export type DeviceEventKind = (typeof DEVICE_EVENT_KINDS)[number];

/** Registration payload, fixed for the lifetime of a device. */
export interface DeviceDetails {
  readonly deviceType: string;
  readonly name: string;
  readonly model: string;
  readonly deviceAddress: string;
  readonly serialNumber: string;
  readonly status: string;
  readonly userId: string;
  readonly homeId: string;
}

/**
 * Envelope published for every lifecycle change.
 *
 * `details` accompanies `Registered` and is absent for `Deleted`.
 */
export interface DeviceEventEnvelope {
  readonly entityId: string;
  readonly eventKind: DeviceEventKind;
  readonly details?: DeviceDetails | undefined;
}

/**
 * An envelope whose kind this build does not know about.
 * Produced by newer publishers; consumers skip it.
 */
export interface UnrecognizedDeviceEvent {
  readonly entityId: string;
  readonly eventKind: string;
  readonly details?: unknown;
}

/**
 * A decoded envelope of a known kind.
 *
 * Registered details are validated; anything a Deleted envelope carries is
 * kept as it arrived and ignored.
 */
export type RecognizedDeviceEvent =
  | {
      readonly entityId: string;
      readonly eventKind: 'Registered';
      readonly details?: DeviceDetails | undefined;
    }
  | {
      readonly entityId: string;
      readonly eventKind: 'Deleted';
      readonly details?: unknown;
    };

export type DecodedDeviceEvent = RecognizedDeviceEvent | UnrecognizedDeviceEvent;

export function isDeviceEventKind(value: string): value is DeviceEventKind {
  return (DEVICE_EVENT_KINDS as readonly string[]).includes(value);
}

export function isRecognizedEvent(event: DecodedDeviceEvent): event is RecognizedDeviceEvent {
  return isDeviceEventKind(event.eventKind);
}

/** Local projection row. No update path: a record only appears or disappears. */
export interface DeviceRecord extends DeviceDetails {
  readonly id: string;
}
