import type { DecodedDeviceEvent, DeviceEventEnvelope } from '../domain/index.js';
import { EventDecodeError } from './errors.js';
import { deviceIdSchema, registeredDetailsSchema, wireEnvelopeSchema } from './device-event-schema.js';
import type { WireEnvelope } from './device-event-schema.js';

/**
 * Serializes an envelope to UTF-8 JSON.
 *
 * The kind is written by name, never by position, so reordering
 * DEVICE_EVENT_KINDS cannot break consumers. `details` is omitted when absent.
 */
export function encodeDeviceEvent(envelope: DeviceEventEnvelope): Buffer {
  const wire: WireEnvelope = {
    deviceId: envelope.entityId,
    deviceEvent: envelope.eventKind,
  };
  if (envelope.details !== undefined) {
    wire.details = { ...envelope.details };
  }
  return Buffer.from(JSON.stringify(wire), 'utf-8');
}

/**
 * Parses a record value into an envelope.
 *
 * Whether `details` is present for a given kind is not checked here; that is
 * the apply handler's call. Only Registered details are validated. Details of
 * a Deleted envelope and of unknown kinds pass through untouched, and unknown
 * kinds decode to an unrecognized event.
 *
 * @throws EventDecodeError on an empty value, malformed JSON or a missing/invalid field.
 */
export function decodeDeviceEvent(bytes: Buffer | string | null): DecodedDeviceEvent {
  if (bytes === null) {
    throw new EventDecodeError('Device event has no value');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(typeof bytes === 'string' ? bytes : bytes.toString('utf-8'));
  } catch (err: unknown) {
    throw new EventDecodeError('Device event is not valid JSON', { cause: err });
  }

  const parsed = wireEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EventDecodeError(`Device event envelope is invalid: ${formatIssues(parsed.error.issues)}`, {
      cause: parsed.error,
    });
  }

  const { deviceId, deviceEvent, details } = parsed.data;
  const absent = details === undefined || details === null;

  if (deviceEvent === 'Deleted') {
    return absent
      ? { entityId: deviceId, eventKind: 'Deleted' }
      : { entityId: deviceId, eventKind: 'Deleted', details };
  }

  if (deviceEvent !== 'Registered') {
    return absent
      ? { entityId: deviceId, eventKind: deviceEvent }
      : { entityId: deviceId, eventKind: deviceEvent, details };
  }

  if (absent) {
    return { entityId: deviceId, eventKind: 'Registered' };
  }

  const parsedDetails = registeredDetailsSchema.safeParse(details);
  if (!parsedDetails.success) {
    throw new EventDecodeError(
      `Device event details are invalid: ${formatIssues(parsedDetails.error.issues)}`,
      { cause: parsedDetails.error },
    );
  }
  return { entityId: deviceId, eventKind: 'Registered', details: parsedDetails.data };
}

/**
 * Resolves the entity id of a record from its message key.
 *
 * @throws EventDecodeError when the key is missing or not a UUID.
 */
export function decodeDeviceKey(key: Buffer | string | null): string {
  if (key === null) {
    throw new EventDecodeError('Device event has no message key');
  }
  const text = typeof key === 'string' ? key : key.toString('utf-8');
  const parsed = deviceIdSchema.safeParse(text);
  if (!parsed.success) {
    throw new EventDecodeError(`Device event key is not a UUID: ${text}`);
  }
  return parsed.data;
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
