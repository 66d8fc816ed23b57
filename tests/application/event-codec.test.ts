import { describe, it, expect } from 'vitest';
import { encodeDeviceEvent, decodeDeviceEvent, decodeDeviceKey } from '../../src/application/event-codec.js';
import { EventDecodeError } from '../../src/application/errors.js';
import { makeDetails } from '../helpers/fakes.js';

const DEVICE_ID = '3f2504e0-4f89-11d3-9a0c-0305e82c3301';

// ─── encodeDeviceEvent ───────────────────────────────────────

describe('encodeDeviceEvent', () => {
  it('writes a Deleted envelope without details', () => {
    const bytes = encodeDeviceEvent({ entityId: DEVICE_ID, eventKind: 'Deleted' });

    expect(bytes.toString('utf-8')).toBe(`{"deviceId":"${DEVICE_ID}","deviceEvent":"Deleted"}`);
  });

  it('writes the kind by name and details under stable field names', () => {
    const details = makeDetails({ name: 'Kitchen sensor' });

    const bytes = encodeDeviceEvent({ entityId: DEVICE_ID, eventKind: 'Registered', details });

    expect(JSON.parse(bytes.toString('utf-8'))).toEqual({
      deviceId: DEVICE_ID,
      deviceEvent: 'Registered',
      details: {
        deviceType: 'sensor',
        name: 'Kitchen sensor',
        model: 'TH-100',
        deviceAddress: '10.0.0.12',
        serialNumber: details.serialNumber,
        status: 'active',
        userId: '11111111-1111-4111-8111-111111111111',
        homeId: '22222222-2222-4222-8222-222222222222',
      },
    });
  });
});

// ─── decodeDeviceEvent ───────────────────────────────────────

describe('decodeDeviceEvent', () => {
  it('decodes what encodeDeviceEvent produced', () => {
    const details = makeDetails();
    const bytes = encodeDeviceEvent({ entityId: DEVICE_ID, eventKind: 'Registered', details });

    expect(decodeDeviceEvent(bytes)).toEqual({ entityId: DEVICE_ID, eventKind: 'Registered', details });
  });

  it('accepts a Deleted envelope with null details', () => {
    const event = decodeDeviceEvent(`{"deviceId":"${DEVICE_ID}","deviceEvent":"Deleted","details":null}`);

    expect(event).toEqual({ entityId: DEVICE_ID, eventKind: 'Deleted' });
  });

  it('accepts a Registered envelope without details', () => {
    const event = decodeDeviceEvent(`{"deviceId":"${DEVICE_ID}","deviceEvent":"Registered"}`);

    expect(event).toEqual({ entityId: DEVICE_ID, eventKind: 'Registered' });
  });

  it('accepts a Deleted envelope that carries details', () => {
    const details = makeDetails();
    const event = decodeDeviceEvent(JSON.stringify({ deviceId: DEVICE_ID, deviceEvent: 'Deleted', details }));

    expect(event).toEqual({ entityId: DEVICE_ID, eventKind: 'Deleted', details });
  });

  it('decodes an unknown kind without failing', () => {
    const event = decodeDeviceEvent(
      `{"deviceId":"${DEVICE_ID}","deviceEvent":"Renamed","details":{"name":"Hallway"}}`,
    );

    expect(event).toEqual({ entityId: DEVICE_ID, eventKind: 'Renamed', details: { name: 'Hallway' } });
  });

  it('passes arbitrary Deleted details through untouched', () => {
    const event = decodeDeviceEvent(
      JSON.stringify({ deviceId: DEVICE_ID, deviceEvent: 'Deleted', details: { reason: 'x' } }),
    );

    expect(event).toEqual({ entityId: DEVICE_ID, eventKind: 'Deleted', details: { reason: 'x' } });
  });

  it('decodes an unknown kind whose details are not an object', () => {
    expect(
      decodeDeviceEvent(`{"deviceId":"${DEVICE_ID}","deviceEvent":"Renamed","details":["Hallway"]}`),
    ).toEqual({ entityId: DEVICE_ID, eventKind: 'Renamed', details: ['Hallway'] });
    expect(decodeDeviceEvent(`{"deviceId":"${DEVICE_ID}","deviceEvent":"Moved","details":7}`)).toEqual({
      entityId: DEVICE_ID,
      eventKind: 'Moved',
      details: 7,
    });
  });

  it('accepts Registered details outside the registration length limits', () => {
    const details = makeDetails({ model: '', status: 's'.repeat(80) });

    const event = decodeDeviceEvent(JSON.stringify({ deviceId: DEVICE_ID, deviceEvent: 'Registered', details }));

    expect(event).toEqual({ entityId: DEVICE_ID, eventKind: 'Registered', details });
  });

  it('rejects Registered details of the wrong type', () => {
    const details = { ...makeDetails(), name: 42 };

    expect(() =>
      decodeDeviceEvent(JSON.stringify({ deviceId: DEVICE_ID, deviceEvent: 'Registered', details })),
    ).toThrow('Device event details are invalid: name: Expected string, received number');
  });

  it('rejects malformed JSON', () => {
    expect(() => decodeDeviceEvent('{"deviceId":')).toThrow(EventDecodeError);
  });

  it('rejects an empty value', () => {
    expect(() => decodeDeviceEvent(null)).toThrow('Device event has no value');
  });

  it('rejects an envelope without deviceEvent', () => {
    expect(() => decodeDeviceEvent(`{"deviceId":"${DEVICE_ID}"}`)).toThrow(
      'Device event envelope is invalid: deviceEvent: Required',
    );
  });

  it('rejects a deviceId that is not a UUID', () => {
    expect(() => decodeDeviceEvent('{"deviceId":"42","deviceEvent":"Deleted"}')).toThrow(EventDecodeError);
  });

  it('rejects Registered details with an invalid userId', () => {
    const details = { ...makeDetails(), userId: 'nobody' };

    expect(() =>
      decodeDeviceEvent(JSON.stringify({ deviceId: DEVICE_ID, deviceEvent: 'Registered', details })),
    ).toThrow('Device event details are invalid: userId: Invalid uuid');
  });

  it('rejects Registered details missing a field', () => {
    const { model: _model, ...details } = makeDetails();

    expect(() =>
      decodeDeviceEvent(JSON.stringify({ deviceId: DEVICE_ID, deviceEvent: 'Registered', details })),
    ).toThrow('Device event details are invalid: model: Required');
  });
});

// ─── decodeDeviceKey ─────────────────────────────────────────

describe('decodeDeviceKey', () => {
  it('returns the id from a string key', () => {
    expect(decodeDeviceKey(DEVICE_ID)).toBe(DEVICE_ID);
  });

  it('returns the lowercase id from an uppercase buffer key', () => {
    expect(decodeDeviceKey(Buffer.from(DEVICE_ID.toUpperCase()))).toBe(DEVICE_ID);
  });

  it('rejects a missing key', () => {
    expect(() => decodeDeviceKey(null)).toThrow('Device event has no message key');
  });

  it('rejects a key that is not a UUID', () => {
    expect(() => decodeDeviceKey('device-1')).toThrow('Device event key is not a UUID: device-1');
  });
});
