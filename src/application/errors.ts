/**
 * Error types of the device event pipeline.
 *
 * Transport failures (broker unreachable, subscription lost) surface as the
 * client library's own errors; the classes here mark the cases the pipeline
 * has to tell apart.
 */

/** Record bytes or key could not be turned into an envelope. Never retried in place. */
export class EventDecodeError extends Error {
  override readonly name = 'EventDecodeError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Envelope decoded fine but breaks the Registered/details contract. */
export class InvalidDeviceEventError extends Error {
  override readonly name = 'InvalidDeviceEventError';

  constructor(
    message: string,
    readonly entityId: string,
  ) {
    super(message);
  }
}

/** The broker did not acknowledge a send within the configured timeout. */
export class PublishTimeoutError extends Error {
  override readonly name = 'PublishTimeoutError';

  constructor(
    readonly entityId: string,
    readonly timeoutMs: number,
  ) {
    super(`Broker did not acknowledge event for device ${entityId} within ${timeoutMs}ms`);
  }
}

/**
 * The device write committed but its lifecycle event was not acknowledged.
 * The caller sees the failure; the write is not rolled back.
 */
export class DevicePublishError extends Error {
  override readonly name = 'DevicePublishError';

  constructor(
    readonly deviceId: string,
    options: { cause: unknown },
  ) {
    super(`Device ${deviceId} was written but its event could not be published`, options);
  }
}
