import { z } from 'zod';

/**
 * Zod schemas for the device event wire format and the registration body.
 *
 * Wire field names are fixed here and do not follow the in-memory naming:
 * the envelope travels as `{ deviceId, deviceEvent, details }`.
 */

export const deviceDetailsSchema = z.object({
  deviceType: z.string().min(1).max(255),
  name: z.string().min(1).max(255),
  model: z.string().min(1).max(255),
  deviceAddress: z.string().min(1).max(255),
  serialNumber: z.string().min(1).max(255),
  status: z.string().min(1).max(50),
  userId: z.string().uuid(),
  homeId: z.string().uuid(),
});

/**
 * Registered payload as read off the topic.
 *
 * Only types and id shapes are checked here. Length limits belong to the
 * registration endpoint; a consumer takes whatever the producer committed.
 */
export const registeredDetailsSchema = z.object({
  deviceType: z.string(),
  name: z.string(),
  model: z.string(),
  deviceAddress: z.string(),
  serialNumber: z.string(),
  status: z.string(),
  userId: z.string().uuid(),
  homeId: z.string().uuid(),
});

/**
 * Envelope as read off the topic.
 *
 * `deviceEvent` stays an open string so kinds added by newer producers still
 * decode; `details` is kept raw until the kind is known.
 */
export const wireEnvelopeSchema = z.object({
  deviceId: z.string().uuid(),
  deviceEvent: z.string().min(1),
  details: z.unknown(),
});

export type WireEnvelope = z.infer<typeof wireEnvelopeSchema>;

/** Body accepted by POST /api/devices. Same shape as the Registered payload. */
export const registerDeviceSchema = deviceDetailsSchema;

export type RegisterDeviceInput = z.infer<typeof registerDeviceSchema>;

/** Device id in canonical lowercase form. */
export const deviceIdSchema = z
  .string()
  .uuid()
  .transform((id) => id.toLowerCase());
