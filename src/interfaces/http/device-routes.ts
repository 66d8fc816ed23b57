import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Logger } from 'pino';
import { registerDeviceSchema, deviceIdSchema } from '../../application/device-event-schema.js';
import { registerDevice, getDevice, removeDevice } from '../../application/device-registry.js';
import type { RegistryDeps } from '../../application/device-registry.js';
import { DevicePublishError } from '../../application/errors.js';

export interface DeviceRoutesOptions {
  log: Logger;
}

/**
 * Device management routes.
 *
 * POST   /api/devices            register a device, publish Registered
 * GET    /api/devices/:deviceId  read a device
 * DELETE /api/devices/:deviceId  delete a device, publish Deleted
 *
 * Writes wait for the broker acknowledgment. If it does not come the
 * request fails with 503 even though the database write already committed.
 */
async function deviceRoutes(fastify: FastifyInstance, opts: DeviceRoutesOptions): Promise<void> {
  const deps = (): RegistryDeps => ({
    db: fastify.db,
    publisher: fastify.devicePublisher,
    log: opts.log,
  });

  // ── POST /api/devices ────────────────────────────────────
  fastify.post(
    '/api/devices',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = registerDeviceSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      try {
        const device = await registerDevice(deps(), parsed.data);
        return reply.status(201).send({ deviceId: device.id });
      } catch (err: unknown) {
        if (err instanceof DevicePublishError) {
          return reply.status(503).send({ error: err.message, deviceId: err.deviceId });
        }
        throw err;
      }
    },
  );

  // ── GET /api/devices/:deviceId ───────────────────────────
  fastify.get(
    '/api/devices/:deviceId',
    async (
      request: FastifyRequest<{ Params: { deviceId: string } }>,
      reply: FastifyReply,
    ) => {
      const parsedId = deviceIdSchema.safeParse(request.params.deviceId);
      if (!parsedId.success) {
        return reply.status(400).send({ error: 'deviceId must be a valid UUID' });
      }

      const device = await getDevice(fastify.db, parsedId.data);
      if (device === null) {
        return reply.status(404).send({ error: 'Device not found' });
      }

      return reply.status(200).send(device);
    },
  );

  // ── DELETE /api/devices/:deviceId ────────────────────────
  fastify.delete(
    '/api/devices/:deviceId',
    async (
      request: FastifyRequest<{ Params: { deviceId: string } }>,
      reply: FastifyReply,
    ) => {
      const parsedId = deviceIdSchema.safeParse(request.params.deviceId);
      if (!parsedId.success) {
        return reply.status(400).send({ error: 'deviceId must be a valid UUID' });
      }

      try {
        await removeDevice(deps(), parsedId.data);
        return reply.status(204).send();
      } catch (err: unknown) {
        if (err instanceof DevicePublishError) {
          return reply.status(503).send({ error: err.message, deviceId: err.deviceId });
        }
        throw err;
      }
    },
  );
}

export default fp(deviceRoutes, {
  name: 'device-routes',
  dependencies: ['db', 'kafka'],
  fastify: '5.x',
});
