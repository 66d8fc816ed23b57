import type { Sql } from './client.js';

/**
 * Creates the device table if it does not exist yet.
 *
 * Lightweight bootstrap for local runs; drizzle-kit owns real migrations.
 */
export async function ensureSchema(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS device_item (
      device_item_id  UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      device_type     VARCHAR(255) NOT NULL,
      name            VARCHAR(255) NOT NULL,
      model           VARCHAR(255) NOT NULL,
      device_address  VARCHAR(255) NOT NULL,
      serial_number   VARCHAR(255) NOT NULL,
      status          VARCHAR(50)  NOT NULL,
      user_id         UUID         NOT NULL,
      home_id         UUID         NOT NULL
    )
  `);
}
