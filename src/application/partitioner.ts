/**
 * Deterministic partition assignment for device events.
 *
 * The hash is pinned to the 32-bit murmur2 variant Kafka's default
 * partitioner applies to message keys (seed 0x9747b28c), computed over the
 * UTF-8 bytes of the lowercase canonical UUID. Any producer, in any
 * language, that keys by device id lands on the same partition.
 */

const SEED = 0x9747b28c;
const M = 0x5bd1e995;
const R = 24;

/** murmur2 over raw bytes, returned as a signed 32-bit integer. */
export function murmur2(data: Uint8Array): number {
  const length = data.length;
  let h = (SEED ^ length) | 0;
  const blocks = length >>> 2;

  for (let i = 0; i < blocks; i++) {
    const i4 = i * 4;
    let k =
      (data[i4] ?? 0) |
      ((data[i4 + 1] ?? 0) << 8) |
      ((data[i4 + 2] ?? 0) << 16) |
      ((data[i4 + 3] ?? 0) << 24);
    k = Math.imul(k, M);
    k ^= k >>> R;
    k = Math.imul(k, M);
    h = Math.imul(h, M);
    h ^= k;
  }

  const tail = length & ~3;
  switch (length % 4) {
    case 3:
      h ^= (data[tail + 2] ?? 0) << 16;
    // falls through
    case 2:
      h ^= (data[tail + 1] ?? 0) << 8;
    // falls through
    case 1:
      h ^= data[tail] ?? 0;
      h = Math.imul(h, M);
  }

  h ^= h >>> 13;
  h = Math.imul(h, M);
  h ^= h >>> 15;
  return h | 0;
}

/**
 * Partition for a device id: `toPositive(murmur2(id)) % partitionCount`.
 */
export function partitionFor(deviceId: string, partitionCount: number): number {
  if (!Number.isInteger(partitionCount) || partitionCount < 1) {
    throw new RangeError(`partitionCount must be a positive integer, got ${partitionCount}`);
  }
  const hash = murmur2(Buffer.from(deviceId.toLowerCase(), 'utf-8'));
  return (hash & 0x7fffffff) % partitionCount;
}
