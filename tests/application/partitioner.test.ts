import { describe, it, expect } from 'vitest';
import { murmur2, partitionFor } from '../../src/application/partitioner.js';

const bytes = (text: string): Buffer => Buffer.from(text, 'utf-8');

describe('murmur2', () => {
  // Reference values of Kafka's key partitioner hash
  it.each([
    ['21', -973932308],
    ['foobar', -790332482],
    ['a-little-bit-long-string', -985981536],
    ['abc', 479470107],
  ])('hashes %s to %i', (input, expected) => {
    expect(murmur2(bytes(input))).toBe(expected);
  });
});

describe('partitionFor', () => {
  it('maps known ids to fixed partitions', () => {
    expect(partitionFor('3f2504e0-4f89-11d3-9a0c-0305e82c3301', 3)).toBe(2);
    expect(partitionFor('6f1c2b1a-0d2e-4c8e-9a55-2c1f0e7d9b11', 3)).toBe(0);
  });

  it('returns the same partition on repeated calls', () => {
    const id = '6f1c2b1a-0d2e-4c8e-9a55-2c1f0e7d9b11';
    const first = partitionFor(id, 3);

    for (let i = 0; i < 10; i++) {
      expect(partitionFor(id, 3)).toBe(first);
    }
  });

  it('ignores letter case of the id', () => {
    const id = '3f2504e0-4f89-11d3-9a0c-0305e82c3301';

    expect(partitionFor(id.toUpperCase(), 3)).toBe(partitionFor(id, 3));
  });

  it('always lands inside the partition range', () => {
    const ids = Array.from({ length: 50 }, (_, i) => `00000000-0000-4000-8000-${String(i).padStart(12, '0')}`);

    for (const id of ids) {
      const partition = partitionFor(id, 3);
      expect(partition).toBeGreaterThanOrEqual(0);
      expect(partition).toBeLessThan(3);
    }
  });

  it('uses partition 0 when there is a single partition', () => {
    expect(partitionFor('3f2504e0-4f89-11d3-9a0c-0305e82c3301', 1)).toBe(0);
  });

  it('rejects a non-positive partition count', () => {
    expect(() => partitionFor('3f2504e0-4f89-11d3-9a0c-0305e82c3301', 0)).toThrow(RangeError);
  });
});
