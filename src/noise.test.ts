import { describe, it, expect } from 'vitest';
import { hash, noise3d } from './noise';

describe('hash', () => {
  it('maps zero to zero', () => {
    expect(hash(0)).toBe(0);
  });

  it('stays within [0, 1)', () => {
    for (let n = -500; n < 500; n++) {
      const h = hash(n + 0.25);
      expect(h).toBeGreaterThanOrEqual(0);
      expect(h).toBeLessThan(1);
    }
  });

  it('is deterministic', () => {
    expect(hash(12.5)).toBe(hash(12.5));
  });
});

describe('noise3d', () => {
  it('returns the lattice hash at integer points', () => {
    // n = 1 + 57 * 2 + 113 * 3
    expect(noise3d([1, 2, 3])).toBe(hash(454));
    expect(noise3d([-1, 0, 0])).toBe(hash(-1));
    expect(noise3d([0, 0, 0])).toBe(0);
  });

  it('stays within the range of the hash', () => {
    for (let i = 0; i < 10; i++) {
      for (let j = 0; j < 10; j++) {
        const v = noise3d([i * 0.37 - 2, j * 0.61 + 0.1, (i + j) * 0.23]);
        expect(v).toBeGreaterThanOrEqual(0);
        expect(v).toBeLessThan(1);
      }
    }
  });

  it('yields identical values for identical inputs', () => {
    const p = [0.3, -1.7, 2.2] as const;
    const first = noise3d(p);
    for (let i = 0; i < 5; i++) {
      expect(noise3d([0.3, -1.7, 2.2])).toBe(first);
    }
  });

  it('saturates the weight once the offsets add up', () => {
    // w = 3 * (0.5 * 2) = 3, so every axis weight clamps to 1 and the far corner wins.
    expect(noise3d([0.5, 0.5, 0.5])).toBeCloseTo(hash(171), 12);
  });
});
