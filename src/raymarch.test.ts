import { describe, it, expect } from 'vitest';
import { MAX_STEPS, sphereTrace } from './raymarch';
import { signedDistance } from './sdf';
import { fieldParams } from './settings';

describe('sphereTrace', () => {
  it('hits the object when aimed at it', () => {
    const result = sphereTrace([0, 0, 3], [0, 0, -1]);
    expect(result.kind).toBe('hit');
    if (result.kind === 'hit') {
      expect(result.steps).toBeLessThanOrEqual(MAX_STEPS);
      expect(result.position[0]).toBe(0);
      expect(result.position[1]).toBe(0);
      expect(result.position[2]).toBeLessThan(3);
      expect(signedDistance(result.position)).toBeLessThan(0);
    }
  });

  it('misses when aimed away', () => {
    const result = sphereTrace([0, 0, 3], [0, 0, 1]);
    expect(result).toEqual({ kind: 'miss', steps: MAX_STEPS });
  });

  it('stops just inside a smooth sphere', () => {
    const result = sphereTrace([0, 0, 3], [0, 0, -1], fieldParams({ amplitude: 0 }));
    expect(result.kind).toBe('hit');
    if (result.kind === 'hit') {
      // The last step is at most the 0.01 floor.
      expect(result.position[2]).toBeLessThan(1.5);
      expect(result.position[2]).toBeGreaterThan(1.49 - 1e-9);
      expect(result.steps).toBeLessThan(MAX_STEPS);
    }
  });

  it('reports an immediate hit from inside the object', () => {
    expect(sphereTrace([0, 0, 0], [1, 0, 0])).toEqual({
      kind: 'hit',
      position: [0, 0, 0],
      steps: 1,
    });
  });
});
