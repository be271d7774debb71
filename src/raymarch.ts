import { type Vec3, add, scale } from './vec3';
import { signedDistance } from './sdf';
import type { FieldParams, MarchResult } from './types';
import { DEFAULT_FIELD_PARAMS } from './settings';

export const MAX_STEPS = 128;
// The noise makes the field a poor distance bound, so only a fraction of it is trusted.
export const STEP_RELAXATION = 0.1;
export const MIN_STEP = 0.01;

/**
 * Walks from `origin` along `dir` until the field goes negative or the step
 * budget runs out. `dir` is expected to be unit length.
 */
export function sphereTrace(
  origin: Vec3,
  dir: Vec3,
  params: FieldParams = DEFAULT_FIELD_PARAMS
): MarchResult {
  let pos = origin;
  for (let i = 0; i < MAX_STEPS; i++) {
    const d = signedDistance(pos, params);
    if (d < 0) {
      return { kind: 'hit', position: pos, steps: i + 1 };
    }
    pos = add(pos, scale(dir, Math.max(d * STEP_RELAXATION, MIN_STEP)));
  }
  return { kind: 'miss', steps: MAX_STEPS };
}
