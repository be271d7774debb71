import { type Vec3, norm, normalize, scale } from './vec3';
import { fbm } from './fbm';
import type { FieldParams } from './types';
import { DEFAULT_FIELD_PARAMS } from './settings';

// Spatial frequency of the displacement noise.
const NOISE_FREQUENCY = 3.4;
const NORMAL_EPSILON = 0.1;

/**
 * Distance to a sphere whose surface is pushed inwards by fractal noise.
 * Negative inside, positive outside.
 */
export function signedDistance(p: Vec3, params: FieldParams = DEFAULT_FIELD_PARAMS): number {
  const displacement = -fbm(scale(p, NOISE_FREQUENCY)) * params.amplitude;
  return norm(p) - (params.radius + displacement);
}

/**
 * Surface normal from forward differences of the field. First order only; the
 * division by epsilon is dropped since the gradient is normalized anyway.
 */
export function estimateNormal(p: Vec3, params: FieldParams = DEFAULT_FIELD_PARAMS): Vec3 {
  const eps = NORMAL_EPSILON;
  const d = signedDistance(p, params);
  const nx = signedDistance([p[0] + eps, p[1], p[2]], params) - d;
  const ny = signedDistance([p[0], p[1] + eps, p[2]], params) - d;
  const nz = signedDistance([p[0], p[1], p[2] + eps], params) - d;
  return normalize([nx, ny, nz]);
}
