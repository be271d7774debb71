import { MathUtils } from 'three';

export type Vec3 = readonly [number, number, number];

export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function scale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

export function norm(v: Vec3): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

/** Unit vector in the direction of `v`, or the zero vector when `v` has no length. */
export function normalize(v: Vec3): Vec3 {
  const n = norm(v);
  return n > 0 ? [v[0] / n, v[1] / n, v[2] / n] : [0, 0, 0];
}

/**
 * Blends `a` towards `b`. `t` is clamped to [0, 1] first, so the result never
 * leaves the segment between the two endpoints.
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * MathUtils.clamp(t, 0, 1);
}

export function lerpVec3(a: Vec3, b: Vec3, t: number): Vec3 {
  return add(a, scale(sub(b, a), MathUtils.clamp(t, 0, 1)));
}
