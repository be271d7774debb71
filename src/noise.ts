import { type Vec3, dot, lerp } from './vec3';

// Lattice index strides along x, y and z.
const LATTICE: Vec3 = [1, 57, 113];

/** Cheap deterministic decorrelation of a float into [0, 1). Not a PRNG. */
export function hash(n: number): number {
  const s = Math.sin(n) * 43758.5453;
  return s - Math.floor(s);
}

/**
 * Value noise over the integer lattice.
 *
 * The interpolation weight is a single scalar `dot(f, 3 - 2f)` shared by all
 * three axes rather than a per-axis smoothstep. Changing it changes the look
 * of the surface, so it stays as is.
 */
export function noise3d(x: Vec3): number {
  const px = Math.floor(x[0]);
  const py = Math.floor(x[1]);
  const pz = Math.floor(x[2]);
  let fx = x[0] - px;
  let fy = x[1] - py;
  let fz = x[2] - pz;

  const w = fx * (3 - 2 * fx) + fy * (3 - 2 * fy) + fz * (3 - 2 * fz);
  fx *= w;
  fy *= w;
  fz *= w;

  const n = dot([px, py, pz], LATTICE);
  return lerp(
    lerp(lerp(hash(n), hash(n + 1), fx), lerp(hash(n + 57), hash(n + 58), fx), fy),
    lerp(lerp(hash(n + 113), hash(n + 114), fx), lerp(hash(n + 170), hash(n + 171), fx), fy),
    fz
  );
}
