import { type Vec3, scale } from './vec3';
import { noise3d } from './noise';
import { RotationUtils } from './utils/rotation';

// Lacunarity between consecutive octaves. Not powers of two, so the octaves
// don't line up on a shared period.
const OCTAVE_SCALES = [2.32, 3.03, 2.61];
const OCTAVE_WEIGHTS = [0.5, 0.25, 0.125, 0.0625];
const WEIGHT_SUM = 0.9375;

/**
 * Fractal Brownian motion: four octaves of value noise over a rotated domain,
 * normalized back into the range of a single octave.
 */
export function fbm(x: Vec3): number {
  let p = RotationUtils.rotatePoint(x, RotationUtils.NOISE_ROTATION);
  let f = 0;
  for (let octave = 0; octave < OCTAVE_WEIGHTS.length; octave++) {
    f += OCTAVE_WEIGHTS[octave] * noise3d(p);
    if (octave < OCTAVE_SCALES.length) {
      p = scale(p, OCTAVE_SCALES[octave]);
    }
  }
  return f / WEIGHT_SUM;
}
