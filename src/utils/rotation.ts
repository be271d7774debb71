import * as THREE from 'three';
import type { Vec3 } from '../vec3';

/**
 * Rotation helpers for feeding lattice noise. Rotating the domain between octaves
 * keeps lattice-aligned artifacts from stacking up.
 */
export class RotationUtils {
  /**
   * Fixed orthonormal rotation applied before the first noise octave.
   */
  static readonly NOISE_ROTATION: THREE.Matrix3 = new THREE.Matrix3().set(
    0.0, 0.8, 0.6,
    -0.8, 0.36, -0.48,
    -0.6, -0.48, 0.64
  );

  /**
   * Multiplies a point by a 3x3 matrix.
   * @param point Point to rotate
   * @param matrix Rotation matrix
   * @returns Rotated point
   */
  static rotatePoint(point: Vec3, matrix: THREE.Matrix3): Vec3 {
    // three stores matrices column-major: row i is elements[i], [i + 3], [i + 6].
    const e = matrix.elements;
    const [x, y, z] = point;
    return [
      e[0] * x + e[3] * y + e[6] * z,
      e[1] * x + e[4] * y + e[7] * z,
      e[2] * x + e[5] * y + e[8] * z,
    ];
  }

  /**
   * Checks that a matrix is orthonormal within `tolerance`, i.e. M * M^T = I.
   */
  static isOrthonormal(matrix: THREE.Matrix3, tolerance = 1e-6): boolean {
    const product = matrix.clone().multiply(matrix.clone().transpose());
    const identity = new THREE.Matrix3();
    return product.elements.every((v, i) => Math.abs(v - identity.elements[i]) <= tolerance);
  }
}
