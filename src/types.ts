import type { Vec3 } from './vec3';

/**
 * Shape of the displaced sphere. Passed explicitly so one process can render
 * several configurations side by side.
 */
export interface FieldParams {
  readonly radius: number;
  readonly amplitude: number;
}

export interface Framebuffer {
  width: number;
  height: number;
  colors: Float32Array; // Linear RGB triples, pixel (x, y) at (x + y * width) * 3
}

// Row-major RGB bytes, width * height * 3 long.
export type PixelBuffer = Uint8Array;

export type MarchResult =
  | { kind: 'hit'; position: Vec3; steps: number }
  | { kind: 'miss'; steps: number };
