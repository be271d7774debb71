import { type Vec3, dot, normalize, sub } from './vec3';
import { sphereTrace } from './raymarch';
import { estimateNormal } from './sdf';
import type { FieldParams, Framebuffer, MarchResult } from './types';
import { DEFAULT_FIELD_PARAMS, validateFieldParams, validateRenderParameters } from './settings';
import { invalidParameter } from './errors';

export const CAMERA_ORIGIN: Vec3 = [0, 0, 3];
export const LIGHT_POSITION: Vec3 = [0, 10, 10];
export const BACKGROUND: Vec3 = [0.3, 0.9, 0.2];
export const AMBIENT = 0.4;

/**
 * Allocates storage for a `width` x `height` float framebuffer. An allocation
 * the runtime refuses surfaces as an InvalidParametersError.
 */
export function allocateColors<T extends ArrayBufferLike>(
  width: number,
  height: number,
  create: (byteLength: number) => T
): T {
  const byteLength = width * height * 3 * Float32Array.BYTES_PER_ELEMENT;
  try {
    return create(byteLength);
  } catch (err) {
    if (err instanceof RangeError) {
      throw invalidParameter('width x height', `${width}x${height}`, err.message);
    }
    throw err;
  }
}

export function createFramebuffer(
  width: number,
  height: number,
  storage: ArrayBufferLike = allocateColors(width, height, (n) => new ArrayBuffer(n))
): Framebuffer {
  return { width, height, colors: new Float32Array(storage, 0, width * height * 3) };
}

/**
 * Direction through the centre of pixel (i, j) for a camera looking down -z.
 * `fov` is the vertical field of view in radians.
 */
export function cameraRay(i: number, j: number, width: number, height: number, fov: number): Vec3 {
  const x = i + 0.5 - width / 2;
  const y = -(j + 0.5) + height / 2;
  const z = -height / (2 * Math.tan(fov / 2));
  return normalize([x, y, z]);
}

export function shade(result: MarchResult, params: FieldParams = DEFAULT_FIELD_PARAMS): Vec3 {
  switch (result.kind) {
    case 'hit': {
      const lightDir = normalize(sub(LIGHT_POSITION, result.position));
      const intensity = Math.max(AMBIENT, dot(lightDir, estimateNormal(result.position, params)));
      return [intensity, intensity, intensity];
    }
    case 'miss':
      return BACKGROUND;
  }
}

/**
 * Renders rows [rowStart, rowEnd) into `framebuffer`. Every pixel owns its own
 * three slots, so disjoint row ranges can be filled concurrently.
 */
export function renderRows(
  framebuffer: Framebuffer,
  fov: number,
  params: FieldParams,
  rowStart: number,
  rowEnd: number
): void {
  const { width, height, colors } = framebuffer;
  for (let j = rowStart; j < rowEnd; j++) {
    for (let i = 0; i < width; i++) {
      const dir = cameraRay(i, j, width, height, fov);
      const color = shade(sphereTrace(CAMERA_ORIGIN, dir, params), params);
      const offset = (i + j * width) * 3;
      colors[offset] = color[0];
      colors[offset + 1] = color[1];
      colors[offset + 2] = color[2];
    }
  }
}

export function renderFramebuffer(
  width: number,
  height: number,
  fov: number,
  params: FieldParams = DEFAULT_FIELD_PARAMS
): Framebuffer {
  validateRenderParameters(width, height, fov);
  validateFieldParams(params);
  const framebuffer = createFramebuffer(width, height);
  renderRows(framebuffer, fov, params, 0, height);
  return framebuffer;
}
