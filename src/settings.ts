import { invalidParameter } from './errors';
import type { FieldParams } from './types';

export const DEFAULT_FIELD_PARAMS: FieldParams = Object.freeze({
  radius: 1.5,
  amplitude: 1.0,
});

export interface RenderSettings {
  width: number;
  height: number;
  fov: number; // Vertical field of view in radians
}

// Largest float framebuffer a render may allocate (1 GiB).
export const MAX_FRAMEBUFFER_BYTES = 2 ** 30;

export const DEFAULT_RENDER_SETTINGS: Readonly<RenderSettings> = Object.freeze({
  width: 640,
  height: 480,
  fov: Math.PI / 3,
});

/**
 * Builds a frozen field configuration from the defaults and any overrides.
 */
export function fieldParams(overrides: Partial<FieldParams> = {}): FieldParams {
  const radius = overrides.radius ?? DEFAULT_FIELD_PARAMS.radius;
  const amplitude = overrides.amplitude ?? DEFAULT_FIELD_PARAMS.amplitude;
  validateFieldParams({ radius, amplitude });
  return Object.freeze({ radius, amplitude });
}

export function validateFieldParams(params: FieldParams): void {
  if (!Number.isFinite(params.radius) || params.radius <= 0) {
    throw invalidParameter('radius', params.radius, 'must be a positive finite number');
  }
  if (!Number.isFinite(params.amplitude)) {
    throw invalidParameter('amplitude', params.amplitude, 'must be a finite number');
  }
}

export function validateRenderParameters(width: number, height: number, fov: number): void {
  if (!Number.isSafeInteger(width) || width <= 0) {
    throw invalidParameter('width', width, 'must be a positive integer');
  }
  if (!Number.isSafeInteger(height) || height <= 0) {
    throw invalidParameter('height', height, 'must be a positive integer');
  }
  if (!Number.isFinite(fov) || fov <= 0 || fov >= Math.PI) {
    throw invalidParameter('fov', fov, 'must lie strictly between 0 and pi radians');
  }
  if (width * height * 3 * Float32Array.BYTES_PER_ELEMENT > MAX_FRAMEBUFFER_BYTES) {
    throw invalidParameter(
      'width x height',
      `${width}x${height}`,
      `framebuffer would exceed ${MAX_FRAMEBUFFER_BYTES} bytes`
    );
  }
}
