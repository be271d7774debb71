import { MathUtils } from 'three';
import type { Framebuffer, PixelBuffer } from './types';

/**
 * Quantizes linear colors to 8 bits per channel. Values are clamped, so any
 * input encodes; NaN ends up as 0.
 */
export function convertFramebufferToPixels(framebuffer: Framebuffer): PixelBuffer {
  const { width, height, colors } = framebuffer;
  const pixels = new Uint8Array(width * height * 3);
  for (let i = 0; i < pixels.length; i++) {
    // Uint8Array stores truncate toward zero and map NaN to 0.
    pixels[i] = MathUtils.clamp(colors[i] * 255, 0, 255);
  }
  return pixels;
}
