import { invalidParameter } from './errors';
import type { PixelBuffer } from './types';

export interface PPMExportOptions {
  comment?: string; // Written as a '#' line after the magic number
}

export function exportToPPM(
  pixels: PixelBuffer,
  width: number,
  height: number,
  options: PPMExportOptions = {}
): Uint8Array {
  if (pixels.length !== width * height * 3) {
    throw invalidParameter('pixels', pixels.length, `expected ${width * height * 3} bytes`);
  }

  // Binary PPM:
  //   P6\n
  //   [# comment\n]
  //   <width> <height>\n
  //   255\n
  //   width * height RGB byte triples, row-major
  const comment = options.comment ? `# ${options.comment.replace(/[\r\n]+/g, ' ')}\n` : '';
  const header = new TextEncoder().encode(`P6\n${comment}${width} ${height}\n255\n`);

  const buffer = new Uint8Array(header.length + pixels.length);
  buffer.set(header, 0);
  buffer.set(pixels, header.length);
  return buffer;
}
