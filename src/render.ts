import type { FieldParams, PixelBuffer } from './types';
import { DEFAULT_FIELD_PARAMS, validateFieldParams, validateRenderParameters } from './settings';
import { invalidParameter } from './errors';
import { allocateColors, createFramebuffer, renderFramebuffer } from './renderer';
import { convertFramebufferToPixels } from './encoder';
import { InlineBandRunner, splitRows } from './workers/band';
import { TaskQueue } from './workers/tasks';
import type { BandRunner } from './workers/task_types';

// Rows near the middle of the frame cost far more than the background rows, so
// each worker gets several smaller bands.
const BANDS_PER_WORKER = 4;

/**
 * Renders the displaced sphere and returns row-major RGB bytes,
 * `width * height * 3` long.
 */
export function render(
  width: number,
  height: number,
  fov: number,
  params: FieldParams = DEFAULT_FIELD_PARAMS
): PixelBuffer {
  return convertFramebufferToPixels(renderFramebuffer(width, height, fov, params));
}

export interface ParallelRenderOptions {
  field?: FieldParams;
  workers?: number; // 0 renders on the calling thread
  bands?: number;
  runner?: BandRunner; // Supplied runners are left open
}

/**
 * Same output as {@link render}, computed in row bands that write disjoint
 * slices of one shared framebuffer.
 */
export async function renderParallel(
  width: number,
  height: number,
  fov: number,
  options: ParallelRenderOptions = {}
): Promise<PixelBuffer> {
  validateRenderParameters(width, height, fov);
  const workers = options.workers ?? 0;
  if (!Number.isSafeInteger(workers) || workers < 0) {
    throw invalidParameter('workers', workers, 'must be a non-negative integer');
  }
  const bandCount = options.bands ?? Math.max(1, workers) * BANDS_PER_WORKER;
  if (!Number.isSafeInteger(bandCount) || bandCount < 1) {
    throw invalidParameter('bands', bandCount, 'must be a positive integer');
  }

  const field = options.field ?? DEFAULT_FIELD_PARAMS;
  validateFieldParams(field);
  const colors = allocateColors(width, height, (n) => new SharedArrayBuffer(n));
  const runner =
    options.runner ?? (workers > 0 ? new TaskQueue(workers) : new InlineBandRunner());

  try {
    await Promise.all(
      splitRows(height, bandCount).map((range) =>
        runner.runBand({ width, height, fov, field, colors, ...range })
      )
    );
  } finally {
    if (!options.runner) {
      await runner.close();
    }
  }

  return convertFramebufferToPixels(createFramebuffer(width, height, colors));
}
