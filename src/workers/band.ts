import { createFramebuffer, renderRows } from '../renderer';
import type { BandTask, WorkerMessage } from './messages';
import type { BandRunner } from './task_types';

export interface RowRange {
  rowStart: number;
  rowEnd: number;
}

/**
 * Splits [0, height) into at most `bands` contiguous ranges whose sizes differ by
 * at most one row.
 */
export function splitRows(height: number, bands: number): RowRange[] {
  const count = Math.max(1, Math.min(height, Math.floor(bands)));
  const base = Math.floor(height / count);
  const extra = height % count;
  const ranges: RowRange[] = [];
  let rowStart = 0;
  for (let b = 0; b < count; b++) {
    const rowEnd = rowStart + base + (b < extra ? 1 : 0);
    ranges.push({ rowStart, rowEnd });
    rowStart = rowEnd;
  }
  return ranges;
}

export function processBandTask(taskId: string, task: BandTask): WorkerMessage {
  try {
    const framebuffer = createFramebuffer(task.width, task.height, task.colors);
    renderRows(framebuffer, task.fov, task.field, task.rowStart, task.rowEnd);
    return { type: 'complete', taskId };
  } catch (err) {
    return { type: 'error', taskId, error: err instanceof Error ? err.message : 'Unknown error' };
  }
}

/**
 * Runs bands on the calling thread.
 */
export class InlineBandRunner implements BandRunner {
  private taskCounter = 0;

  async runBand(task: BandTask): Promise<void> {
    const reply = processBandTask(`inline-${++this.taskCounter}`, task);
    if (reply.type === 'error') {
      throw new Error(reply.error);
    }
  }

  async close(): Promise<void> {}
}
