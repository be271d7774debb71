import { describe, it, expect } from 'vitest';
import { InlineBandRunner, processBandTask, splitRows } from './band';
import { DEFAULT_FIELD_PARAMS } from '../settings';
import type { BandTask } from './messages';

function bandTask(width: number, height: number, rowStart: number, rowEnd: number): BandTask {
  return {
    width,
    height,
    fov: Math.PI / 3,
    field: DEFAULT_FIELD_PARAMS,
    rowStart,
    rowEnd,
    colors: new SharedArrayBuffer(width * height * 3 * Float32Array.BYTES_PER_ELEMENT),
  };
}

describe('splitRows', () => {
  it('spreads the remainder over the first bands', () => {
    expect(splitRows(10, 3)).toEqual([
      { rowStart: 0, rowEnd: 4 },
      { rowStart: 4, rowEnd: 7 },
      { rowStart: 7, rowEnd: 10 },
    ]);
  });

  it('never creates empty bands', () => {
    expect(splitRows(2, 8)).toEqual([
      { rowStart: 0, rowEnd: 1 },
      { rowStart: 1, rowEnd: 2 },
    ]);
    expect(splitRows(5, 1)).toEqual([{ rowStart: 0, rowEnd: 5 }]);
  });

  it('covers every row exactly once', () => {
    for (const [height, bands] of [
      [480, 32],
      [7, 3],
      [1, 4],
    ]) {
      const ranges = splitRows(height, bands);
      expect(ranges[0].rowStart).toBe(0);
      expect(ranges[ranges.length - 1].rowEnd).toBe(height);
      for (let i = 1; i < ranges.length; i++) {
        expect(ranges[i].rowStart).toBe(ranges[i - 1].rowEnd);
      }
    }
  });
});

describe('processBandTask', () => {
  it('writes only the rows of its band', () => {
    const task = bandTask(4, 4, 1, 3);
    expect(processBandTask('t1', task)).toEqual({ type: 'complete', taskId: 't1' });
    const colors = new Float32Array(task.colors);
    expect(colors.subarray(0, 12).every((c) => c === 0)).toBe(true);
    expect(colors.subarray(12, 36).every((c) => c > 0)).toBe(true);
    expect(colors.subarray(36, 48).every((c) => c === 0)).toBe(true);
  });

  it('reports failures as error replies', () => {
    const task = { ...bandTask(2, 2, 0, 2), colors: new SharedArrayBuffer(4) };
    const reply = processBandTask('t2', task);
    expect(reply.type).toBe('error');
    expect(reply.taskId).toBe('t2');
  });
});

describe('InlineBandRunner', () => {
  it('fills the band on the calling thread', async () => {
    const runner = new InlineBandRunner();
    const task = bandTask(2, 2, 0, 2);
    await runner.runBand(task);
    expect(new Float32Array(task.colors).every((c) => c > 0)).toBe(true);
    await runner.close();
  });

  it('rejects when the band cannot be rendered', async () => {
    const runner = new InlineBandRunner();
    const task = { ...bandTask(2, 2, 0, 2), colors: new SharedArrayBuffer(4) };
    await expect(runner.runBand(task)).rejects.toThrow();
  });
});
