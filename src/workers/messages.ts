import type { FieldParams } from '../types';

export interface BandTask {
  width: number;
  height: number;
  fov: number;
  field: FieldParams;
  rowStart: number;
  rowEnd: number;
  colors: SharedArrayBuffer; // Whole framebuffer; the band writes only its own rows
}

export type TaskStatus = 'queued' | 'completed' | 'failed';

export interface TaskProgress {
  taskId: string;
  rows: number;
  status: TaskStatus;
  error?: string;
}

export type WorkerMessage =
  | { type: 'start'; taskId: string; data: BandTask }
  | { type: 'complete'; taskId: string }
  | { type: 'error'; taskId: string; error: string };
