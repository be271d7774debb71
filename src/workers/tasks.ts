import { Worker } from 'node:worker_threads';
import { invalidParameter } from '../errors';
import type { BandTask, TaskProgress, WorkerMessage } from './messages';
import type { BandRunner } from './task_types';

export interface WorkerLike {
  postMessage(message: WorkerMessage): void;
  on(event: 'message', listener: (message: WorkerMessage) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'exit', listener: (code: number) => void): unknown;
  terminate(): Promise<number>;
}

export type WorkerFactory = () => WorkerLike;

export function spawnBandWorker(): WorkerLike {
  // The bootstrap registers tsx inside the thread before loading worker.ts.
  return new Worker(new URL('./bootstrap.mjs', import.meta.url));
}

interface PendingTask {
  progress: TaskProgress;
  worker: WorkerLike;
  resolve: () => void;
  reject: (err: Error) => void;
}

/**
 * Hands band tasks to a fixed pool of worker threads, round-robin. Each worker
 * processes its messages in order, so no further scheduling is needed.
 */
export class TaskQueue implements BandRunner {
  private workers: WorkerLike[];
  private exited = new Set<WorkerLike>();
  private closing = false;
  private tasks = new Map<string, PendingTask>();
  private taskCounter = 0;
  private nextWorker = 0;
  private listeners = new Set<(progress: TaskProgress) => void>();

  constructor(workerCount: number, createWorker: WorkerFactory = spawnBandWorker) {
    if (!Number.isSafeInteger(workerCount) || workerCount < 1) {
      throw invalidParameter('workers', workerCount, 'must be a positive integer');
    }
    this.workers = Array.from({ length: workerCount }, () => {
      const worker = createWorker();
      worker.on('message', (message: WorkerMessage) => this.handleWorkerMessage(message));
      worker.on('error', (err: Error) => this.handleWorkerError(worker, err));
      worker.on('exit', (code: number) => this.handleWorkerExit(worker, code));
      return worker;
    });
  }

  get size(): number {
    return this.workers.length;
  }

  private handleWorkerMessage(message: WorkerMessage) {
    const task = this.tasks.get(message.taskId);
    if (!task) {
      console.warn('[TaskQueue] No task found for message:', message);
      return;
    }

    switch (message.type) {
      case 'start':
        return;
      case 'complete':
        task.progress.status = 'completed';
        this.tasks.delete(message.taskId);
        this.notifyListeners(task.progress);
        task.resolve();
        break;
      case 'error':
        this.fail(message.taskId, task, new Error(message.error));
        break;
    }
  }

  private handleWorkerError(worker: WorkerLike, err: Error) {
    console.error('[TaskQueue] Worker failed:', err.message);
    this.exited.add(worker);
    this.failTasksOf(worker, err);
  }

  private handleWorkerExit(worker: WorkerLike, code: number) {
    this.exited.add(worker);
    if (this.closing) return;
    console.error('[TaskQueue] Worker exited with code', code);
    this.failTasksOf(worker, new Error(`Worker exited with code ${code}`));
  }

  private failTasksOf(worker: WorkerLike, err: Error) {
    for (const [taskId, task] of this.tasks) {
      if (task.worker === worker) {
        this.fail(taskId, task, err);
      }
    }
  }

  private pickWorker(): WorkerLike | undefined {
    for (let tried = 0; tried < this.workers.length; tried++) {
      const worker = this.workers[this.nextWorker];
      this.nextWorker = (this.nextWorker + 1) % this.workers.length;
      if (!this.exited.has(worker)) return worker;
    }
    return undefined;
  }

  private fail(taskId: string, task: PendingTask, err: Error) {
    task.progress.status = 'failed';
    task.progress.error = err.message;
    this.tasks.delete(taskId);
    this.notifyListeners(task.progress);
    task.reject(err);
  }

  private notifyListeners(progress: TaskProgress) {
    this.listeners.forEach((listener) => listener({ ...progress }));
  }

  addTask(task: BandTask): { taskId: string; done: Promise<void> } {
    const taskId = `task-${++this.taskCounter}`;
    const worker = this.pickWorker();
    if (!worker) {
      return { taskId, done: Promise.reject(new Error('No workers left to run the task')) };
    }

    const done = new Promise<void>((resolve, reject) => {
      const progress: TaskProgress = {
        taskId,
        rows: task.rowEnd - task.rowStart,
        status: 'queued',
      };
      this.tasks.set(taskId, { progress, worker, resolve, reject });
      this.notifyListeners(progress);
    });

    worker.postMessage({ type: 'start', taskId, data: task });
    return { taskId, done };
  }

  runBand(task: BandTask): Promise<void> {
    return this.addTask(task).done;
  }

  onProgress(callback: (progress: TaskProgress) => void) {
    this.listeners.add(callback);
    return () => this.listeners.delete(callback);
  }

  getTask(taskId: string): TaskProgress | undefined {
    return this.tasks.get(taskId)?.progress;
  }

  async close(): Promise<void> {
    this.closing = true;
    for (const [taskId, task] of this.tasks) {
      this.fail(taskId, task, new Error('Task queue closed'));
    }
    await Promise.all(this.workers.map((worker) => worker.terminate()));
  }
}
