import type { BandTask } from './messages';

/**
 * Something that can fill one band of a shared framebuffer.
 */
export interface BandRunner {
  runBand(task: BandTask): Promise<void>;
  close(): Promise<void>;
}
