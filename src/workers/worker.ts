import { parentPort } from 'node:worker_threads';
import type { WorkerMessage } from './messages';
import { processBandTask } from './band';

if (!parentPort) {
  throw new Error('Band worker must be started as a worker thread');
}
const port = parentPort;

port.on('message', (message: WorkerMessage) => {
  if (message.type === 'start') {
    port.postMessage(processBandTask(message.taskId, message.data));
  }
});
