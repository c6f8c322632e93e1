export { FanInQueue, DEFAULT_QUEUE_CAPACITY } from './fan-in-queue.js';
export type { PopResult, QueueWriter, QueueReader } from './fan-in-queue.js';
