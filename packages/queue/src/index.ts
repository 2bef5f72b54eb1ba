export { BoundedQueue, QueueClosedError, type BoundedQueueOptions } from './bounded-queue.js';
