export { BinaryHeapQueue, type BinaryHeapQueueOptions } from "./binaryHeapQueue.js";
export { createLoggingObserver, formatEvent, type LogFn } from "./loggingObserver.js";
export { QueueError, isQueueError, type QueueErrorCode } from "../errors.js";
export type { IndexedPriorityQueue } from "../priorityQueue.js";
export type * from "../types.js";
