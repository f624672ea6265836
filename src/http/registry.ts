import { BinaryHeapQueue, createLoggingObserver, type IndexedPriorityQueue, type LogFn, type QueueType } from "../core/impl/index.js";

/** Queues keyed by value and owner strings, the only shapes JSON callers send. */
export type HostedQueue = IndexedPriorityQueue<string, string>;

export interface QueueRegistryOptions {
  /** Attach a logging observer to every queue created. */
  logEvents?: boolean;
  /** Where logged events go. Defaults to console.log. */
  log?: LogFn;
}

/**
 * Named queues living in this process. A name is initialised once; asking for
 * it again is refused rather than resetting the existing queue.
 */
export class QueueRegistry {
  private readonly queues = new Map<string, HostedQueue>();

  constructor(private readonly opts: QueueRegistryOptions = {}) {}

  /** Returns undefined when `name` is already taken. */
  create(name: string, type: QueueType): HostedQueue | undefined {
    if (this.queues.has(name)) return undefined;
    const q = new BinaryHeapQueue<string, string>({
      type,
      observers: this.opts.logEvents ? [createLoggingObserver<string, string>(name, this.opts.log)] : [],
    });
    this.queues.set(name, q);
    return q;
  }

  get(name: string): HostedQueue | undefined {
    return this.queues.get(name);
  }

  names(): string[] {
    return [...this.queues.keys()];
  }
}
