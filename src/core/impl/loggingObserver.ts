import type { QueueEvent, QueueObserver } from "../types.js";

export type LogFn = (line: string) => void;

export function formatEvent<V, O>(queue: string, event: QueueEvent<V, O>): string {
  const prefix = `[queue ${queue}] ${event.kind}`;
  switch (event.kind) {
    case "inserted":
      return `${prefix} value=${String(event.value)} priority=${event.priority} owner=${String(event.owner)} timestamp=${event.timestamp}`;
    case "extracted":
    case "removed":
      return `${prefix} value=${String(event.value)} priority=${event.priority} owner=${String(event.owner)}`;
    case "priorityUpdated":
      return `${prefix} value=${String(event.value)} owner=${String(event.owner)} ${event.oldPriority} -> ${event.newPriority}`;
    case "cleared":
      return `${prefix} count=${event.count}`;
  }
}

/** One log line per state change. */
export function createLoggingObserver<V, O>(queue: string, log: LogFn = console.log): QueueObserver<V, O> {
  return (event) => log(formatEvent(queue, event));
}
