/** Shared core types used by module contracts. */

/** Ordering direction, fixed for the life of a queue. */
export type QueueType = "min" | "max";

export interface Element<V = string, O = string> {
  priority: number;
  /** Caller-chosen key, unique among live elements. */
  value: V;
  owner: O;
  /** Logical insertion time; never changes after insert. */
  timestamp: number;
}

export interface QueueEntry<V = string, O = string> {
  value: V;
  priority: number;
  owner: O;
}

/** Parallel arrays, index i of each describing one element. */
export interface EntryColumns<V = string, O = string> {
  values: V[];
  priorities: number[];
  owners: O[];
}

export interface QueueStats {
  size: number;
  minPriority: number;
  maxPriority: number;
  avgPriority: number;
}

/**
 * Complete queue state. The position index is not stored: it is rebuilt from
 * `elements`, whose order is the heap's storage order.
 */
export interface QueueSnapshot<V = string, O = string> {
  type: QueueType;
  clock: number;
  elements: Element<V, O>[];
}

export type QueueEvent<V = string, O = string> =
  | { kind: "inserted"; value: V; priority: number; owner: O; timestamp: number }
  | { kind: "extracted"; value: V; priority: number; owner: O }
  | { kind: "priorityUpdated"; value: V; owner: O; oldPriority: number; newPriority: number }
  | { kind: "removed"; value: V; priority: number; owner: O }
  | { kind: "cleared"; count: number };

export type QueueObserver<V = string, O = string> = (event: QueueEvent<V, O>) => void;

export type EntryPredicate<V = string, O = string> = (value: V, priority: number, owner: O) => boolean;
