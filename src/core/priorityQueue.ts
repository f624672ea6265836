import type {
  Element,
  EntryColumns,
  EntryPredicate,
  QueueEntry,
  QueueObserver,
  QueueSnapshot,
  QueueStats,
  QueueType,
} from "./types.js";

/**
 * Heap-ordered collection with a position index keyed by `value`.
 *
 * Single mutations (insert, extractTop, updatePriority, remove) are O(log n);
 * scans (filter, getStats) are O(n). Failing calls throw a `QueueError` and
 * leave the queue unchanged.
 */
export interface IndexedPriorityQueue<V = string, O = string> {
  readonly type: QueueType;

  size(): number;
  isEmpty(): boolean;
  has(value: V): boolean;
  /** Copy of the live element, if any. */
  get(value: V): Element<V, O> | undefined;

  insert(value: V, priority: number, owner: O): void;
  peek(): QueueEntry<V, O>;
  extractTop(): QueueEntry<V, O>;
  updatePriority(value: V, newPriority: number): void;
  remove(value: V): { priority: number; owner: O };

  batchInsert(values: V[], priorities: number[], owners: O[]): void;
  /** Drains the top `count` entries in extraction order. */
  extractMultiple(count: number): EntryColumns<V, O>;
  /** Moves every element of `other` into this queue, leaving `other` empty. */
  merge(other: IndexedPriorityQueue<V, O>): void;

  /** Matching entries in storage order (not priority order). */
  filter(predicate: EntryPredicate<V, O>): EntryColumns<V, O>;
  getStats(): QueueStats;
  clear(): void;

  /** Live elements in storage order (copies). */
  toArray(): Element<V, O>[];
  snapshot(): QueueSnapshot<V, O>;

  /** Returns a function that detaches the observer. */
  subscribe(observer: QueueObserver<V, O>): () => void;
}
