import { QueueError } from "../errors.js";
import type { IndexedPriorityQueue } from "../priorityQueue.js";
import type {
  Element,
  EntryColumns,
  EntryPredicate,
  QueueEntry,
  QueueEvent,
  QueueObserver,
  QueueSnapshot,
  QueueStats,
  QueueType,
} from "../types.js";

export interface BinaryHeapQueueOptions<V, O> {
  type: QueueType;
  /** Source of insertion timestamps. Defaults to a per-queue counter starting at 1. */
  clock?: () => number;
  observers?: QueueObserver<V, O>[];
}

/**
 * Array-backed binary heap plus a value -> slot map.
 *
 * Slots are 0-based: parent (i-1)>>1, children 2i+1 and 2i+2. Every slot write
 * goes through `place`, which keeps the index in step with the array.
 */
export class BinaryHeapQueue<V = string, O = string> implements IndexedPriorityQueue<V, O> {
  readonly type: QueueType;

  private readonly data: Element<V, O>[] = [];
  private readonly positions = new Map<V, number>();
  private readonly observers: QueueObserver<V, O>[];
  private readonly clock: () => number;
  /** Highest timestamp issued so far. */
  private ticks = 0;
  private deferred: QueueEvent<V, O>[] | undefined;

  constructor(opts: BinaryHeapQueueOptions<V, O>) {
    this.type = opts.type;
    this.observers = [...(opts.observers ?? [])];
    this.clock = opts.clock ?? (() => ++this.ticks);
  }

  /**
   * Rebuilds a queue from `snapshot()` output. The elements must already be in
   * heap order; the position index is derived from them.
   */
  static fromSnapshot<V, O>(
    snapshot: QueueSnapshot<V, O>,
    opts: Omit<BinaryHeapQueueOptions<V, O>, "type"> = {},
  ): BinaryHeapQueue<V, O> {
    const q = new BinaryHeapQueue<V, O>({ ...opts, type: snapshot.type });
    q.ticks = snapshot.clock;

    for (const el of snapshot.elements) {
      assertPriority(el.priority, el.value);
      if (q.positions.has(el.value)) {
        throw new QueueError("DUPLICATE_KEY", `snapshot repeats value ${String(el.value)}`, el.value);
      }
      q.place(q.data.length, { ...el });
      q.ticks = Math.max(q.ticks, el.timestamp);
    }

    for (let i = 1; i < q.data.length; i++) {
      if (q.shouldPrecede(i, (i - 1) >> 1)) {
        throw new QueueError("CORRUPT_SNAPSHOT", `slot ${i} precedes its parent`);
      }
    }
    return q;
  }

  size(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  has(value: V): boolean {
    return this.positions.has(value);
  }

  get(value: V): Element<V, O> | undefined {
    const i = this.positions.get(value);
    return i === undefined ? undefined : { ...this.slot(i) };
  }

  /** Current slot of `value`, or undefined when it is not live. */
  positionOf(value: V): number | undefined {
    return this.positions.get(value);
  }

  insert(value: V, priority: number, owner: O): void {
    assertPriority(priority, value);
    if (this.positions.has(value)) {
      throw new QueueError("DUPLICATE_KEY", `value ${String(value)} is already queued`, value);
    }
    const el: Element<V, O> = { priority, value, owner, timestamp: this.clock() };
    this.ticks = Math.max(this.ticks, el.timestamp);
    this.place(this.data.length, el);
    this.siftUp(this.data.length - 1);
    this.emit({ kind: "inserted", value, priority, owner, timestamp: el.timestamp });
  }

  peek(): QueueEntry<V, O> {
    if (this.data.length === 0) throw emptyQueue();
    return entryOf(this.slot(0));
  }

  extractTop(): QueueEntry<V, O> {
    if (this.data.length === 0) throw emptyQueue();
    const top = this.detach(0);
    this.emit({ kind: "extracted", value: top.value, priority: top.priority, owner: top.owner });
    return entryOf(top);
  }

  updatePriority(value: V, newPriority: number): void {
    const i = this.positions.get(value);
    if (i === undefined) throw notFound(value);
    assertPriority(newPriority, value);

    const el = this.slot(i);
    const oldPriority = el.priority;
    el.priority = newPriority;

    // A change can only break order on one side of the slot.
    if (this.comesFirst(newPriority, oldPriority)) this.siftUp(i);
    else if (this.comesFirst(oldPriority, newPriority)) this.siftDown(i);

    this.emit({ kind: "priorityUpdated", value, owner: el.owner, oldPriority, newPriority });
  }

  remove(value: V): { priority: number; owner: O } {
    const i = this.positions.get(value);
    if (i === undefined) throw notFound(value);
    const el = this.detach(i);
    this.emit({ kind: "removed", value, priority: el.priority, owner: el.owner });
    return { priority: el.priority, owner: el.owner };
  }

  batchInsert(values: V[], priorities: number[], owners: O[]): void {
    if (values.length !== priorities.length || values.length !== owners.length) {
      throw new QueueError(
        "LENGTH_MISMATCH",
        `batch lengths differ: values=${values.length} priorities=${priorities.length} owners=${owners.length}`,
      );
    }

    // Reject the whole batch before touching the heap.
    const seen = new Set<V>();
    for (let k = 0; k < values.length; k++) {
      const value = values[k];
      assertPriority(priorities[k], value);
      if (this.positions.has(value) || seen.has(value)) {
        throw new QueueError("DUPLICATE_KEY", `value ${String(value)} is already queued`, value);
      }
      seen.add(value);
    }

    this.withDeferredEvents(() => {
      for (let k = 0; k < values.length; k++) {
        this.insert(values[k], priorities[k], owners[k]);
      }
    });
  }

  extractMultiple(count: number): EntryColumns<V, O> {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`count must be a non-negative integer, got ${count}`);
    }
    if (count > this.data.length) {
      throw new QueueError("INSUFFICIENT_ELEMENTS", `requested ${count} elements, queue holds ${this.data.length}`);
    }

    return this.withDeferredEvents(() => {
      const out: EntryColumns<V, O> = { values: [], priorities: [], owners: [] };
      for (let k = 0; k < count; k++) {
        const e = this.extractTop();
        out.values.push(e.value);
        out.priorities.push(e.priority);
        out.owners.push(e.owner);
      }
      return out;
    });
  }

  merge(other: IndexedPriorityQueue<V, O>): void {
    if (other.type !== this.type) {
      throw new QueueError("INCOMPATIBLE_QUEUE_TYPE", `cannot merge a ${other.type} heap into a ${this.type} heap`);
    }
    if (other === this) return;

    for (const el of other.toArray()) {
      if (this.positions.has(el.value)) {
        throw new QueueError("DUPLICATE_KEY", `value ${String(el.value)} is queued in both heaps`, el.value);
      }
    }

    this.withDeferredEvents(() => {
      while (!other.isEmpty()) {
        const e = other.extractTop();
        this.insert(e.value, e.priority, e.owner);
      }
    });
  }

  filter(predicate: EntryPredicate<V, O>): EntryColumns<V, O> {
    const out: EntryColumns<V, O> = { values: [], priorities: [], owners: [] };
    for (const el of this.data) {
      if (!predicate(el.value, el.priority, el.owner)) continue;
      out.values.push(el.value);
      out.priorities.push(el.priority);
      out.owners.push(el.owner);
    }
    return out;
  }

  getStats(): QueueStats {
    const n = this.data.length;
    if (n === 0) return { size: 0, minPriority: 0, maxPriority: 0, avgPriority: 0 };

    let min = Infinity;
    let max = -Infinity;
    // Running mean: a plain sum overflows near Number.MAX_VALUE.
    let mean = 0;
    let k = 0;
    for (const el of this.data) {
      if (el.priority < min) min = el.priority;
      if (el.priority > max) max = el.priority;
      k++;
      mean += el.priority / k - mean / k;
    }
    return { size: n, minPriority: min, maxPriority: max, avgPriority: mean };
  }

  clear(): void {
    const count = this.data.length;
    this.data.length = 0;
    this.positions.clear();
    this.emit({ kind: "cleared", count });
  }

  toArray(): Element<V, O>[] {
    return this.data.map((el) => ({ ...el }));
  }

  snapshot(): QueueSnapshot<V, O> {
    return { type: this.type, clock: this.ticks, elements: this.toArray() };
  }

  subscribe(observer: QueueObserver<V, O>): () => void {
    this.observers.push(observer);
    return () => {
      const idx = this.observers.indexOf(observer);
      if (idx >= 0) this.observers.splice(idx, 1);
    };
  }

  private emit(event: QueueEvent<V, O>): void {
    if (this.deferred) {
      this.deferred.push(event);
      return;
    }
    for (const observer of [...this.observers]) observer(event);
  }

  /**
   * Runs a multi-element mutation with notifications held back until it has
   * finished, so a throwing observer cannot stop it halfway.
   */
  private withDeferredEvents<T>(fn: () => T): T {
    if (this.deferred) return fn();
    const held: QueueEvent<V, O>[] = [];
    this.deferred = held;
    try {
      return fn();
    } finally {
      this.deferred = undefined;
      for (const event of held) this.emit(event);
    }
  }

  private slot(i: number): Element<V, O> {
    const el = this.data[i];
    if (el === undefined) throw new RangeError(`heap slot ${i} is out of range`);
    return el;
  }

  /** Writes `el` into slot i and records the slot in the index. */
  private place(i: number, el: Element<V, O>): void {
    this.data[i] = el;
    this.positions.set(el.value, i);
  }

  /**
   * Takes the element out of slot i, fills the hole with the last element and
   * restores order around it. The moved element may belong above or below the
   * hole, so both directions are tried.
   */
  private detach(i: number): Element<V, O> {
    const el = this.slot(i);
    const last = this.data.pop();
    this.positions.delete(el.value);

    if (last !== undefined && last !== el) {
      this.place(i, last);
      this.siftUp(i);
      this.siftDown(i);
    }
    return el;
  }

  private comesFirst(a: number, b: number): boolean {
    return this.type === "min" ? a < b : a > b;
  }

  /** Whether slot i must sit above slot j. Equal priorities never do. */
  private shouldPrecede(i: number, j: number): boolean {
    return this.comesFirst(this.slot(i).priority, this.slot(j).priority);
  }

  private bestChild(i: number): number | undefined {
    const l = i * 2 + 1;
    const r = l + 1;
    if (l >= this.data.length) return undefined;
    if (r < this.data.length && this.shouldPrecede(r, l)) return r;
    return l;
  }

  private swap(i: number, j: number): void {
    const a = this.slot(i);
    const b = this.slot(j);
    this.place(i, b);
    this.place(j, a);
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.shouldPrecede(i, p)) break;
      this.swap(i, p);
      i = p;
    }
  }

  private siftDown(i: number): void {
    while (true) {
      const c = this.bestChild(i);
      if (c === undefined || !this.shouldPrecede(c, i)) return;
      this.swap(i, c);
      i = c;
    }
  }
}

function assertPriority(priority: number, value: unknown): void {
  if (!Number.isFinite(priority)) {
    throw new QueueError("INVALID_PRIORITY", `priority for ${String(value)} must be a finite number`, value);
  }
}

function entryOf<V, O>(el: Element<V, O>): QueueEntry<V, O> {
  return { value: el.value, priority: el.priority, owner: el.owner };
}

function emptyQueue(): QueueError {
  return new QueueError("EMPTY_QUEUE", "queue is empty");
}

function notFound(value: unknown): QueueError {
  return new QueueError("NOT_FOUND", `value ${String(value)} is not queued`, value);
}
