import { describe, expect, it, vi } from "vitest";
import { BinaryHeapQueue, createLoggingObserver, formatEvent } from "../index.js";

describe("createLoggingObserver", () => {
  it("writes one line per state change", () => {
    const lines: string[] = [];
    const q = new BinaryHeapQueue({ type: "min", observers: [createLoggingObserver("orders", (l) => lines.push(l))] });

    q.insert("a", 5, "alice");
    q.updatePriority("a", 2);
    q.extractTop();
    q.clear();

    expect(lines).toEqual([
      "[queue orders] inserted value=a priority=5 owner=alice timestamp=1",
      "[queue orders] priorityUpdated value=a owner=alice 5 -> 2",
      "[queue orders] extracted value=a priority=2 owner=alice",
      "[queue orders] cleared count=0",
    ]);
  });

  it("defaults to console.log", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    try {
      createLoggingObserver("jobs")({ kind: "removed", value: "j1", priority: 3, owner: "w" });
      expect(spy).toHaveBeenCalledWith("[queue jobs] removed value=j1 priority=3 owner=w");
    } finally {
      spy.mockRestore();
    }
  });

  it("formats non-string keys", () => {
    expect(formatEvent("n", { kind: "extracted", value: 42, priority: 1, owner: 7 })).toBe("[queue n] extracted value=42 priority=1 owner=7");
  });
});
