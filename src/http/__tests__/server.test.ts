import type http from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { startServer } from "../server.js";

let server: http.Server;
let base: string;

beforeAll(async () => {
  const started = await startServer({ port: 0, metricsEnabled: true });
  server = started.server;
  base = `http://127.0.0.1:${started.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

async function call(method: string, path: string, body?: unknown) {
  const res = await fetch(`${base}${path}`, {
    method,
    headers: body === undefined ? {} : { "content-type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const contentType = res.headers.get("content-type");
  const json: unknown = contentType?.includes("json") ? await res.json() : await res.text();
  return { status: res.status, contentType, body: json };
}

async function seed(name: string, type: "min" | "max", entries: Array<[string, number]>): Promise<void> {
  expect((await call("POST", "/queues", { name, type })).status).toBe(201);
  for (const [value, priority] of entries) {
    expect((await call("POST", `/queues/${name}/elements`, { value, priority, owner: "o" })).status).toBe(201);
  }
}

describe("http server", () => {
  it("reports health", async () => {
    const r = await call("GET", "/health");
    expect(r.status).toBe(200);
    expect(r.body).toMatchObject({ status: "ok", service: "heapq_service", version: "0.1.0" });
  });

  it("creates a queue once", async () => {
    expect(await call("POST", "/queues", { name: "once", type: "min" })).toMatchObject({ status: 201, body: { name: "once", type: "min", size: 0 } });

    const again = await call("POST", "/queues", { name: "once", type: "max" });
    expect(again.status).toBe(409);
    expect(again.contentType).toBe("application/problem+json");
    expect(again.body).toMatchObject({ code: "QUEUE_EXISTS", title: "Queue already exists" });
  });

  it("validates queue creation bodies", async () => {
    const r = await call("POST", "/queues", { name: "bad", type: "median" });
    expect(r.status).toBe(400);
    expect(r.body).toMatchObject({ code: "INVALID_ARGUMENT", errors: [{ path: "$.type", message: "must be one of: min, max" }] });

    const named = await call("POST", "/queues", { name: "bad\u0001name", type: "min" });
    expect(named.status).toBe(400);
    expect(named.body).toMatchObject({ errors: [{ path: "$.name", message: "must be 1-128 of: letters, digits, _ . : -" }] });
    expect((await call("GET", "/queues/bad%01name")).status).toBe(404);
  });

  it("requires a JSON content type", async () => {
    const res = await fetch(`${base}/queues`, { method: "POST", headers: { "content-type": "text/plain" }, body: "name=x" });
    expect(res.status).toBe(415);
  });

  it("serves peek, update and extraction in priority order", async () => {
    await seed("abc", "min", [["A", 5], ["B", 1], ["C", 3]]);

    expect((await call("GET", "/queues/abc/top")).body).toEqual({ value: "B", priority: 1, owner: "o" });
    expect((await call("PATCH", "/queues/abc/elements/A", { priority: 0 })).body).toEqual({ value: "A", priority: 0 });

    const r = await call("POST", "/queues/abc/extract", { count: 3 });
    expect(r.body).toEqual({
      entries: [
        { value: "A", priority: 0, owner: "o" },
        { value: "B", priority: 1, owner: "o" },
        { value: "C", priority: 3, owner: "o" },
      ],
      size: 0,
    });
  });

  it("extracts a single top entry without a body", async () => {
    await seed("single", "max", [["x", 1], ["y", 9]]);
    expect((await call("POST", "/queues/single/extract")).body).toEqual({ value: "y", priority: 9, owner: "o" });
  });

  it("maps queue errors to problem documents", async () => {
    await seed("errs", "min", [["a", 1]]);

    const dup = await call("POST", "/queues/errs/elements", { value: "a", priority: 2, owner: "o" });
    expect(dup.status).toBe(409);
    expect(dup.body).toMatchObject({ code: "DUPLICATE_KEY", type: "https://errors.heapq.local/duplicate-key" });

    expect((await call("DELETE", "/queues/errs/elements/zz")).body).toMatchObject({ status: 404, code: "NOT_FOUND" });
    expect((await call("POST", "/queues/errs/extract", { count: 5 })).body).toMatchObject({ status: 422, code: "INSUFFICIENT_ELEMENTS" });

    expect((await call("DELETE", "/queues/errs/elements/a")).body).toEqual({ value: "a", priority: 1, owner: "o", size: 0 });
    expect((await call("GET", "/queues/errs/top")).body).toMatchObject({ status: 409, code: "EMPTY_QUEUE" });
    expect((await call("GET", "/queues/nope")).body).toMatchObject({ status: 404, code: "QUEUE_NOT_FOUND" });
  });

  it("rejects mismatched batches", async () => {
    await seed("batch", "min", []);
    const r = await call("POST", "/queues/batch/batch", { values: ["a", "b"], priorities: [1], owners: ["o", "o"] });
    expect(r.status).toBe(400);
    expect(r.body).toMatchObject({ code: "LENGTH_MISMATCH" });

    const ok = await call("POST", "/queues/batch/batch", { values: ["a", "b"], priorities: [2, 1], owners: ["o", "p"] });
    expect(ok.body).toEqual({ inserted: 2, size: 2 });
  });

  it("merges one queue into another", async () => {
    await seed("src", "min", [["X", 2], ["Y", 4]]);
    await seed("dst", "min", [["Z", 1]]);

    expect((await call("POST", "/queues/dst/merge", { source: "src" })).body).toEqual({ size: 3, sourceSize: 0 });
    const r = await call("POST", "/queues/dst/extract", { count: 3 });
    expect(r.body).toMatchObject({ entries: [{ value: "Z" }, { value: "X" }, { value: "Y" }] });

    await seed("maxq", "max", []);
    expect((await call("POST", "/queues/dst/merge", { source: "maxq" })).body).toMatchObject({ status: 422, code: "INCOMPATIBLE_QUEUE_TYPE" });
  });

  it("filters and reports stats", async () => {
    expect((await call("POST", "/queues", { name: "stats", type: "max" })).status).toBe(201);
    await call("POST", "/queues/stats/batch", { values: ["a", "b", "c"], priorities: [2, 4, 6], owners: ["ann", "ben", "ann"] });

    const f = await call("POST", "/queues/stats/filter", { owner: "ann", maxPriority: 5 });
    expect(f.body).toEqual({ entries: [{ value: "a", priority: 2, owner: "ann" }] });

    expect((await call("GET", "/queues/stats")).body).toEqual({ name: "stats", type: "max", size: 3, minPriority: 2, maxPriority: 6, avgPriority: 4 });

    const metrics = await call("GET", "/metrics");
    expect(metrics.body).toContain('queue_size{queue="stats"} 3\n');

    expect((await call("DELETE", "/queues/stats/elements")).body).toEqual({ size: 0 });
    expect((await call("GET", "/queues/stats")).body).toMatchObject({ size: 0, avgPriority: 0 });
  });
});
