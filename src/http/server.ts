import http from "node:http";
import { randomUUID } from "node:crypto";

import { isQueueError, type EntryColumns, type EntryPredicate, type QueueEntry } from "../core/impl/index.js";
import { PROBLEM_CONTENT_TYPE, problem, statusForQueueError, type FieldError, type Problem } from "./problem.js";
import { QueueRegistry } from "./registry.js";
import { asArrayOf, asInt, asNumber, asString, isRecord, pushErr } from "./validation.js";

const SERVICE = "heapq_service";
const VERSION = "0.1.0";

interface BaseServerOptions {
  port?: number;
  metricsEnabled?: boolean;
}

/**
 * `logEvents` configures the registry the server builds for itself; a
 * supplied `registry` carries its own logging setting instead.
 */
export type ServerOptions = BaseServerOptions &
  ({ logEvents?: boolean; registry?: undefined } | { registry: QueueRegistry; logEvents?: undefined });

const QUEUE_NAME = /^[A-Za-z0-9_.:-]{1,128}$/;

class BadRequest extends Error {
  constructor(readonly detail: string, readonly errors?: FieldError[]) {
    super(detail);
  }
}

class UnsupportedMediaType extends Error {}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const registry = opts.registry ?? new QueueRegistry({ logEvents: opts.logEvents ?? false });
  const metricsEnabled = opts.metricsEnabled ?? false;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    try {
      if (method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          queues: registry.names().length,
        });
      }

      if (method === "GET" && url.pathname === "/metrics") {
        if (!metricsEnabled) {
          return sendProblem(res, problem({ status: 404, code: "ROUTE_NOT_FOUND", detail: "metrics not enabled", instance: url.pathname, requestId }));
        }
        res.statusCode = 200;
        res.setHeader("content-type", "text/plain; version=0.0.4");
        res.end(renderMetrics(registry));
        return;
      }

      if (method === "POST" && url.pathname === "/queues") {
        const body = await readBody(req);
        const errors: FieldError[] = [];
        const name = asString(body.name);
        if (!name) pushErr(errors, "$.name", "must be non-empty");
        if (name && !QUEUE_NAME.test(name)) pushErr(errors, "$.name", "must be 1-128 of: letters, digits, _ . : -");
        const type = asString(body.type);
        if (type !== "min" && type !== "max") pushErr(errors, "$.type", "must be one of: min, max");
        if (errors.length || !name || (type !== "min" && type !== "max")) throw new BadRequest("invalid request", errors);

        if (!registry.create(name, type)) {
          return sendProblem(res, problem({ status: 409, code: "QUEUE_EXISTS", detail: `queue ${name} already exists`, instance: url.pathname, requestId }));
        }
        return sendJson(res, 201, { name, type, size: 0 });
      }

      const route = matchQueueRoute(url.pathname);
      if (!route) {
        return sendProblem(res, problem({ status: 404, code: "ROUTE_NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
      }

      const queue = registry.get(route.name);
      if (!queue) {
        return sendProblem(res, problem({ status: 404, code: "QUEUE_NOT_FOUND", detail: `queue ${route.name} does not exist`, instance: url.pathname, requestId }));
      }

      if (route.action === "element") {
        if (method === "PATCH") {
          const body = await readBody(req);
          const priority = asNumber(body.priority);
          if (priority === undefined) {
            throw new BadRequest("invalid request", [{ path: "$.priority", message: "must be a finite number" }]);
          }
          queue.updatePriority(route.value, priority);
          return sendJson(res, 200, { value: route.value, priority });
        }
        if (method === "DELETE") {
          const removed = queue.remove(route.value);
          return sendJson(res, 200, { value: route.value, ...removed, size: queue.size() });
        }
        return sendProblem(res, problem({ status: 404, code: "ROUTE_NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
      }

      switch (`${method} ${route.action}`) {
        case "GET stats":
          return sendJson(res, 200, { name: route.name, type: queue.type, ...queue.getStats() });

        case "DELETE elements":
          queue.clear();
          return sendJson(res, 200, { size: 0 });

        case "POST elements": {
          const body = await readBody(req);
          const errors: FieldError[] = [];
          const value = asString(body.value);
          const priority = asNumber(body.priority);
          const owner = asString(body.owner);
          if (!value) pushErr(errors, "$.value", "must be non-empty");
          if (priority === undefined) pushErr(errors, "$.priority", "must be a finite number");
          if (owner === undefined) pushErr(errors, "$.owner", "must be a string");
          if (!value || priority === undefined || owner === undefined) throw new BadRequest("invalid request", errors);

          queue.insert(value, priority, owner);
          return sendJson(res, 201, { value, priority, owner, size: queue.size() });
        }

        case "POST batch": {
          const body = await readBody(req);
          const errors: FieldError[] = [];
          const values = asArrayOf(body.values, asString);
          const priorities = asArrayOf(body.priorities, asNumber);
          const owners = asArrayOf(body.owners, asString);
          if (!values) pushErr(errors, "$.values", "must be an array of strings");
          if (!priorities) pushErr(errors, "$.priorities", "must be an array of finite numbers");
          if (!owners) pushErr(errors, "$.owners", "must be an array of strings");
          if (!values || !priorities || !owners) throw new BadRequest("invalid request", errors);

          queue.batchInsert(values, priorities, owners);
          return sendJson(res, 200, { inserted: values.length, size: queue.size() });
        }

        case "GET top":
          return sendJson(res, 200, queue.peek());

        case "POST extract": {
          const body = await readBody(req, true);
          if (body.count === undefined) {
            return sendJson(res, 200, queue.extractTop());
          }
          const count = asInt(body.count);
          if (count === undefined || count < 0) {
            throw new BadRequest("invalid request", [{ path: "$.count", message: "must be a non-negative integer" }]);
          }
          return sendJson(res, 200, { entries: toEntries(queue.extractMultiple(count)), size: queue.size() });
        }

        case "POST merge": {
          const body = await readBody(req);
          const sourceName = asString(body.source);
          if (!sourceName) {
            throw new BadRequest("invalid request", [{ path: "$.source", message: "must be non-empty" }]);
          }
          const source = registry.get(sourceName);
          if (!source) {
            return sendProblem(res, problem({ status: 404, code: "QUEUE_NOT_FOUND", detail: `queue ${sourceName} does not exist`, instance: url.pathname, requestId }));
          }
          queue.merge(source);
          return sendJson(res, 200, { size: queue.size(), sourceSize: source.size() });
        }

        case "POST filter": {
          const body = await readBody(req, true);
          const predicate = parseFilter(body);
          return sendJson(res, 200, { entries: toEntries(queue.filter(predicate)) });
        }

        default:
          return sendProblem(res, problem({ status: 404, code: "ROUTE_NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
      }
    } catch (e) {
      if (e instanceof BadRequest) {
        return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: e.detail, instance: url.pathname, requestId, errors: e.errors }));
      }
      if (e instanceof UnsupportedMediaType) {
        return sendProblem(res, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
      }
      if (isQueueError(e)) {
        return sendProblem(res, problem({ status: statusForQueueError(e.code), code: e.code, detail: e.message, instance: url.pathname, requestId }));
      }
      return sendProblem(res, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

type QueueAction = "elements" | "batch" | "top" | "extract" | "merge" | "filter";

type QueueRoute =
  | { name: string; action: "stats" | QueueAction }
  | { name: string; action: "element"; value: string };

const QUEUE_ACTIONS: ReadonlySet<string> = new Set<QueueAction>(["elements", "batch", "top", "extract", "merge", "filter"]);

function isQueueAction(s: string): s is QueueAction {
  return QUEUE_ACTIONS.has(s);
}

function matchQueueRoute(pathname: string): QueueRoute | undefined {
  const parts = pathname.split("/").filter((p) => p.length > 0);
  if (parts[0] !== "queues" || parts.length < 2 || parts.length > 4) return undefined;

  const name = decodeSegment(parts[1]);
  if (name === undefined) return undefined;
  if (parts.length === 2) return { name, action: "stats" };

  const action = parts[2];
  if (parts.length === 3) {
    return isQueueAction(action) ? { name, action } : undefined;
  }
  if (action !== "elements") return undefined;
  const value = decodeSegment(parts[3]);
  return value === undefined ? undefined : { name, action: "element", value };
}

function decodeSegment(s: string): string | undefined {
  try {
    return decodeURIComponent(s);
  } catch {
    return undefined;
  }
}

function parseFilter(body: Record<string, unknown>): EntryPredicate {
  const errors: FieldError[] = [];
  const owner = body.owner === undefined ? undefined : asString(body.owner);
  const min = body.minPriority === undefined ? undefined : asNumber(body.minPriority);
  const max = body.maxPriority === undefined ? undefined : asNumber(body.maxPriority);
  if (body.owner !== undefined && owner === undefined) pushErr(errors, "$.owner", "must be a string");
  if (body.minPriority !== undefined && min === undefined) pushErr(errors, "$.minPriority", "must be a finite number");
  if (body.maxPriority !== undefined && max === undefined) pushErr(errors, "$.maxPriority", "must be a finite number");
  if (errors.length) throw new BadRequest("invalid request", errors);

  return (_value, priority, o) =>
    (owner === undefined || o === owner) &&
    (min === undefined || priority >= min) &&
    (max === undefined || priority <= max);
}

function toEntries(cols: EntryColumns): QueueEntry[] {
  return cols.values.map((value, i) => ({ value, priority: cols.priorities[i], owner: cols.owners[i] }));
}

function renderMetrics(registry: QueueRegistry): string {
  const lines = ["# HELP queue_size Live elements per queue.", "# TYPE queue_size gauge"];
  for (const name of registry.names()) {
    const q = registry.get(name);
    if (q) lines.push(`queue_size{queue="${escapeLabel(name)}"} ${q.size()}`);
  }
  return lines.join("\n") + "\n";
}

/** Prometheus label values escape only backslash, quote and newline. */
function escapeLabel(v: string): string {
  return v.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return ct.split(";")[0].trim().toLowerCase() === "application/json";
}

/**
 * Reads a JSON object body. With `optional`, an absent body reads as {}.
 */
async function readBody(req: http.IncomingMessage, optional = false): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");

  if (!raw.length && optional) return {};
  if (!isJson(req)) throw new UnsupportedMediaType();

  let body: unknown;
  try {
    body = raw.length ? JSON.parse(raw) : null;
  } catch {
    throw new BadRequest("malformed JSON body");
  }
  if (!isRecord(body)) throw new BadRequest("body must be an object");
  return body;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  const data = JSON.stringify(body);
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
