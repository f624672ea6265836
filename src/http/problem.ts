import type { QueueErrorCode } from "../core/errors.js";

export interface FieldError {
  path: string;
  message: string;
}

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export type ServiceErrorCode =
  | QueueErrorCode
  | "INVALID_ARGUMENT"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "QUEUE_EXISTS"
  | "QUEUE_NOT_FOUND"
  | "ROUTE_NOT_FOUND"
  | "INTERNAL";

export function problem(params: { status: number; code: ServiceErrorCode; detail?: string; instance?: string; errors?: FieldError[]; requestId?: string }): Problem {
  const type = `https://errors.heapq.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  const title = codeToTitle(params.code);
  return {
    type,
    title,
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

/** HTTP status for a failed queue operation. */
export function statusForQueueError(code: QueueErrorCode): number {
  switch (code) {
    case "NOT_FOUND":
      return 404;
    case "DUPLICATE_KEY":
    case "EMPTY_QUEUE":
      return 409;
    case "INSUFFICIENT_ELEMENTS":
    case "INCOMPATIBLE_QUEUE_TYPE":
      return 422;
    case "LENGTH_MISMATCH":
    case "INVALID_PRIORITY":
    case "CORRUPT_SNAPSHOT":
      return 400;
  }
}

function codeToTitle(code: ServiceErrorCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "UNSUPPORTED_MEDIA_TYPE":
      return "Unsupported media type";
    case "QUEUE_EXISTS":
      return "Queue already exists";
    case "QUEUE_NOT_FOUND":
      return "Queue not found";
    case "ROUTE_NOT_FOUND":
    case "NOT_FOUND":
      return "Not found";
    case "DUPLICATE_KEY":
      return "Duplicate key";
    case "EMPTY_QUEUE":
      return "Queue is empty";
    case "INSUFFICIENT_ELEMENTS":
      return "Insufficient elements";
    case "LENGTH_MISMATCH":
      return "Length mismatch";
    case "INCOMPATIBLE_QUEUE_TYPE":
      return "Incompatible queue type";
    case "INVALID_PRIORITY":
      return "Invalid priority";
    default:
      return "Internal error";
  }
}
