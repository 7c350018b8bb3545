// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { randomUUID } from "node:crypto";
import { ConflictError, NotFoundError, StateError, ValidationError, type FieldErrors } from "@vinstock/core";
import { ZodError } from "zod";

type ErrorBody = {
  ok: false;
  error: {
    code: string;
    message: string;
    fields?: FieldErrors;
  };
};

type FormValue = string | FormObject | FormValue[];
type FormObject = { [key: string]: FormValue };

// audit_logs.correlation_id is VARCHAR(128)
export const MAX_CORRELATION_ID_LENGTH = 128;

const UNSAFE_FORM_SEGMENTS = new Set(["__proto__", "constructor", "prototype"]);

export function getRequestCorrelationId(request: Request): string {
  const headerValue =
    request.headers.get("x-correlation-id")?.trim() || request.headers.get("x-request-id")?.trim();

  if (!headerValue || headerValue.length > MAX_CORRELATION_ID_LENGTH) {
    return randomUUID();
  }

  return headerValue;
}

/**
 * Path segment counted from the end, so `/api/sales/abc` with offset 0
 * gives "abc" and `/api/customers/abc/sales` with offset 1 gives "abc".
 */
export function pathSegment(request: Request, offsetFromEnd = 0): string | undefined {
  const segments = new URL(request.url).pathname.split("/").filter(Boolean);
  return segments[segments.length - 1 - offsetFromEnd];
}

export function searchParamsObject(request: Request): Record<string, string> {
  return Object.fromEntries(new URL(request.url).searchParams.entries());
}

/**
 * Key path of a form field, or null for keys that would reach into an
 * object prototype.
 */
function splitFormKey(key: string): string[] | null {
  const match = /^([^[\]]+)((?:\[[^[\]]*\])*)$/.exec(key);
  const path = match
    ? [match[1], ...[...match[2].matchAll(/\[([^[\]]*)\]/g)].map((part) => part[1])]
    : [key];

  return path.some((segment) => UNSAFE_FORM_SEGMENTS.has(segment)) ? null : path;
}

function isFormObject(value: FormValue | undefined): value is FormObject {
  return typeof value === "object" && !Array.isArray(value);
}

function toArrays(value: FormValue): FormValue {
  if (typeof value === "string") {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(toArrays);
  }

  const keys = Object.keys(value);
  const indexed = keys.length > 0 && keys.every((key) => /^\d+$/.test(key));
  if (indexed) {
    return keys
      .sort((left, right) => Number(left) - Number(right))
      .map((key) => toArrays(value[key]));
  }

  return Object.fromEntries(keys.map((key) => [key, toArrays(value[key])]));
}

/**
 * Turns `items[0][product_id]=p1&items[0][quantity]=2` into
 * `{ items: [{ product_id: "p1", quantity: "2" }] }`.
 */
export function parseFormBody(params: URLSearchParams): FormObject {
  const root: FormObject = {};

  for (const [key, value] of params.entries()) {
    const path = splitFormKey(key);
    if (!path) {
      continue;
    }

    let cursor = root;

    path.forEach((segment, index) => {
      const isLast = index === path.length - 1;
      if (isLast) {
        cursor[segment] = value;
        return;
      }

      const next = Object.hasOwn(cursor, segment) ? cursor[segment] : undefined;
      if (!isFormObject(next)) {
        const created: FormObject = {};
        cursor[segment] = created;
        cursor = created;
        return;
      }
      cursor = next;
    });
  }

  const converted = toArrays(root);
  return isFormObject(converted) ? converted : root;
}

export async function readRequestBody(request: Request): Promise<unknown> {
  const contentType = request.headers.get("content-type") ?? "";

  if (contentType.includes("application/x-www-form-urlencoded")) {
    return parseFormBody(new URLSearchParams(await request.text()));
  }

  return request.json();
}

/**
 * One entry per issue path, e.g. `items.0.quantity`; issues on the body
 * itself are reported under `body`.
 */
export function zodFieldErrors(error: ZodError): FieldErrors {
  const fields: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "body";
    fields[key] = [...(fields[key] ?? []), issue.message];
  }

  return fields;
}

function errorResponse(status: number, body: ErrorBody): Response {
  return Response.json(body, { status });
}

/**
 * Maps domain and request errors to the JSON error envelope. Anything
 * unrecognized is logged under `label` and answered with a 500.
 */
export function handleRouteError(error: unknown, label: string, correlationId: string): Response {
  if (error instanceof ZodError) {
    return errorResponse(400, {
      ok: false,
      error: {
        code: "INVALID_REQUEST",
        message: "Invalid request",
        fields: zodFieldErrors(error)
      }
    });
  }

  if (error instanceof SyntaxError) {
    return errorResponse(400, {
      ok: false,
      error: { code: "INVALID_REQUEST", message: "Invalid request" }
    });
  }

  if (error instanceof ValidationError) {
    return errorResponse(422, {
      ok: false,
      error: { code: "VALIDATION_ERROR", message: error.message, fields: error.fieldErrors }
    });
  }

  if (error instanceof NotFoundError) {
    return errorResponse(404, {
      ok: false,
      error: { code: "NOT_FOUND", message: error.message }
    });
  }

  if (error instanceof StateError) {
    return errorResponse(409, {
      ok: false,
      error: { code: "INVALID_STATE", message: error.message }
    });
  }

  if (error instanceof ConflictError) {
    return errorResponse(409, {
      ok: false,
      error: { code: "CONFLICT", message: error.message }
    });
  }

  console.error(`${label} failed`, { correlation_id: correlationId, error });
  return errorResponse(500, {
    ok: false,
    error: { code: "INTERNAL_SERVER_ERROR", message: `${label} failed` }
  });
}
