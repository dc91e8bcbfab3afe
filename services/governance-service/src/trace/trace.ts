import type { FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";

type RequestHeaders = Record<string, string | string[] | undefined>;

const TRACE_HEADER = "x-trace-id";
const TRACEPARENT_HEADER = "traceparent";
// Trace ids are copied into audit records and SIEM metadata: short opaque tokens only.
const TRACE_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;
const TRACEPARENT_PATTERN = /^[0-9a-f]{2}-([0-9a-f]{32})-[0-9a-f]{16}-[0-9a-f]{2}$/;
const INVALID_TRACEPARENT_ID = "0".repeat(32);

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Picks the caller's `x-trace-id`, then the trace id of a W3C `traceparent`,
 * and otherwise mints a new one.
 */
export function resolveTraceId(headers?: RequestHeaders): string {
  const explicit = firstValue(headers?.[TRACE_HEADER])?.trim();
  if (explicit && TRACE_ID_PATTERN.test(explicit)) {
    return explicit;
  }
  const parent = firstValue(headers?.[TRACEPARENT_HEADER])?.trim().toLowerCase();
  const match = parent ? TRACEPARENT_PATTERN.exec(parent) : null;
  if (match && match[1] !== INVALID_TRACEPARENT_ID) {
    return match[1];
  }
  return uuidv4();
}

export function getTraceIdFromRequest(request: Pick<FastifyRequest, "headers">): string {
  return resolveTraceId(request.headers);
}

export function withTraceId(logger: Logger, traceId: string): Logger {
  return logger.child({ traceId });
}
