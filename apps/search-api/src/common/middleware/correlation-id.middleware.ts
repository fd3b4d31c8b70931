import { Injectable, type NestMiddleware } from "@nestjs/common";
import type { IncomingHttpHeaders } from "node:http";
import { randomUUID } from "node:crypto";
import { CORRELATION_ID_HEADER, requestContext } from "../request-context";

// Caller-supplied ids end up in log lines, so only plain tokens are kept.
const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

interface IncomingRequest {
  headers: IncomingHttpHeaders;
}

interface OutgoingResponse {
  setHeader(name: string, value: string): unknown;
}

export function resolveCorrelationId(
  header: string | string[] | undefined,
): string {
  const candidate = Array.isArray(header) ? header[0] : header;
  return candidate !== undefined && CORRELATION_ID_PATTERN.test(candidate)
    ? candidate
    : randomUUID();
}

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: IncomingRequest, res: OutgoingResponse, next: () => void) {
    const correlationId = resolveCorrelationId(
      req.headers[CORRELATION_ID_HEADER],
    );

    req.headers[CORRELATION_ID_HEADER] = correlationId;
    res.setHeader("X-Correlation-ID", correlationId);

    requestContext.run({ correlationId, startedAt: Date.now() }, next);
  }
}
