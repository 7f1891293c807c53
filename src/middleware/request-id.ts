import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "~/types";
import { HEADERS } from "~/types";

/** Inbound IDs are echoed into logs and response headers */
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Get request ID from header or generate a new one
 *
 * A header value not matching `REQUEST_ID_PATTERN` is replaced by a
 * fresh UUID.
 */
export function getRequestId(headerValue?: string | null): string {
  if (headerValue && REQUEST_ID_PATTERN.test(headerValue)) {
    return headerValue;
  }
  return crypto.randomUUID();
}

/**
 * Request ID middleware - ensures every request has a unique ID
 */
export const requestId: MiddlewareHandler<AppEnv> = async (c, next) => {
  const requestId = getRequestId(c.req.header(HEADERS.REQUEST_ID));

  // Store in context
  c.set("requestId", requestId);

  await next();

  c.header(HEADERS.REQUEST_ID, requestId);
};
