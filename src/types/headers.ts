/**
 * Standard HTTP header names
 * Based on RFC 9110 and common practices
 */
export const HEADERS = {
  /** Custom request tracking header */
  REQUEST_ID: "X-Request-ID",
} as const;
