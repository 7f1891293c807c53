/**
 * HTTP response status codes used by the exchange API
 *
 * Based on [RFC 9110](https://httpwg.org/specs/rfc9110.html#overview.of.status.codes)
 */
export const HTTP = {
  /** **200 OK** */
  OK: 200,
  /** **400 Bad Request** - malformed body or missing `oidc_token` */
  BadRequest: 400,
  /** **401 Unauthorized** - the presented assertion failed verification */
  Unauthorized: 401,
  /** **403 Forbidden** - verified, but refused by repository policy */
  Forbidden: 403,
  /** **404 Not Found** */
  NotFound: 404,
  /** **429 Too Many Requests** - per-repository token bucket exhausted */
  TooManyRequests: 429,
  /** **500 Internal Server Error** */
  InternalServerError: 500,
} as const;
