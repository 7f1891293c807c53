/**
 * Application configuration constants
 * Defaults here are overridable through the environment (see ~/lib/config)
 *
 * For immutable protocol-level constants, see:
 * - ~/types/time (TIME)
 * - ~/types/headers (HEADERS)
 */

import { TIME } from "~/types/time";

// =============================================================================
// Cache TTL & timeouts
// =============================================================================

export const CACHE_TTL = {
  /** JWKS cache duration - the provider rotates keys rarely */
  JWKS: TIME.HOUR,
} as const;

export const TIMEOUTS = {
  /** Upper bound on a JWKS fetch so verification cannot hang on the provider */
  JWKS_FETCH: 5 * TIME.SECOND,
  /** Grace period for in-flight requests on shutdown */
  SHUTDOWN: 15 * TIME.SECOND,
} as const;

// =============================================================================
// Inbound assertions
// =============================================================================

export const OIDC = {
  /** GitHub Actions token issuer */
  DEFAULT_ISSUER: "https://token.actions.githubusercontent.com",
  DEFAULT_AUDIENCE: "ci-token-exchange",
  /** JWKS path relative to the issuer */
  JWKS_PATH: "/.well-known/jwks",
  /** Tolerance applied to `exp` and `nbf` */
  DEFAULT_CLOCK_SKEW_SECONDS: 60,
  /** RSA PKCS#1 v1.5 family; anything else is refused before key lookup */
  ALLOWED_ALGORITHMS: ["RS256", "RS384", "RS512"],
  /** Label reported back in the exchange response */
  PROVIDER: "github_actions",
} as const;

/** Prefix of a fully qualified branch ref */
export const BRANCH_REF_PREFIX = "refs/heads/";

// =============================================================================
// Outbound access tokens
// =============================================================================

export const CREDENTIAL = {
  ISSUER: "ci-token-exchange",
  AUDIENCE: "ci-ingest-api",
  SCOPES: ["ingest:build"],
  TOKEN_TYPE: "Bearer",
  ALGORITHM: "HS256",
  /** HMAC family accepted on validation */
  ALLOWED_ALGORITHMS: ["HS256", "HS384", "HS512"],
  DEFAULT_TTL_SECONDS: 600,
} as const;

// =============================================================================
// Rate limiting
// =============================================================================

export const RATE_LIMIT = {
  DEFAULT_RPS: 1,
  DEFAULT_BURST: 5,
} as const;
