/**
 * Central types module - re-exports all type definitions
 *
 * Types are organized into logical sub-modules:
 * - branded: Security-critical branded string types
 * - credentials: Outbound access token types
 * - env: Hono environment and context
 * - headers: HTTP header names
 * - http: HTTP status codes
 * - jwks: JSON Web Key Set cache types
 * - oidc: OpenID Connect assertion types
 * - policy: Repository policy decisions
 * - rate-limit: Rate limiting types
 * - time: Time conversion constants and helpers
 */

// Branded types
export * from "./branded";
// Access tokens
export type * from "./credentials";
// Environment & context
export type * from "./env";
// HTTP headers
export { HEADERS } from "./headers";
// HTTP status codes
export { HTTP } from "./http";
// JWKS types
export type * from "./jwks";
// OIDC types
export type * from "./oidc";
// Policy
export * from "./policy";
// Rate limiting
export type * from "./rate-limit";
// Time constants
export { fromNumericDate, nowInSeconds, TIME, toRfc3339 } from "./time";
