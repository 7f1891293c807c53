/**
 * Error handling utilities
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { ErrorCode, ErrorResponse } from "~/schemas/errors";
import { HTTP } from "~/types";
import { logger } from "./logger";

interface ErrorOptions {
  code: ErrorCode;
  status?: ContentfulStatusCode;
}

/**
 * Standardized error response: `{ error: <code>, message }`
 *
 * Renders only. Whoever rejected the request logs the reason, with the
 * detail the caller must not see.
 */
export function errorResponse(
  c: Context,
  message: string | undefined,
  options: ErrorOptions,
) {
  const { code, status = HTTP.InternalServerError } = options;

  const body: ErrorResponse = message === undefined
    ? { error: code }
    : { error: code, message };
  return c.json(body, status);
}

/**
 * Handle unknown errors without leaking their detail to the caller
 */
export function handleUnknownError(
  c: Context,
  error: unknown,
  fallbackMessage: string,
): Response {
  const requestId: unknown = c.get("requestId");

  logger.error("Unhandled error", error, {
    code: "internal_error",
    ...(typeof requestId === "string" && { requestId }),
  });

  return c.json(
    { error: "internal_error" satisfies ErrorCode, message: fallbackMessage },
    HTTP.InternalServerError,
  );
}

/**
 * Create typed error class
 *
 * `message` is what the caller sees; put operator-only detail in `context`.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly status: ContentfulStatusCode = HTTP.InternalServerError,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/**
 * Type guard for AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/** Why an inbound assertion was rejected; logged, never returned */
export type VerificationFailureReason =
  | "malformed_token"
  | "unsupported_algorithm"
  | "missing_key_id"
  | "key_not_found"
  | "jwks_unavailable"
  | "invalid_signature"
  | "invalid_issuer"
  | "invalid_audience_type"
  | "audience_mismatch"
  | "token_expired"
  | "token_not_yet_valid"
  | "missing_claim"
  | "invalid_claim";

/**
 * Inbound assertion failed verification
 *
 * Every reason collapses to the same response so callers cannot learn
 * which check failed.
 */
export class VerificationError extends AppError {
  public readonly claim?: string;

  constructor(
    public readonly reason: VerificationFailureReason,
    public readonly detail: string,
    options: { claim?: string; cause?: unknown } = {},
  ) {
    super("failed to verify OIDC token", "invalid_token", HTTP.Unauthorized, {
      reason,
      detail,
      ...(options.claim !== undefined && { claim: options.claim }),
    });
    this.name = "VerificationError";
    this.claim = options.claim;
    this.cause = options.cause;
  }
}

export function isVerificationError(
  error: unknown,
): error is VerificationError {
  return error instanceof VerificationError;
}

export class RateLimitedError extends AppError {
  constructor(repository: string) {
    super(
      "rate limit exceeded for repository",
      "rate_limited",
      HTTP.TooManyRequests,
      { repository },
    );
    this.name = "RateLimitedError";
  }
}

export class PolicyViolationError extends AppError {
  constructor(message: string, context: Record<string, unknown>) {
    super(message, "policy_violation", HTTP.Forbidden, context);
    this.name = "PolicyViolationError";
  }
}

export class InternalError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "internal_error", HTTP.InternalServerError);
    this.name = "InternalError";
    this.cause = cause;
  }
}

// =============================================================================
// Key provider errors (surface to callers as VerificationError)
// =============================================================================

/** The JWKS could not be retrieved or parsed */
export class JwksFetchError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "JwksFetchError";
  }
}

/** A fresh JWKS does not contain the requested key identifier */
export class KeyNotFoundError extends Error {
  constructor(public readonly kid: string) {
    super(`key with kid ${kid} not found in JWKS`);
    this.name = "KeyNotFoundError";
  }
}

/** An access token presented back to this service failed validation */
export class CredentialValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "invalid_token", HTTP.Unauthorized);
    this.name = "CredentialValidationError";
    this.cause = cause;
  }
}
