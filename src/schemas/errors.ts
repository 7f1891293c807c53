import { z } from "@hono/zod-openapi";

/**
 * Machine-readable error codes returned in the `error` field
 */
export const ErrorCodeSchema = z.enum([
  "invalid_request",
  "invalid_token",
  "rate_limited",
  "policy_violation",
  "internal_error",
  "not_found",
]);

/**
 * Standard error response schema
 * Used across all endpoints for consistent error handling
 */
export const ErrorResponseSchema = z
  .object({
    error: ErrorCodeSchema,
    message: z.string().min(1).optional(),
  })
  .openapi("ErrorResponse", {
    example: { error: "invalid_token", message: "failed to verify OIDC token" },
  });

/** Type inferred from ErrorCodeSchema */
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

/** Type inferred from ErrorResponseSchema */
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
