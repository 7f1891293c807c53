import { z } from "@hono/zod-openapi";

/**
 * RFC 3339 timestamp
 */
export const TimestampSchema = z.iso.datetime({
  offset: true,
  message: "Must be valid RFC 3339 timestamp",
});

/**
 * CI context the access token was issued for
 */
export const SubjectDetailsSchema = z
  .object({
    provider: z.literal("github_actions"),
    repository: z.string().min(1).openapi({ example: "octo-org/octo-repo" }),
    ref: z.string().min(1).openapi({ example: "refs/heads/main" }),
    workflow: z.string().min(1).openapi({
      example: "octo-org/octo-repo/.github/workflows/ci.yml@refs/heads/main",
    }),
    run_id: z.string().min(1).openapi({ example: "4815162342" }),
    actor: z.string().min(1).openapi({ example: "octocat" }),
  })
  .openapi("SubjectDetails");

/**
 * Successful token exchange response
 */
export const ExchangeResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.number().int().min(0).openapi({ example: 600 }),
    token_type: z.literal("Bearer"),
    issued_at: TimestampSchema,
    subject: SubjectDetailsSchema,
  })
  .openapi("ExchangeResponse");

/** Type inferred from SubjectDetailsSchema */
export type SubjectDetails = z.infer<typeof SubjectDetailsSchema>;

/** Type inferred from ExchangeResponseSchema */
export type ExchangeResponse = z.infer<typeof ExchangeResponseSchema>;
