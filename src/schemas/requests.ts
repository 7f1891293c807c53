import { z } from "@hono/zod-openapi";

/**
 * Token exchange request body
 */
export const ExchangeRequestSchema = z
  .object({
    oidc_token: z
      .string({ error: "missing oidc_token field" })
      .min(1, "missing oidc_token field")
      .openapi({ example: "eyJhbGciOiJSUzI1NiIsImtpZCI6Ii4uLiJ9..." }),
  })
  .openapi("ExchangeRequest");

/** Type inferred from ExchangeRequestSchema */
export type ExchangeRequest = z.infer<typeof ExchangeRequestSchema>;
