import { createRoute } from "@hono/zod-openapi";
import { createOpenAPIApp } from "~/lib/openapi";
import {
  ErrorResponseSchema,
  ExchangeRequestSchema,
  ExchangeResponseSchema,
} from "~/schemas";
import type {
  ExchangeRequest,
  ExchangeResponse,
  SubjectDetails,
} from "~/schemas";
import { HTTP, TIME, toRfc3339 } from "~/types";
import { CREDENTIAL, OIDC } from "~/utils/constants";
import type { TokenExchange } from "~/utils/exchange";
import { logger } from "~/utils/logger";

const errorContent = (description: string) => ({
  content: { "application/json": { schema: ErrorResponseSchema } },
  description,
});

const exchangeRoute = createRoute({
  method: "post",
  path: "/github-oidc",
  summary: "Exchange a GitHub Actions OIDC token",
  description:
    "Verify a GitHub Actions OIDC token and issue a short-lived access token for the ingest API",
  request: {
    body: {
      content: { "application/json": { schema: ExchangeRequestSchema } },
      required: true,
    },
  },
  responses: {
    200: {
      content: { "application/json": { schema: ExchangeResponseSchema } },
      description: "Access token issued",
    },
    400: errorContent("Malformed request"),
    401: errorContent("OIDC token failed verification"),
    403: errorContent("Repository or ref refused by policy"),
    429: errorContent("Rate limit exceeded for repository"),
    500: errorContent("Internal Server Error"),
  },
});

/**
 * Token exchange routes, mounted under `/auth`
 *
 * Failures are thrown as `AppError` and rendered by the app error handler.
 */
export function createExchangeRoutes(exchange: TokenExchange) {
  const app = createOpenAPIApp();

  app.openapi(exchangeRoute, async (c) => {
    const { oidc_token }: ExchangeRequest = c.req.valid("json");

    const { claims, credential } = await exchange.exchange(oidc_token, {
      signal: c.req.raw.signal,
      log: logger.withContext(c),
    });

    const subject: SubjectDetails = {
      provider: OIDC.PROVIDER,
      repository: claims.repository,
      ref: claims.ref,
      workflow: claims.workflow,
      run_id: claims.runId,
      actor: claims.actor,
    };
    const response: ExchangeResponse = {
      access_token: credential.token,
      expires_in: Math.round(
        (credential.expiresAt.getTime() - credential.issuedAt.getTime())
          / TIME.SECOND,
      ),
      token_type: CREDENTIAL.TOKEN_TYPE,
      issued_at: toRfc3339(credential.issuedAt),
      subject,
    };

    return c.json(response, HTTP.OK);
  });

  return app;
}
