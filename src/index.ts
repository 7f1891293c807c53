import { swaggerUI } from "@hono/swagger-ui";
import { createRoute, z } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import { logger } from "hono/logger";
import { createOpenAPIApp, openApiConfig } from "~/lib/openapi";
import { requestId } from "~/middleware/request-id";
import { securityHeaders } from "~/middleware/security";
import { createExchangeRoutes } from "~/routes/exchange";
import { HTTP } from "~/types";
import { errorResponse, handleUnknownError, isAppError } from "~/utils/errors";
import type { TokenExchange } from "~/utils/exchange";
import { logger as customLogger } from "~/utils/logger";

export interface AppDependencies {
  exchange: TokenExchange;
}

const probeResponses = {
  200: {
    content: { "text/plain": { schema: z.string().openapi({ example: "ok" }) } },
    description: "Service is up",
  },
};

// Probes never touch the pipeline
const livenessRoute = createRoute({
  method: "get",
  path: "/healthz",
  summary: "Liveness probe",
  responses: probeResponses,
});

const readinessRoute = createRoute({
  method: "get",
  path: "/readyz",
  summary: "Readiness probe",
  responses: probeResponses,
});

export function createApp({ exchange }: AppDependencies) {
  const app = createOpenAPIApp();

  // Global middleware
  app.use("*", requestId);
  app.use("*", logger((message) => customLogger.info(message)));
  app.use("*", securityHeaders);

  app.openapi(livenessRoute, (c) => c.text("ok", HTTP.OK));
  app.openapi(readinessRoute, (c) => c.text("ok", HTTP.OK));

  app.route("/auth", createExchangeRoutes(exchange));

  // OpenAPI Docs
  app.doc("/doc", openApiConfig);

  // Swagger UI
  app.get("/ui", swaggerUI({ url: "/doc" }));

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: "not_found" }, HTTP.NotFound);
  });

  // Error handler
  app.onError((err, c) => {
    // Logged where it was raised
    if (isAppError(err)) {
      return errorResponse(c, err.message, {
        code: err.code,
        status: err.status,
      });
    }

    // Raised by the body validator on unparseable JSON
    if (err instanceof HTTPException && err.status === HTTP.BadRequest) {
      customLogger.withContext(c).warn("Malformed request body", {
        detail: err.message,
      });
      return errorResponse(c, "invalid JSON in request body", {
        code: "invalid_request",
        status: HTTP.BadRequest,
      });
    }

    return handleUnknownError(c, err, "internal error");
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
