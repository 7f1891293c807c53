import { OpenAPIHono } from "@hono/zod-openapi";
import type { AppEnv } from "~/types";
import { HTTP } from "~/types";
import { errorResponse } from "~/utils/errors";
import { logger } from "~/utils/logger";

/**
 * OpenAPI configuration
 */
export const openApiConfig = {
  // OpenAPI 3.1.x is not yet supported by `oapi-codegen`
  // See https://github.com/oapi-codegen/oapi-codegen/issues/373
  openapi: "3.0.0",
  info: {
    version: "1.0.0",
    title: "CI Token Exchange API",
    description:
      "Exchanges GitHub Actions OIDC tokens for short-lived internal access tokens",
  },
};

export function createOpenAPIApp() {
  return new OpenAPIHono<AppEnv>({
    defaultHook: (result, c) => {
      if (!result.success) {
        const message = result.error.issues[0]?.message ?? "invalid request";
        logger.withContext(c).warn("Request validation failed", {
          issues: result.error.issues.map((issue) => issue.message),
        });
        return errorResponse(c, message, {
          code: "invalid_request",
          status: HTTP.BadRequest,
        });
      }
      return;
    },
  });
}
