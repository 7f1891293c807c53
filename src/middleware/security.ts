import type { MiddlewareHandler } from "hono";

/**
 * Security headers middleware for production hardening
 */
export const securityHeaders: MiddlewareHandler = async (c, next) => {
  await next();

  c.header("X-Content-Type-Options", "nosniff");
  c.header("X-Frame-Options", "DENY");
  c.header("Referrer-Policy", "no-referrer");
  // Responses carry bearer tokens
  c.header("Cache-Control", "no-store");
  // Swagger UI loads its own assets; everything else is JSON or text
  if (c.req.path !== "/ui") {
    c.header(
      "Content-Security-Policy",
      "default-src 'none'; frame-ancestors 'none'",
    );
  }

  // Remove server identification
  c.res.headers.delete("Server");
  c.res.headers.delete("X-Powered-By");
};
