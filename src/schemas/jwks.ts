import { z } from "@hono/zod-openapi";

/**
 * JWKS document envelope; entries are validated one by one so a single
 * malformed key does not discard the rest
 */
export const JwksDocumentSchema = z.object({
  keys: z.array(z.unknown()),
});

/**
 * RSA public key in JWK format
 */
export const RsaJwkSchema = z.object({
  kty: z.literal("RSA"),
  kid: z.string().min(1),
  n: z.string().min(1),
  e: z.string().min(1),
  alg: z.string().optional(),
  use: z.string().optional(),
});
