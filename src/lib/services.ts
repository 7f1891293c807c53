import { GitHubActionsVerifier, JwksKeyCache } from "~/oidc";
import { CredentialMinter } from "~/utils/credentials";
import { TokenExchange } from "~/utils/exchange";
import { PolicyEngine } from "~/utils/policy";
import { RateLimiter } from "~/utils/rate-limiter";
import type { AppConfig } from "./config";

/**
 * Wire the exchange pipeline from configuration
 *
 * The key cache and rate limiter hold process-wide state, so build these
 * once per process.
 */
export function buildServices(config: AppConfig) {
  const keyCache = new JwksKeyCache({
    jwksUrl: config.oidc.jwksUrl,
    ttl: config.oidc.jwksTtl,
    fetchTimeout: config.oidc.jwksFetchTimeout,
  });
  const verifier = new GitHubActionsVerifier({
    issuer: config.oidc.issuer,
    audience: config.oidc.audience,
    clockSkewSeconds: config.oidc.clockSkewSeconds,
    keys: keyCache,
  });
  const limiter = new RateLimiter(config.rateLimit);
  const policy = new PolicyEngine(config.policy);
  const minter = new CredentialMinter({
    secret: config.signingSecret,
    ttlSeconds: config.tokenTtlSeconds,
  });

  return {
    keyCache,
    limiter,
    minter,
    exchange: new TokenExchange({ verifier, limiter, policy, minter }),
  };
}
