/**
 * Token exchange pipeline: verify, rate limit, policy, mint
 */

import type { AssertionVerifier } from "~/oidc/verifier";
import type { MintedCredential, NormalizedClaims } from "~/types";
import type { CredentialMinter } from "./credentials";
import {
  InternalError,
  PolicyViolationError,
  isVerificationError,
  RateLimitedError,
} from "./errors";
import { type ContextLogger, logger } from "./logger";
import { extractBranch, type PolicyEngine } from "./policy";
import type { RateLimiter } from "./rate-limiter";

export interface TokenExchangeDependencies {
  verifier: AssertionVerifier;
  limiter: Pick<RateLimiter, "allow">;
  policy: Pick<PolicyEngine, "evaluate">;
  minter: Pick<CredentialMinter, "mint">;
}

export interface ExchangeOptions {
  /** Aborts an outstanding key fetch when the caller goes away */
  signal?: AbortSignal;
  /** Request-scoped logger */
  log?: ContextLogger;
}

export interface ExchangeResult {
  claims: NormalizedClaims;
  credential: MintedCredential;
}

/**
 * Exchanges a CI identity assertion for an internal access token
 *
 * Stages run strictly in order and a failed stage ends the exchange, so a
 * token that fails verification never consumes rate limit budget and a
 * rejected identity is never minted a token.
 */
export class TokenExchange {
  constructor(private readonly deps: TokenExchangeDependencies) {}

  /**
   * @throws {VerificationError} assertion rejected (401)
   * @throws {RateLimitedError} repository out of budget (429)
   * @throws {PolicyViolationError} identity refused by policy (403)
   * @throws {InternalError} anything unexpected, including mint failure (500)
   */
  async exchange(
    rawAssertion: string,
    options: ExchangeOptions = {},
  ): Promise<ExchangeResult> {
    const log = options.log ?? logger;

    const claims = await this.verify(rawAssertion, options.signal, log);
    log.info("OIDC token verified", {
      repository: claims.repository,
      ref: claims.ref,
      branch: extractBranch(claims.ref),
      actor: claims.actor,
      runId: claims.runId,
      workflow: claims.workflow,
    });

    if (!this.deps.limiter.allow(claims.repository)) {
      log.warn("Rate limit exceeded", { repository: claims.repository });
      throw new RateLimitedError(claims.repository);
    }

    const decision = this.deps.policy.evaluate(claims.repository, claims.ref);
    if (!decision.allowed) {
      const context = {
        repository: claims.repository,
        ref: claims.ref,
        reason: decision.reason,
      };
      log.warn("Policy violation", context);
      throw new PolicyViolationError(decision.message, context);
    }

    let credential: MintedCredential;
    try {
      credential = await this.deps.minter.mint(claims);
    } catch (error) {
      log.error("Failed to mint access token", error, {
        repository: claims.repository,
      });
      throw new InternalError("failed to create access token", error);
    }

    log.info("Access token issued", {
      repository: claims.repository,
      ref: claims.ref,
      tokenId: credential.tokenId,
      expiresAt: credential.expiresAt.toISOString(),
    });

    return { claims, credential };
  }

  private async verify(
    rawAssertion: string,
    signal: AbortSignal | undefined,
    log: ContextLogger,
  ): Promise<NormalizedClaims> {
    try {
      return await this.deps.verifier.verify(rawAssertion, { signal });
    } catch (error) {
      if (!isVerificationError(error)) {
        log.error("Unexpected failure verifying OIDC token", error);
        throw new InternalError("internal error", error);
      }

      const context = {
        reason: error.reason,
        detail: error.detail,
        ...(error.claim !== undefined && { claim: error.claim }),
      };
      // The caller sees the same response either way; operators need to
      // tell a provider outage apart from bad tokens
      if (error.reason === "jwks_unavailable") {
        log.error("OIDC key provider unavailable", error.cause, context);
      } else {
        log.warn("OIDC token verification failed", context);
      }
      throw error;
    }
  }
}
