import { beforeEach, describe, expect, it, vi } from "vitest";
import { createFakeClaims, FakeVerifier } from "~/oidc/fake-verifier";
import { CredentialMinter } from "~/utils/credentials";
import {
  InternalError,
  PolicyViolationError,
  RateLimitedError,
  VerificationError,
} from "~/utils/errors";
import { TokenExchange } from "~/utils/exchange";
import { PolicyEngine } from "~/utils/policy";
import { RateLimiter } from "~/utils/rate-limiter";

function createLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("TokenExchange", () => {
  let verifier: FakeVerifier;
  let limiter: RateLimiter;
  let policy: PolicyEngine;
  let minter: CredentialMinter;
  let exchange: TokenExchange;
  let log: ReturnType<typeof createLog>;

  beforeEach(() => {
    verifier = new FakeVerifier();
    limiter = new RateLimiter({ ratePerSecond: 1, burst: 1 });
    policy = new PolicyEngine({
      defaultBranchOnly: false,
      defaultBranch: "main",
      allowList: [],
      denyList: ["test-org/blocked"],
    });
    minter = new CredentialMinter({ secret: "test-secret", ttlSeconds: 600 });
    exchange = new TokenExchange({ verifier, limiter, policy, minter });
    log = createLog();
  });

  it("should mint a credential for a verified, permitted identity", async () => {
    const result = await exchange.exchange("raw-token", { log });

    expect(result.claims.repository).toBe("test-org/test-repo");
    await expect(minter.validate(result.credential.token)).resolves
      .toMatchObject({ repository: "test-org/test-repo", runId: "123456789" });
    expect(verifier.calls).toEqual(["raw-token"]);
    expect(log.info).toHaveBeenCalledWith(
      "Access token issued",
      expect.objectContaining({ tokenId: result.credential.tokenId }),
    );
  });

  it("should pass the abort signal to the verifier", async () => {
    const controller = new AbortController();
    const seen: Array<AbortSignal | undefined> = [];
    verifier.respondWith((_raw, options) => {
      seen.push(options.signal);
      return createFakeClaims();
    });

    await exchange.exchange("raw-token", { signal: controller.signal, log });

    expect(seen).toEqual([controller.signal]);
  });

  it("should stop after a verification failure", async () => {
    verifier.rejectWith("invalid_signature", "signature mismatch");
    const allow = vi.spyOn(limiter, "allow");
    const evaluate = vi.spyOn(policy, "evaluate");
    const mint = vi.spyOn(minter, "mint");

    await expect(exchange.exchange("raw-token", { log })).rejects
      .toBeInstanceOf(VerificationError);

    expect(allow).not.toHaveBeenCalled();
    expect(evaluate).not.toHaveBeenCalled();
    expect(mint).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledWith("OIDC token verification failed", {
      reason: "invalid_signature",
      detail: "signature mismatch",
    });
  });

  it("should log a key provider outage at error level", async () => {
    verifier.rejectWith("jwks_unavailable", "Failed to fetch JWKS: timeout");

    await expect(exchange.exchange("raw-token", { log })).rejects
      .toMatchObject({ reason: "jwks_unavailable", status: 401 });

    expect(log.error).toHaveBeenCalledWith(
      "OIDC key provider unavailable",
      undefined,
      { reason: "jwks_unavailable", detail: "Failed to fetch JWKS: timeout" },
    );
    expect(log.warn).not.toHaveBeenCalled();
  });

  it("should turn an unexpected verifier failure into an internal error", async () => {
    verifier.respondWith(() => {
      throw new TypeError("boom");
    });

    await expect(exchange.exchange("raw-token", { log })).rejects
      .toBeInstanceOf(InternalError);
    expect(log.error).toHaveBeenCalledWith(
      "Unexpected failure verifying OIDC token",
      expect.any(TypeError),
    );
  });

  it("should rate limit before consulting the policy", async () => {
    verifier.respondWith(() =>
      createFakeClaims({ repository: "test-org/blocked" })
    );
    limiter.allow("test-org/blocked");
    const evaluate = vi.spyOn(policy, "evaluate");

    const error = await exchange.exchange("raw-token", { log }).catch((
      e: unknown,
    ) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({
      message: "rate limit exceeded for repository",
      status: 429,
    });
    expect(evaluate).not.toHaveBeenCalled();
  });

  it("should never mint for a policy violation", async () => {
    verifier.respondWith(() =>
      createFakeClaims({ repository: "test-org/blocked" })
    );
    const mint = vi.spyOn(minter, "mint");

    const error = await exchange.exchange("raw-token", { log }).catch((
      e: unknown,
    ) => e);

    expect(error).toBeInstanceOf(PolicyViolationError);
    expect(error).toMatchObject({
      message: "repository test-org/blocked is denied by policy",
      code: "policy_violation",
      status: 403,
    });
    expect(mint).not.toHaveBeenCalled();
  });

  it("should report a mint failure as an internal error", async () => {
    const failure = new Error("signing failed");
    vi.spyOn(minter, "mint").mockRejectedValue(failure);

    const error = await exchange.exchange("raw-token", { log }).catch((
      e: unknown,
    ) => e);

    expect(error).toBeInstanceOf(InternalError);
    expect(error).toMatchObject({
      message: "failed to create access token",
      status: 500,
      cause: failure,
    });
    expect(log.error).toHaveBeenCalledWith(
      "Failed to mint access token",
      failure,
      { repository: "test-org/test-repo" },
    );
  });
});
