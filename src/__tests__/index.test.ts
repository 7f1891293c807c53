import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createApp } from "~/index";
import { GitHubActionsVerifier } from "~/oidc/verifier";
import { ExchangeResponseSchema } from "~/schemas/exchange";
import { CredentialMinter } from "~/utils/credentials";
import { TokenExchange } from "~/utils/exchange";
import { PolicyEngine } from "~/utils/policy";
import { logger } from "~/utils/logger";
import { RateLimiter } from "~/utils/rate-limiter";
import {
  createTestKey,
  githubClaims,
  signAssertion,
  StaticKeySource,
  TEST_AUDIENCE,
  TEST_ISSUER,
  TEST_WORKFLOW,
  type TestKey,
} from "./helpers";

describe("CI token exchange app", () => {
  let signingKey: TestKey;
  let rogueKey: TestKey;
  let limiter: RateLimiter;
  let policy: PolicyEngine;
  let minter: CredentialMinter;
  let keySource: StaticKeySource;
  let verifier: GitHubActionsVerifier;
  let app: ReturnType<typeof createApp>;

  beforeAll(async () => {
    signingKey = await createTestKey("key-1");
    rogueKey = await createTestKey("rogue");
  });

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    limiter = new RateLimiter({ ratePerSecond: 1, burst: 5 });
    policy = new PolicyEngine({
      defaultBranchOnly: false,
      defaultBranch: "main",
      allowList: [],
      denyList: ["octo-org/blocked"],
    });
    minter = new CredentialMinter({ secret: "test-secret", ttlSeconds: 600 });
    keySource = StaticKeySource.of(signingKey);
    verifier = new GitHubActionsVerifier({
      issuer: TEST_ISSUER,
      audience: TEST_AUDIENCE,
      clockSkewSeconds: 60,
      keys: keySource,
    });
    app = createApp({
      exchange: new TokenExchange({ verifier, limiter, policy, minter }),
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function postExchange(body: string, headers: Record<string, string> = {}) {
    return app.request("/auth/github-oidc", {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body,
    });
  }

  async function exchangeToken(token: string) {
    return postExchange(JSON.stringify({ oidc_token: token }));
  }

  describe("probes", () => {
    it.each(["/healthz", "/readyz"])("should answer %s with ok", async (path) => {
      const response = await app.request(path);

      expect(response.status).toBe(200);
      expect(await response.text()).toBe("ok");
    });
  });

  describe("POST /auth/github-oidc", () => {
    it("should exchange a valid token for an access token", async () => {
      const response = await exchangeToken(await signAssertion(signingKey));

      expect(response.status).toBe(200);
      const body: unknown = await response.json();
      expect(body).toEqual({
        access_token: expect.any(String),
        expires_in: 600,
        token_type: "Bearer",
        issued_at: expect.stringMatching(
          /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/,
        ),
        subject: {
          provider: "github_actions",
          repository: "octo-org/octo-repo",
          ref: "refs/heads/main",
          workflow: TEST_WORKFLOW,
          run_id: "4815162342",
          actor: "octocat",
        },
      });
      const { access_token } = ExchangeResponseSchema.parse(body);
      await expect(minter.validate(access_token)).resolves.toMatchObject({
        subject: "repo:octo-org/octo-repo",
        runId: "4815162342",
        scopes: ["ingest:build"],
      });
    });

    it("should reject malformed JSON", async () => {
      const response = await postExchange("{not json");

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: "invalid_request",
        message: "invalid JSON in request body",
      });
    });

    it.each([
      ["a missing", "{}"],
      ["an empty", JSON.stringify({ oidc_token: "" })],
    ])("should reject %s oidc_token without running the pipeline", async (_label, body) => {
      const verify = vi.spyOn(verifier, "verify");
      const allow = vi.spyOn(limiter, "allow");
      const evaluate = vi.spyOn(policy, "evaluate");
      const mint = vi.spyOn(minter, "mint");

      const response = await postExchange(body);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: "invalid_request",
        message: "missing oidc_token field",
      });
      expect(verify).not.toHaveBeenCalled();
      expect(keySource.lookups).toEqual([]);
      expect(allow).not.toHaveBeenCalled();
      expect(evaluate).not.toHaveBeenCalled();
      expect(mint).not.toHaveBeenCalled();
    });

    it("should reject a wrongly signed token before rate limiting or policy", async () => {
      const allow = vi.spyOn(limiter, "allow");
      const evaluate = vi.spyOn(policy, "evaluate");
      const token = await signAssertion(rogueKey, githubClaims(), {
        kid: "key-1",
      });

      const response = await exchangeToken(token);

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({
        error: "invalid_token",
        message: "failed to verify OIDC token",
      });
      expect(allow).not.toHaveBeenCalled();
      expect(evaluate).not.toHaveBeenCalled();
    });

    it("should give an expired token the same response as a forged one", async () => {
      const token = await signAssertion(
        signingKey,
        githubClaims({ exp: Math.floor(Date.now() / 1000) - 3600 }),
      );

      const response = await exchangeToken(token);

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({
        error: "invalid_token",
        message: "failed to verify OIDC token",
      });
    });

    it("should refuse a denylisted repository without minting", async () => {
      const mint = vi.spyOn(minter, "mint");
      const token = await signAssertion(
        signingKey,
        githubClaims({ repository: "octo-org/blocked" }),
      );

      const response = await exchangeToken(token);

      expect(response.status).toBe(403);
      expect(await response.json()).toEqual({
        error: "policy_violation",
        message: "repository octo-org/blocked is denied by policy",
      });
      expect(mint).not.toHaveBeenCalled();
    });

    it("should log a policy rejection once", async () => {
      const warn = vi.spyOn(logger, "warn");
      const error = vi.spyOn(logger, "error");
      const token = await signAssertion(
        signingKey,
        githubClaims({ repository: "octo-org/blocked" }),
      );

      await exchangeToken(token);

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        "Policy violation",
        expect.objectContaining({
          repository: "octo-org/blocked",
          reason: "denied_by_list",
        }),
      );
      expect(error).not.toHaveBeenCalled();
    });

    it("should rate limit the second request with a burst of one", async () => {
      app = createApp({
        exchange: new TokenExchange({
          verifier: new GitHubActionsVerifier({
            issuer: TEST_ISSUER,
            audience: TEST_AUDIENCE,
            keys: StaticKeySource.of(signingKey),
          }),
          limiter: new RateLimiter({ ratePerSecond: 1, burst: 1 }),
          policy,
          minter,
        }),
      });
      const token = await signAssertion(signingKey);

      const first = await exchangeToken(token);
      const second = await exchangeToken(token);

      expect(first.status).toBe(200);
      expect(second.status).toBe(429);
      expect(await second.json()).toEqual({
        error: "rate_limited",
        message: "rate limit exceeded for repository",
      });
    });

    it("should hide mint failures behind internal_error", async () => {
      vi.spyOn(minter, "mint").mockRejectedValue(new Error("key unavailable"));

      const response = await exchangeToken(await signAssertion(signingKey));

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({
        error: "internal_error",
        message: "failed to create access token",
      });
    });
  });

  describe("middleware", () => {
    it("should echo the request ID and set security headers", async () => {
      const response = await app.request("/healthz", {
        headers: { "X-Request-ID": "req-e2e" },
      });

      expect(response.headers.get("X-Request-ID")).toBe("req-e2e");
      expect(response.headers.get("X-Content-Type-Options")).toBe("nosniff");
      expect(response.headers.get("X-Frame-Options")).toBe("DENY");
      expect(response.headers.get("Cache-Control")).toBe("no-store");
    });
  });

  describe("fallbacks", () => {
    it("should answer unknown routes with not_found", async () => {
      const response = await app.request("/nope");

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: "not_found" });
    });

    it("should not accept GET on the exchange route", async () => {
      const response = await app.request("/auth/github-oidc");

      expect(response.status).toBe(404);
    });
  });

  describe("documentation", () => {
    it("should publish the OpenAPI document", async () => {
      const response = await app.request("/doc");

      expect(response.status).toBe(200);
      const doc = z
        .object({
          info: z.object({ title: z.string() }),
          paths: z.record(z.string(), z.unknown()),
        })
        .parse(await response.json());
      expect(doc.info.title).toBe("CI Token Exchange API");
      expect(Object.keys(doc.paths)).toEqual(
        expect.arrayContaining(["/healthz", "/readyz", "/auth/github-oidc"]),
      );
    });
  });
});
