/**
 * Shared fixtures for OIDC tests: throwaway RSA keys and GitHub-shaped claims
 */

import {
  exportJWK,
  generateKeyPair,
  type JWK,
  type KeyLike,
  SignJWT,
} from "jose";
import type { KeySource } from "~/types";
import { nowInSeconds } from "~/types";
import { KeyNotFoundError } from "~/utils/errors";

export const TEST_ISSUER = "https://token.actions.githubusercontent.com";
export const TEST_AUDIENCE = "ci-token-exchange";
export const TEST_JWKS_URL = `${TEST_ISSUER}/.well-known/jwks`;
export const TEST_WORKFLOW =
  "octo-org/octo-repo/.github/workflows/ci.yml@refs/heads/main";

export interface TestKey {
  kid: string;
  privateKey: KeyLike;
  publicKey: KeyLike;
  /** Public JWK as the provider would publish it */
  jwk: JWK;
}

export async function createTestKey(kid: string): Promise<TestKey> {
  const { privateKey, publicKey } = await generateKeyPair("RS256", {
    extractable: true,
  });
  const jwk: JWK = {
    ...(await exportJWK(publicKey)),
    kid,
    alg: "RS256",
    use: "sig",
  };
  return { kid, privateKey, publicKey, jwk };
}

/** GitHub Actions token claims valid for the next five minutes */
export function githubClaims(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  const now = nowInSeconds();
  return {
    iss: TEST_ISSUER,
    aud: TEST_AUDIENCE,
    iat: now,
    nbf: now,
    exp: now + 300,
    repository: "octo-org/octo-repo",
    ref: "refs/heads/main",
    actor: "octocat",
    run_id: "4815162342",
    workflow_ref: TEST_WORKFLOW,
    ...overrides,
  };
}

/** Drop the named claims from a claim set */
export function without(
  claims: Record<string, unknown>,
  ...names: string[]
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(claims).filter(([name]) => !names.includes(name)),
  );
}

export async function signAssertion(
  key: TestKey,
  claims: Record<string, unknown> = githubClaims(),
  header: { alg?: string; kid?: string | null } = {},
): Promise<string> {
  const kid = header.kid === undefined ? key.kid : header.kid;
  return new SignJWT(claims)
    .setProtectedHeader({
      alg: header.alg ?? "RS256",
      typ: "JWT",
      ...(kid !== null && { kid }),
    })
    .sign(key.privateKey);
}

/** In-memory key source recording every lookup */
export class StaticKeySource implements KeySource {
  readonly lookups: string[] = [];
  failure: Error | undefined;

  constructor(private readonly keys: Map<string, KeyLike>) {}

  static of(...keys: TestKey[]): StaticKeySource {
    return new StaticKeySource(
      new Map(keys.map((key) => [key.kid, key.publicKey])),
    );
  }

  async get(kid: string): Promise<KeyLike> {
    this.lookups.push(kid);
    if (this.failure) {
      throw this.failure;
    }
    const key = this.keys.get(kid);
    if (!key) {
      throw new KeyNotFoundError(kid);
    }
    return key;
  }
}
