/**
 * Access token minting and validation
 *
 * Tokens are HS256 JWTs signed with a shared secret. Nothing is stored:
 * validation is purely signature based.
 */

import { compactVerify, decodeProtectedHeader, SignJWT } from "jose";
import type {
  CredentialClaims,
  CredentialMinterOptions,
  MintedCredential,
  NormalizedClaims,
} from "~/types";
import {
  createCredentialSubject,
  createTokenId,
  fromNumericDate,
  nowInSeconds,
} from "~/types";
import { isJsonObject } from "~/oidc/claims";
import { CREDENTIAL } from "./constants";
import { CredentialValidationError } from "./errors";

const HMAC_ALGORITHMS: readonly string[] = CREDENTIAL.ALLOWED_ALGORITHMS;

export class CredentialMinter {
  private readonly key: Uint8Array;
  readonly ttlSeconds: number;

  constructor(options: CredentialMinterOptions) {
    if (options.secret.length === 0) {
      throw new Error("Signing secret must not be empty");
    }
    if (!Number.isInteger(options.ttlSeconds) || options.ttlSeconds <= 0) {
      throw new RangeError("ttlSeconds must be a positive integer");
    }
    this.key = new TextEncoder().encode(options.secret);
    this.ttlSeconds = options.ttlSeconds;
  }

  /**
   * Sign a new access token for a verified identity
   *
   * Expiry is always issue time plus the configured TTL, never the inbound
   * assertion's expiry.
   */
  async mint(claims: NormalizedClaims): Promise<MintedCredential> {
    const issuedAt = nowInSeconds();
    const expiresAt = issuedAt + this.ttlSeconds;
    const tokenId = createTokenId();

    const token = await new SignJWT({
      repo: claims.repository,
      ref: claims.ref,
      actor: claims.actor,
      run_id: claims.runId,
      scopes: [...CREDENTIAL.SCOPES],
    })
      .setProtectedHeader({ alg: CREDENTIAL.ALGORITHM, typ: "JWT" })
      .setIssuer(CREDENTIAL.ISSUER)
      .setSubject(createCredentialSubject(claims.repository))
      .setAudience(CREDENTIAL.AUDIENCE)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .setJti(tokenId)
      .sign(this.key);

    return {
      token,
      tokenId,
      issuedAt: fromNumericDate(issuedAt),
      expiresAt: fromNumericDate(expiresAt),
    };
  }

  /**
   * Check a token minted by this service and decode its claims
   *
   * Algorithm family, signature and expiry are hard failures. Any other
   * claim with an unexpected type is defaulted so newer tokens still decode.
   *
   * @throws {CredentialValidationError}
   */
  async validate(token: string): Promise<CredentialClaims> {
    let alg: string | undefined;
    try {
      alg = decodeProtectedHeader(token).alg;
    } catch (error) {
      throw new CredentialValidationError("malformed access token", error);
    }
    if (alg === undefined || !HMAC_ALGORITHMS.includes(alg)) {
      throw new CredentialValidationError(
        `unexpected signing method: ${alg ?? "none"}`,
      );
    }

    let payload: Uint8Array;
    try {
      ({ payload } = await compactVerify(token, this.key, {
        algorithms: [alg],
      }));
    } catch (error) {
      throw new CredentialValidationError("invalid access token signature", error);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(new TextDecoder().decode(payload));
    } catch (error) {
      throw new CredentialValidationError("malformed access token", error);
    }
    if (!isJsonObject(decoded)) {
      throw new CredentialValidationError("malformed access token");
    }
    const claims = decoded;

    const exp = claims.exp;
    if (typeof exp !== "number" || !Number.isFinite(exp)) {
      throw new CredentialValidationError("access token has no expiry");
    }
    if (nowInSeconds() >= exp) {
      throw new CredentialValidationError("access token is expired");
    }

    return {
      issuer: stringClaim(claims.iss),
      subject: stringClaim(claims.sub),
      audience: audienceClaim(claims.aud),
      issuedAt: numberClaim(claims.iat),
      expiresAt: exp,
      tokenId: stringClaim(claims.jti),
      repository: stringClaim(claims.repo),
      ref: stringClaim(claims.ref),
      actor: stringClaim(claims.actor),
      runId: stringClaim(claims.run_id),
      scopes: Array.isArray(claims.scopes)
        ? claims.scopes.filter((scope): scope is string => typeof scope === "string")
        : [],
    };
  }
}

function stringClaim(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function numberClaim(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

// A single-element audience array is how some encoders write a lone audience
function audienceClaim(value: unknown): string {
  if (Array.isArray(value) && value.length === 1) {
    return stringClaim(value[0]);
  }
  return stringClaim(value);
}
