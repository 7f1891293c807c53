import {
  compactVerify,
  decodeProtectedHeader,
  errors,
  type KeyLike,
  type ProtectedHeaderParameters,
} from "jose";
import type { KeySource, NormalizedClaims, VerifyOptions } from "~/types";
import { fromNumericDate, nowInSeconds } from "~/types";
import { OIDC } from "~/utils/constants";
import {
  JwksFetchError,
  KeyNotFoundError,
  VerificationError,
} from "~/utils/errors";
import {
  audienceList,
  type ClaimFailure,
  isJsonObject,
  type JsonObject,
  numericDate,
  requiredString,
  runIdentifier,
  workflowReference,
} from "./claims";

/**
 * Turns a raw inbound assertion into verified, normalized claims
 *
 * Implementations reject with {@link VerificationError}.
 */
export interface AssertionVerifier {
  verify(rawAssertion: string, options?: VerifyOptions): Promise<NormalizedClaims>;
}

export interface GitHubActionsVerifierOptions {
  /** Expected `iss`, compared verbatim */
  issuer: string;
  /** Audience that must appear in `aud` */
  audience: string;
  /** Leeway applied to both `exp` and `nbf` */
  clockSkewSeconds?: number;
  /** Public key lookup by `kid` */
  keys: KeySource;
}

// Allowed JWT signing algorithms
const ALLOWED_ALGORITHMS: readonly string[] = OIDC.ALLOWED_ALGORITHMS;

/**
 * Verifies GitHub Actions OIDC tokens against the provider's JWKS
 */
export class GitHubActionsVerifier implements AssertionVerifier {
  private readonly issuer: string;
  private readonly audience: string;
  private readonly clockSkewSeconds: number;
  private readonly keys: KeySource;

  constructor(options: GitHubActionsVerifierOptions) {
    this.issuer = options.issuer;
    this.audience = options.audience;
    this.clockSkewSeconds = options.clockSkewSeconds
      ?? OIDC.DEFAULT_CLOCK_SKEW_SECONDS;
    this.keys = options.keys;
  }

  async verify(
    rawAssertion: string,
    options: VerifyOptions = {},
  ): Promise<NormalizedClaims> {
    const header = readHeader(rawAssertion);

    // Refuse anything outside the RSA family before touching the key set, so
    // an HMAC token "signed" with a public key never reaches verification
    const alg = header.alg;
    if (alg === undefined || !ALLOWED_ALGORITHMS.includes(alg)) {
      throw new VerificationError(
        "unsupported_algorithm",
        `unexpected signing method: ${alg ?? "none"}`,
      );
    }

    const kid = header.kid;
    if (typeof kid !== "string" || kid.length === 0) {
      throw new VerificationError(
        "missing_key_id",
        "missing or invalid kid in token header",
      );
    }

    const key = await this.resolveKey(kid, options.signal);
    const claims = await verifySignature(rawAssertion, key, alg);

    this.checkIssuer(claims);
    this.checkAudience(claims);
    const { issuedAt, expiresAt } = this.checkValidityWindow(claims);

    return {
      repository: required(requiredString(claims, "repository"), "repository"),
      ref: required(requiredString(claims, "ref"), "ref"),
      actor: required(requiredString(claims, "actor"), "actor"),
      runId: required(runIdentifier(claims), "run_id"),
      workflow: required(workflowReference(claims), "workflow_ref"),
      issuedAt,
      expiresAt,
    };
  }

  private async resolveKey(
    kid: string,
    signal: AbortSignal | undefined,
  ): Promise<KeyLike> {
    try {
      return await this.keys.get(kid, signal);
    } catch (error) {
      if (error instanceof KeyNotFoundError) {
        throw new VerificationError("key_not_found", error.message, {
          cause: error,
        });
      }
      if (error instanceof JwksFetchError) {
        throw new VerificationError("jwks_unavailable", error.message, {
          cause: error,
        });
      }
      throw error;
    }
  }

  private checkIssuer(claims: JsonObject): void {
    const iss = claims.iss;
    if (iss !== this.issuer) {
      throw new VerificationError(
        "invalid_issuer",
        `invalid issuer: expected ${this.issuer}, got ${String(iss)}`,
      );
    }
  }

  private checkAudience(claims: JsonObject): void {
    const audiences = audienceList(claims);
    if (!audiences.ok) {
      throw new VerificationError("invalid_audience_type", audiences.detail, {
        claim: "aud",
      });
    }
    if (!audiences.value.includes(this.audience)) {
      throw new VerificationError(
        "audience_mismatch",
        `audience does not match: expected ${this.audience}`,
      );
    }
  }

  private checkValidityWindow(claims: JsonObject) {
    const now = nowInSeconds();
    const leeway = this.clockSkewSeconds;

    const exp = required(numericDate(claims, "exp"), "exp");
    if (exp === undefined) {
      throw new VerificationError("missing_claim", "missing exp claim", {
        claim: "exp",
      });
    }
    if (now >= exp + leeway) {
      throw new VerificationError("token_expired", "token is expired");
    }

    const nbf = required(numericDate(claims, "nbf"), "nbf");
    if (nbf !== undefined && now < nbf - leeway) {
      throw new VerificationError(
        "token_not_yet_valid",
        "token is not valid yet",
      );
    }

    const iat = required(numericDate(claims, "iat"), "iat");

    return {
      issuedAt: iat === undefined ? null : fromNumericDate(iat),
      expiresAt: fromNumericDate(exp),
    };
  }
}

function readHeader(rawAssertion: string): ProtectedHeaderParameters {
  try {
    return decodeProtectedHeader(rawAssertion);
  } catch (error) {
    throw new VerificationError("malformed_token", "invalid token format", {
      cause: error,
    });
  }
}

async function verifySignature(
  rawAssertion: string,
  key: KeyLike,
  alg: string,
): Promise<JsonObject> {
  let payload: Uint8Array;
  try {
    ({ payload } = await compactVerify(rawAssertion, key, {
      algorithms: [alg],
    }));
  } catch (error) {
    if (error instanceof errors.JWSInvalid) {
      throw new VerificationError("malformed_token", error.message, {
        cause: error,
      });
    }
    throw new VerificationError(
      "invalid_signature",
      error instanceof Error ? error.message : "signature verification failed",
      { cause: error },
    );
  }

  let claims: unknown;
  try {
    claims = JSON.parse(new TextDecoder().decode(payload));
  } catch (error) {
    throw new VerificationError("malformed_token", "invalid token payload", {
      cause: error,
    });
  }
  if (!isJsonObject(claims)) {
    throw new VerificationError(
      "malformed_token",
      "token payload is not a JSON object",
    );
  }
  return claims;
}

function required<T>(
  result: { ok: true; value: T } | ClaimFailure,
  claim: string,
): T {
  if (!result.ok) {
    throw new VerificationError(
      result.problem === "missing" ? "missing_claim" : "invalid_claim",
      result.detail,
      { claim },
    );
  }
  return result.value;
}
