/**
 * OIDC (OpenID Connect) assertion types
 */

/** Provider-agnostic identity produced by a successful verification */
export interface NormalizedClaims {
  readonly repository: string;
  readonly ref: string;
  readonly actor: string;
  readonly runId: string;
  readonly workflow: string;
  /** `null` when the assertion carried no `iat` */
  readonly issuedAt: Date | null;
  readonly expiresAt: Date;
}

/** Options accepted by every assertion verifier */
export interface VerifyOptions {
  /** Aborts an in-flight key fetch when the inbound request goes away */
  signal?: AbortSignal;
}
