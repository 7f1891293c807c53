/**
 * Outbound access token types
 */

import type { TokenId } from "./branded";

/** A freshly signed access token */
export interface MintedCredential {
  /** Compact HS256 JWT */
  token: string;
  tokenId: TokenId;
  issuedAt: Date;
  /** Always `issuedAt` + configured TTL */
  expiresAt: Date;
}

/** Claims decoded from a validated access token
 *
 * Fields that fail a type check are defaulted (`""`, `0`, `[]`).
 */
export interface CredentialClaims {
  issuer: string;
  subject: string;
  audience: string;
  /** Seconds since epoch */
  issuedAt: number;
  /** Seconds since epoch */
  expiresAt: number;
  tokenId: string;
  repository: string;
  ref: string;
  actor: string;
  runId: string;
  scopes: string[];
}

export interface CredentialMinterOptions {
  /** HMAC signing secret */
  secret: string;
  /** Token lifetime in seconds */
  ttlSeconds: number;
}
