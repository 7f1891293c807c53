/**
 * JWKS (JSON Web Key Set) cache types
 */

import type { KeyLike } from "jose";

/** Immutable set of imported signing keys from one JWKS fetch */
export interface KeySnapshot {
  /** Public keys by key identifier (`kid`) */
  readonly keys: ReadonlyMap<string, KeyLike>;
  /** Fetch time in milliseconds since epoch (0 when never fetched) */
  readonly fetchedAt: number;
}

/** Anything that can resolve a signing key by identifier */
export interface KeySource {
  get(kid: string, signal?: AbortSignal): Promise<KeyLike>;
}

/** Cache statistics (for monitoring) */
export interface KeyCacheStats {
  size: number;
  fetchedAt: number;
  ttl: number;
}
