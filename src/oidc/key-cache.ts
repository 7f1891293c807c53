import { importJWK, type KeyLike } from "jose";
import { JwksDocumentSchema, RsaJwkSchema } from "~/schemas/jwks";
import type { KeyCacheStats, KeySnapshot, KeySource } from "~/types";
import { CACHE_TTL, TIMEOUTS } from "~/utils/constants";
import { JwksFetchError, KeyNotFoundError } from "~/utils/errors";
import { fetchJsonWithTimeout } from "~/utils/fetch";
import { logger } from "~/utils/logger";

export interface JwksKeyCacheOptions {
  /** JWKS endpoint of the identity provider */
  jwksUrl: string;
  /** How long a fetched key set is trusted, in milliseconds */
  ttl?: number;
  /** Upper bound on one JWKS fetch, in milliseconds */
  fetchTimeout?: number;
}

const EMPTY_SNAPSHOT: KeySnapshot = { keys: new Map(), fetchedAt: 0 };

/**
 * Time-based cache of the identity provider's public signing keys
 *
 * Design considerations:
 * - The whole key set is one immutable snapshot, swapped by reference on
 *   refresh, so readers never see keys from two different fetches
 * - Refreshes run one at a time; a caller that waited for another refresh
 *   re-checks the snapshot before fetching again
 * - A failed fetch keeps the previous snapshot
 */
export class JwksKeyCache implements KeySource {
  private snapshot: KeySnapshot = EMPTY_SNAPSHOT;
  /** Tail of the refresh queue; never rejects */
  private exclusiveTail: Promise<void> = Promise.resolve();
  private readonly jwksUrl: string;
  private readonly ttl: number;
  private readonly fetchTimeout: number;

  constructor(options: JwksKeyCacheOptions) {
    this.jwksUrl = options.jwksUrl;
    this.ttl = options.ttl ?? CACHE_TTL.JWKS;
    this.fetchTimeout = options.fetchTimeout ?? TIMEOUTS.JWKS_FETCH;
  }

  /**
   * Resolve a public key by key identifier, refreshing the set when it is
   * empty, stale or does not contain `kid`
   *
   * @throws {KeyNotFoundError} if a fresh key set still lacks `kid`
   * @throws {JwksFetchError} if the key set could not be fetched
   */
  async get(kid: string, signal?: AbortSignal): Promise<KeyLike> {
    const cached = this.lookup(kid);
    if (cached) {
      return cached;
    }

    return this.exclusive(signal, async () => {
      // Another caller may have refreshed while we were queued
      const refreshed = this.lookup(kid);
      if (refreshed) {
        return refreshed;
      }

      await this.refresh(signal);

      const key = this.snapshot.keys.get(kid);
      if (!key) {
        throw new KeyNotFoundError(kid);
      }
      return key;
    });
  }

  /**
   * Get cache statistics (for monitoring)
   */
  stats(): KeyCacheStats {
    return {
      size: this.snapshot.keys.size,
      fetchedAt: this.snapshot.fetchedAt,
      ttl: this.ttl,
    };
  }

  private lookup(kid: string): KeyLike | undefined {
    const { keys, fetchedAt } = this.snapshot;
    if (keys.size === 0 || Date.now() - fetchedAt >= this.ttl) {
      return undefined;
    }
    return keys.get(kid);
  }

  /**
   * Run `task` once every earlier task has settled
   *
   * A caller whose `signal` aborts while queued gives up its turn; the
   * queue still waits for the task ahead of it before starting the next.
   */
  private exclusive<T>(
    signal: AbortSignal | undefined,
    task: () => Promise<T>,
  ): Promise<T> {
    const previous = this.exclusiveTail;
    const result = waitForTurn(previous, signal).then(task);
    this.exclusiveTail = Promise.allSettled([previous, result]).then(
      () => undefined,
    );
    return result;
  }

  private async refresh(signal?: AbortSignal): Promise<void> {
    let body: unknown;
    try {
      body = await fetchJsonWithTimeout(
        this.jwksUrl,
        { signal, headers: { Accept: "application/json" } },
        this.fetchTimeout,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new JwksFetchError(`Failed to fetch JWKS: ${message}`, error);
    }

    const document = JwksDocumentSchema.safeParse(body);
    if (!document.success) {
      throw new JwksFetchError("Failed to parse JWKS: missing keys array");
    }

    const keys = new Map<string, KeyLike>();
    for (const entry of document.data.keys) {
      const jwk = RsaJwkSchema.safeParse(entry);
      if (!jwk.success) {
        continue;
      }

      try {
        const key = await importJWK(
          { kty: jwk.data.kty, n: jwk.data.n, e: jwk.data.e },
          "RS256",
        );
        if (key instanceof Uint8Array) {
          continue;
        }
        keys.set(jwk.data.kid, key);
      } catch (error) {
        logger.debug("Skipping unparseable JWK", {
          kid: jwk.data.kid,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.snapshot = { keys, fetchedAt: Date.now() };
    logger.info("JWKS refreshed", { url: this.jwksUrl, keys: keys.size });
  }
}

function waitForTurn(turn: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    return turn;
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      reject(
        new JwksFetchError(
          "JWKS refresh cancelled while waiting for another refresh",
          signal.reason,
        ),
      );
    };
    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener("abort", onAbort, { once: true });
    void turn.then(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    });
  });
}
