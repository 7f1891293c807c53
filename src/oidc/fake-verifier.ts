import type { NormalizedClaims, VerifyOptions } from "~/types";
import { TIME } from "~/types";
import {
  VerificationError,
  type VerificationFailureReason,
} from "~/utils/errors";
import type { AssertionVerifier } from "./verifier";

/** Decides the outcome of one `verify` call */
export type VerifyHandler = (
  rawAssertion: string,
  options: VerifyOptions,
) => NormalizedClaims | Promise<NormalizedClaims>;

/** Claims a fake verifier returns unless told otherwise */
export function createFakeClaims(
  overrides: Partial<NormalizedClaims> = {},
): NormalizedClaims {
  const now = Date.now();
  return {
    repository: "test-org/test-repo",
    ref: "refs/heads/main",
    actor: "test-user",
    runId: "123456789",
    workflow: "test-org/test-repo/.github/workflows/ci.yml@refs/heads/main",
    issuedAt: new Date(now),
    expiresAt: new Date(now + TIME.HOUR),
    ...overrides,
  };
}

/**
 * Deterministic {@link AssertionVerifier} for tests
 *
 * Without a handler every call succeeds with {@link createFakeClaims}.
 * Every raw assertion seen is recorded in `calls`.
 */
export class FakeVerifier implements AssertionVerifier {
  readonly calls: string[] = [];

  constructor(private handler?: VerifyHandler) {}

  /** Replace the behavior for subsequent calls */
  respondWith(handler: VerifyHandler): this {
    this.handler = handler;
    return this;
  }

  /** Make subsequent calls fail with the given reason */
  rejectWith(reason: VerificationFailureReason, detail = "fake rejection"): this {
    return this.respondWith(() => {
      throw new VerificationError(reason, detail);
    });
  }

  async verify(
    rawAssertion: string,
    options: VerifyOptions = {},
  ): Promise<NormalizedClaims> {
    this.calls.push(rawAssertion);
    if (this.handler) {
      return this.handler(rawAssertion, options);
    }
    return createFakeClaims();
  }
}
