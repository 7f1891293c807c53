/**
 * Repository and branch policy for verified identities
 */

import type { PolicyDecision, PolicyOptions } from "~/types";
import { createPolicyAllowed, createPolicyDenied } from "~/types";
import { BRANCH_REF_PREFIX } from "./constants";

/**
 * Branch name of a fully qualified branch ref; other refs are returned as is
 *
 * @example extractBranch("refs/heads/main") // "main"
 * @example extractBranch("refs/tags/v1.0.0") // "refs/tags/v1.0.0"
 */
export function extractBranch(ref: string): string {
  return ref.startsWith(BRANCH_REF_PREFIX)
    ? ref.slice(BRANCH_REF_PREFIX.length)
    : ref;
}

/**
 * Decides whether a verified repository and ref may receive a credential
 *
 * Checks run in a fixed order and the first failing check wins:
 * 1. deny list
 * 2. allow list (only when non-empty)
 * 3. default branch restriction (only when enabled)
 *
 * All comparisons are exact and case-sensitive.
 */
export class PolicyEngine {
  private readonly allowList: ReadonlySet<string>;
  private readonly denyList: ReadonlySet<string>;
  private readonly defaultBranchOnly: boolean;
  private readonly defaultBranchRef: string;

  constructor(options: PolicyOptions) {
    this.allowList = new Set(options.allowList);
    this.denyList = new Set(options.denyList);
    this.defaultBranchOnly = options.defaultBranchOnly;
    this.defaultBranchRef = `${BRANCH_REF_PREFIX}${options.defaultBranch}`;
  }

  evaluate(repository: string, ref: string): PolicyDecision {
    if (this.denyList.has(repository)) {
      return createPolicyDenied(
        "denied_by_list",
        `repository ${repository} is denied by policy`,
      );
    }

    if (this.allowList.size > 0 && !this.allowList.has(repository)) {
      return createPolicyDenied(
        "not_in_allowlist",
        `repository ${repository} is not in allowlist`,
      );
    }

    if (this.defaultBranchOnly && !this.isDefaultBranch(ref)) {
      return createPolicyDenied(
        "branch_not_permitted",
        `only default branch ${this.defaultBranchRef} is permitted, got ${ref}`,
      );
    }

    return createPolicyAllowed();
  }

  /** Whether `ref` is exactly `refs/heads/<defaultBranch>` */
  isDefaultBranch(ref: string): boolean {
    return ref === this.defaultBranchRef;
  }
}
