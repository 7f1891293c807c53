/**
 * Repository policy types
 */

/** Why a verified identity was refused */
export type PolicyDenialReason =
  | "denied_by_list"
  | "not_in_allowlist"
  | "branch_not_permitted";

/** Policy allowed result */
interface PolicyAllowed {
  allowed: true;
}

/** Policy denied result */
interface PolicyDenied {
  allowed: false;
  reason: PolicyDenialReason;
  /** Caller-facing explanation; policy outcomes are not sensitive */
  message: string;
}

/** Policy decision as discriminated union */
export type PolicyDecision = PolicyAllowed | PolicyDenied;

export interface PolicyOptions {
  /** Only permit runs on `refs/heads/<defaultBranch>` */
  defaultBranchOnly: boolean;
  defaultBranch: string;
  /** Empty means no allowlist restriction */
  allowList: readonly string[];
  denyList: readonly string[];
}

export function createPolicyAllowed(): PolicyAllowed {
  return { allowed: true };
}

export function createPolicyDenied(
  reason: PolicyDenialReason,
  message: string,
): PolicyDenied {
  return { allowed: false, reason, message };
}
