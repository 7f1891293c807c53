/**
 * Per-claim decoders for verified assertion payloads
 *
 * Claims arrive as untyped JSON. Each decoder turns one field into a tagged
 * result instead of relying on implicit coercion.
 */

export interface ClaimFailure {
  ok: false;
  problem: "missing" | "invalid";
  detail: string;
}

export type ClaimResult<T> = { ok: true; value: T } | ClaimFailure;

function found<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

function missing(detail: string): ClaimFailure {
  return { ok: false, problem: "missing", detail };
}

function invalid(detail: string): ClaimFailure {
  return { ok: false, problem: "invalid", detail };
}

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Plain string claim that must be present and non-empty */
export function requiredString(
  claims: JsonObject,
  name: string,
): ClaimResult<string> {
  const value = claims[name];
  if (value === undefined || value === null) {
    return missing(`missing ${name} claim`);
  }
  if (typeof value !== "string") {
    return invalid(`${name} claim must be a string`);
  }
  if (value.length === 0) {
    return missing(`empty ${name} claim`);
  }
  return found(value);
}

/**
 * Audience as a list; a lone string counts as a one-element list.
 * Non-string array members are ignored.
 */
export function audienceList(claims: JsonObject): ClaimResult<string[]> {
  const aud = claims.aud;
  if (typeof aud === "string") {
    return found([aud]);
  }
  if (Array.isArray(aud)) {
    return found(aud.filter((item): item is string => typeof item === "string"));
  }
  return invalid(`unsupported aud claim type: ${aud === null ? "null" : typeof aud}`);
}

/**
 * Run identifier, accepted as a string or a JSON number
 *
 * Numbers are rendered as an unsigned decimal integer with any fraction
 * discarded. JSON numbers beyond 2^53 have already been rounded by the
 * parser, so those are refused rather than rendered as a different run.
 */
export function runIdentifier(claims: JsonObject): ClaimResult<string> {
  const value = claims.run_id;
  if (typeof value === "string") {
    return value.length > 0 ? found(value) : missing("empty run_id claim");
  }
  if (typeof value === "number") {
    const integral = Math.trunc(value);
    if (!Number.isFinite(value) || value < 0) {
      return invalid("run_id claim must be a non-negative integer");
    }
    if (!Number.isSafeInteger(integral)) {
      return invalid("run_id claim exceeds exact integer precision");
    }
    return found(integral.toString(10));
  }
  if (value === undefined || value === null) {
    return missing("missing run_id claim");
  }
  return invalid("run_id claim must be a string or number");
}

/** Workflow reference: `workflow_ref`, else `job_workflow_ref` */
export function workflowReference(claims: JsonObject): ClaimResult<string> {
  for (const name of ["workflow_ref", "job_workflow_ref"]) {
    const value = claims[name];
    if (typeof value === "string" && value.length > 0) {
      return found(value);
    }
  }
  return missing("missing workflow_ref or job_workflow_ref claim");
}

/** Optional JWT NumericDate; absent yields `undefined` */
export function numericDate(
  claims: JsonObject,
  name: string,
): ClaimResult<number | undefined> {
  const value = claims[name];
  if (value === undefined) {
    return found(undefined);
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return invalid(`${name} claim must be a number`);
  }
  return found(value);
}
