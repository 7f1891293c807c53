/**
 * Environment configuration
 *
 * Read once at startup and fixed for the life of the process. Empty
 * variables count as unset; anything present but invalid fails startup.
 */

import { z } from "zod";
import type { PolicyOptions, RateLimiterOptions } from "~/types";
import { TIME } from "~/types";
import {
  CACHE_TTL,
  CREDENTIAL,
  OIDC,
  RATE_LIMIT,
  TIMEOUTS,
} from "~/utils/constants";
import { LOG_LEVELS, type LogLevel } from "~/utils/logger";

const CsvSchema = z.string().transform((value) =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
);

const IntegerSchema = z.coerce.number().int();

const EnvSchema = z.object({
  PORT: IntegerSchema.min(1).max(65535).default(8080),
  SIGNING_SECRET: z.string({ error: "required" }),
  OIDC_ISSUER: z.url().default(OIDC.DEFAULT_ISSUER),
  OIDC_AUDIENCE: z.string().default(OIDC.DEFAULT_AUDIENCE),
  OIDC_JWKS_URL: z.url().optional(),
  CLOCK_SKEW_SECONDS: IntegerSchema.nonnegative().default(
    OIDC.DEFAULT_CLOCK_SKEW_SECONDS,
  ),
  JWKS_TTL_SECONDS: IntegerSchema.positive().default(
    CACHE_TTL.JWKS / TIME.SECOND,
  ),
  JWKS_FETCH_TIMEOUT_MS: IntegerSchema.positive().default(TIMEOUTS.JWKS_FETCH),
  DEFAULT_BRANCH_ONLY: z.stringbool().default(false),
  DEFAULT_BRANCH: z.string().default("main"),
  REPO_ALLOWLIST: CsvSchema.default([]),
  REPO_DENYLIST: CsvSchema.default([]),
  RATE_LIMIT_RPS: z.coerce.number().positive().default(RATE_LIMIT.DEFAULT_RPS),
  RATE_LIMIT_BURST: IntegerSchema.positive().default(RATE_LIMIT.DEFAULT_BURST),
  TOKEN_TTL_SECONDS: IntegerSchema.positive().default(
    CREDENTIAL.DEFAULT_TTL_SECONDS,
  ),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  NODE_ENV: z.enum(["development", "test", "production"]).default(
    "production",
  ),
});

export interface OidcConfig {
  issuer: string;
  audience: string;
  jwksUrl: string;
  clockSkewSeconds: number;
  /** Milliseconds */
  jwksTtl: number;
  /** Milliseconds */
  jwksFetchTimeout: number;
}

export interface AppConfig {
  port: number;
  signingSecret: string;
  oidc: OidcConfig;
  policy: PolicyOptions;
  rateLimit: RateLimiterOptions;
  tokenTtlSeconds: number;
  logLevel: LogLevel;
  nodeEnv: "development" | "test" | "production";
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Build the application configuration from environment variables
 *
 * @throws {ConfigError} if a variable is missing or malformed
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const present: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      present[name] = value;
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message
      ),
    );
  }
  const vars = result.data;

  return {
    port: vars.PORT,
    signingSecret: vars.SIGNING_SECRET,
    oidc: {
      issuer: vars.OIDC_ISSUER,
      audience: vars.OIDC_AUDIENCE,
      jwksUrl: vars.OIDC_JWKS_URL
        ?? `${vars.OIDC_ISSUER.replace(/\/+$/, "")}${OIDC.JWKS_PATH}`,
      clockSkewSeconds: vars.CLOCK_SKEW_SECONDS,
      jwksTtl: vars.JWKS_TTL_SECONDS * TIME.SECOND,
      jwksFetchTimeout: vars.JWKS_FETCH_TIMEOUT_MS,
    },
    policy: {
      defaultBranchOnly: vars.DEFAULT_BRANCH_ONLY,
      defaultBranch: vars.DEFAULT_BRANCH,
      allowList: vars.REPO_ALLOWLIST,
      denyList: vars.REPO_DENYLIST,
    },
    rateLimit: {
      ratePerSecond: vars.RATE_LIMIT_RPS,
      burst: vars.RATE_LIMIT_BURST,
    },
    tokenTtlSeconds: vars.TOKEN_TTL_SECONDS,
    logLevel: vars.LOG_LEVEL,
    nodeEnv: vars.NODE_ENV,
  };
}

/**
 * Configuration safe to log; the signing secret is omitted
 */
export function describeConfig(config: AppConfig) {
  const { signingSecret: _signingSecret, ...rest } = config;
  return rest;
}
