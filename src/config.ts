// config.ts
// Resolver configuration: defaults, environment overrides, validation.

import { z } from "zod";
import { ConfigError, type ValidationIssue } from "./errors";
import { LOG_LEVELS } from "./logger";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const ResolverConfigSchema = z.object({
  /** Minimum verified-query score accepted as authoritative. */
  acceptanceThreshold: z.number().min(0).max(1).default(0.75),
  /** Days of history used when a request says nothing about time scope; 0 disables it. */
  defaultLookbackDays: z.number().int().min(0).default(30),
  /** Fallback for a verified query's :limit binding. */
  defaultRowLimit: z.number().int().positive().default(1000),
  /** How many scored candidates the diagnostic trail keeps. */
  maxDiagnosticCandidates: z.number().int().min(0).default(5),
  logLevel: LogLevelSchema.default("info"),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;
export type ResolverConfigInput = z.input<typeof ResolverConfigSchema>;

const ENV_KEYS: Record<string, keyof ResolverConfig> = {
  RESOLVER_ACCEPTANCE_THRESHOLD: "acceptanceThreshold",
  RESOLVER_LOOKBACK_DAYS: "defaultLookbackDays",
  RESOLVER_ROW_LIMIT: "defaultRowLimit",
  RESOLVER_MAX_CANDIDATES: "maxDiagnosticCandidates",
  RESOLVER_LOG_LEVEL: "logLevel",
};

function readEnv(env: Record<string, string | undefined>): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw == null || raw.trim() === "") continue;
    if (configKey === "logLevel") {
      values[configKey] = raw.trim();
    } else {
      const num = Number(raw);
      // leave unparsable text in place so the schema reports it
      values[configKey] = Number.isNaN(num) ? raw : num;
    }
  }
  return values;
}

/**
 * Build a config from defaults, then environment, then explicit overrides.
 * Every invalid entry is reported in one ConfigError.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ResolverConfigInput = {}
): ResolverConfig {
  const result = ResolverConfigSchema.safeParse({ ...readEnv(env), ...overrides });
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.map(String),
      message: issue.message,
      ...(issue.path[0] === "logLevel" && { suggestion: `Use one of ${LOG_LEVELS.join(", ")}.` }),
    }));
    throw new ConfigError(issues);
  }
  return result.data;
}

export const defaultConfig: ResolverConfig = ResolverConfigSchema.parse({});
