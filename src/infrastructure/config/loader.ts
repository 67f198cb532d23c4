/**
 * Configuration loading from the environment.
 */

import { ConfigSchema, type Config } from "./schema.js";

/** Environment variable prefix */
const ENV_PREFIX = "CALSCHED_";

type Env = Record<string, string | undefined>;

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

/**
 * Apply environment variable overrides to a raw config object.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: Env = process.env,
): Record<string, unknown> {
  const logging: Record<string, unknown> = {};

  const level = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (level) {
    logging.level = level.trim().toLowerCase();
  }

  const enabled = parseBoolean(env[`${ENV_PREFIX}LOG_ENABLED`]);
  if (enabled !== undefined) {
    logging.enabled = enabled;
  }

  // Keep test output quiet
  if (env.VITEST === "true" || env.NODE_ENV === "test") {
    logging.enabled = false;
  }

  const existing = raw.logging;
  return {
    ...raw,
    logging:
      typeof existing === "object" && existing !== null
        ? { ...existing, ...logging }
        : logging,
  };
}

/**
 * Load and validate configuration.
 *
 * Throws a ZodError if a value is out of range.
 */
export function loadConfig(
  env: Env = process.env,
  raw: Record<string, unknown> = {},
): Config {
  return ConfigSchema.parse(applyEnvOverrides(raw, env));
}
