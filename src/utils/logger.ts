/**
 * Shared pino logger.
 */

import pino from "pino";
import { applyEnvOverrides } from "../infrastructure/config/loader.js";
import {
  ConfigSchema,
  type LoggingConfig,
} from "../infrastructure/config/schema.js";

export type { Logger } from "pino";

/**
 * Resolve logging config from the environment without throwing.
 *
 * An invalid level falls back to the default so that importing the package
 * never fails over a log setting. `rejectedLevel` carries the bad value.
 */
export function resolveLoggingConfig(
  env: Record<string, string | undefined> = process.env,
): { config: LoggingConfig; rejectedLevel?: string } {
  const result = ConfigSchema.safeParse(applyEnvOverrides({}, env));
  if (result.success) {
    return { config: result.data.logging };
  }

  const fallback = ConfigSchema.parse(
    applyEnvOverrides({}, { ...env, CALSCHED_LOG_LEVEL: undefined }),
  );
  return { config: fallback.logging, rejectedLevel: env.CALSCHED_LOG_LEVEL };
}

/**
 * Create a logger from logging config.
 */
export function createLogger(
  config: LoggingConfig = resolveLoggingConfig().config,
): pino.Logger {
  return pino({
    name: "calendar-interval-schedule",
    level: config.level,
    enabled: config.enabled,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

const resolved = resolveLoggingConfig();
const logger = createLogger(resolved.config);

if (resolved.rejectedLevel !== undefined) {
  logger.warn(
    { level: resolved.rejectedLevel },
    "Ignoring invalid CALSCHED_LOG_LEVEL, using default level",
  );
}

export default logger;
