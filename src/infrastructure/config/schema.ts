/**
 * Configuration schema using Zod.
 */

import { z } from "zod";

/**
 * Logging configuration.
 */
export const LoggingConfigSchema = z.object({
  level: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  enabled: z.boolean().default(true),
});

/**
 * Root configuration schema.
 */
export const ConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
