/**
 * Config infrastructure exports.
 */

export {
  ConfigSchema,
  LoggingConfigSchema,
  type Config,
  type LoggingConfig,
} from "./schema.js";

export { loadConfig, applyEnvOverrides } from "./loader.js";
