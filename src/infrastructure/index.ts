/**
 * Infrastructure module - configuration.
 */

export * from "./config/index.js";
