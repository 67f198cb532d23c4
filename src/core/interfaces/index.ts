/**
 * Core interface exports.
 */

export * from "./schedule-builder.js";
