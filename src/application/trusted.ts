/**
 * Keys for builder operations reserved to trusted callers.
 *
 * Not re-exported from the package entry point. Only code inside this
 * package (the schedule record path) can reach these operations.
 */

/**
 * Sets a raw misfire instruction code with no validation.
 */
export const withRawMisfireInstruction: unique symbol = Symbol(
  "withRawMisfireInstruction",
);
