/**
 * Error types.
 */

/**
 * Thrown when an argument is outside the accepted range.
 */
export class InvalidArgumentError extends Error {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}

/**
 * Thrown when a persisted schedule record fails validation.
 */
export class ScheduleRecordError extends Error {
  readonly issues: { path: (string | number)[]; message: string }[];

  constructor(
    message: string,
    issues: { path: (string | number)[]; message: string }[],
  ) {
    super(message);
    this.name = "ScheduleRecordError";
    this.issues = issues;
  }
}
