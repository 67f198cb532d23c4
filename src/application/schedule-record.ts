/**
 * Persisted form of calendar-interval schedules.
 *
 * This is the trusted path back into a builder: misfire codes read from a
 * record go through the raw setter, so codes this package does not know
 * about survive a save/load cycle untouched.
 */

import { z } from "zod";
import {
  INTERVAL_UNITS,
  MisfireInstruction,
  type CalendarIntervalTrigger,
} from "../core/types/schedule.js";
import { InvalidArgumentError, ScheduleRecordError } from "../core/errors.js";
import { CalendarIntervalScheduleBuilder } from "./calendar-interval-schedule.js";
import { withRawMisfireInstruction } from "./trusted.js";
import logger from "../utils/logger.js";

const MISFIRE_CODES_BY_NAME: ReadonlyMap<string, number> = new Map([
  ["smartpolicy", MisfireInstruction.SmartPolicy],
  ["ignoremisfirepolicy", MisfireInstruction.IgnoreMisfirePolicy],
  ["fireoncenow", MisfireInstruction.CalendarInterval.FireOnceNow],
  ["donothing", MisfireInstruction.CalendarInterval.DoNothing],
]);

const KNOWN_MISFIRE_CODES: ReadonlySet<number> = new Set(
  MISFIRE_CODES_BY_NAME.values(),
);

function lookupMisfireName(name: string): number | undefined {
  const key = name
    .trim()
    .replace(/^MisfireInstruction\./i, "")
    .replace(/^CalendarInterval(Trigger)?\./i, "")
    .toLowerCase();
  return MISFIRE_CODES_BY_NAME.get(key);
}

/**
 * Resolve a misfire instruction given as a code or a name such as
 * `"DoNothing"` or `"MisfireInstruction.CalendarInterval.FireOnceNow"`.
 *
 * Numeric codes are returned as-is, known or not.
 *
 * @throws InvalidArgumentError for an unknown name or a non-integer code.
 */
export function parseMisfireInstruction(value: number | string): number {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidArgumentError(
        "misfireInstruction",
        `Misfire instruction must be an integer code, got ${value}`,
      );
    }
    return value;
  }

  const code = lookupMisfireName(value);
  if (code === undefined) {
    throw new InvalidArgumentError(
      "misfireInstruction",
      `Unknown misfire instruction: ${value}`,
    );
  }
  return code;
}

const MisfireInstructionSchema = z.union([
  z.number().int(),
  z.string().transform((value, ctx) => {
    try {
      return parseMisfireInstruction(value);
    } catch (error) {
      if (!(error instanceof InvalidArgumentError)) throw error;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
      return z.NEVER;
    }
  }),
]);

/**
 * Stored calendar-interval schedule.
 */
export const ScheduleRecordSchema = z.object({
  interval: z
    .number()
    .int()
    .positive("Interval must be a positive value.")
    .safe("Interval must be a positive value."),
  intervalUnit: z
    .string()
    .transform((unit) => unit.trim().toLowerCase())
    .pipe(z.enum(INTERVAL_UNITS)),
  misfireInstruction: MisfireInstructionSchema.default(
    MisfireInstruction.SmartPolicy,
  ),
});

export type ScheduleRecordInput = z.input<typeof ScheduleRecordSchema>;
export type ScheduleRecord = z.output<typeof ScheduleRecordSchema>;

/**
 * Restore a builder from a stored record.
 *
 * @throws ScheduleRecordError if the record does not match the schema.
 */
export function scheduleBuilderFromRecord(
  input: unknown,
): CalendarIntervalScheduleBuilder {
  const result = ScheduleRecordSchema.safeParse(input);
  if (!result.success) {
    throw new ScheduleRecordError(
      "Invalid schedule record",
      result.error.issues.map((issue) => ({
        path: issue.path,
        message: issue.message,
      })),
    );
  }

  const record = result.data;
  if (!KNOWN_MISFIRE_CODES.has(record.misfireInstruction)) {
    logger.warn(
      { misfireInstruction: record.misfireInstruction },
      "Restoring schedule with unrecognized misfire instruction",
    );
  }

  return CalendarIntervalScheduleBuilder.create()
    .withInterval(record.interval, record.intervalUnit)
    [withRawMisfireInstruction](record.misfireInstruction);
}

/**
 * Get a builder that reproduces an already-built trigger.
 */
export function scheduleBuilderFromTrigger(
  trigger: CalendarIntervalTrigger,
): CalendarIntervalScheduleBuilder {
  return CalendarIntervalScheduleBuilder.create()
    .withInterval(trigger.repeatInterval, trigger.repeatIntervalUnit)
    [withRawMisfireInstruction](trigger.misfireInstruction);
}

/**
 * Convert a builder or a trigger to its stored form.
 */
export function toScheduleRecord(
  source: CalendarIntervalScheduleBuilder | CalendarIntervalTrigger,
): ScheduleRecord {
  if (source instanceof CalendarIntervalScheduleBuilder) {
    const spec = source.toSpec();
    return {
      interval: spec.interval,
      intervalUnit: spec.intervalUnit,
      misfireInstruction: spec.misfireInstruction,
    };
  }

  return {
    interval: source.repeatInterval,
    intervalUnit: source.repeatIntervalUnit,
    misfireInstruction: source.misfireInstruction,
  };
}
