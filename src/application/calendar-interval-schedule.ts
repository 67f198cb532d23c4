/**
 * Builder for calendar-interval schedules.
 */

import {
  IntervalUnit,
  MisfireInstruction,
  type CalendarIntervalTrigger,
  type ScheduleSpec,
} from "../core/types/schedule.js";
import type { IScheduleBuilder } from "../core/interfaces/schedule-builder.js";
import { InvalidArgumentError } from "../core/errors.js";
import { withRawMisfireInstruction } from "./trusted.js";
import logger from "../utils/logger.js";

function validateInterval(interval: number): void {
  if (!Number.isSafeInteger(interval) || interval <= 0) {
    logger.debug({ interval }, "Rejected calendar interval");
    throw new InvalidArgumentError(
      "interval",
      "Interval must be a positive value.",
    );
  }
}

/**
 * Schedule builder for triggers that repeat on a calendar interval
 * (every 3 months, every 2 weeks, ...).
 *
 * Configuration calls mutate this builder and return it, so a chain reads
 * as one expression. `build()` does not reset state: the same builder can
 * emit any number of independent triggers.
 *
 * ```ts
 * const trigger = CalendarIntervalScheduleBuilder.create()
 *   .withIntervalInMonths(3)
 *   .withMisfireHandlingInstructionDoNothing()
 *   .build();
 * ```
 *
 * The interval is a multiplier on the unit, not a duration. Turning it into
 * fire times is the firing engine's job.
 */
export class CalendarIntervalScheduleBuilder
  implements IScheduleBuilder<CalendarIntervalTrigger>
{
  private interval = 1;
  private intervalUnit: IntervalUnit = IntervalUnit.Day;
  private misfireInstruction: number = MisfireInstruction.SmartPolicy;

  private constructor() {}

  /**
   * Create a builder with the defaults: every 1 day, smart misfire policy.
   */
  static create(): CalendarIntervalScheduleBuilder {
    return new CalendarIntervalScheduleBuilder();
  }

  /**
   * Build a new trigger from the current configuration.
   *
   * Normally invoked by the trigger assembly layer this builder is handed to.
   */
  build(): CalendarIntervalTrigger {
    return {
      repeatInterval: this.interval,
      repeatIntervalUnit: this.intervalUnit,
      misfireInstruction: this.misfireInstruction,
    };
  }

  /**
   * Snapshot of the accumulated configuration.
   */
  toSpec(): Readonly<ScheduleSpec> {
    return {
      interval: this.interval,
      intervalUnit: this.intervalUnit,
      misfireInstruction: this.misfireInstruction,
    };
  }

  /**
   * Set the interval and the unit it is counted in.
   *
   * @throws InvalidArgumentError if `interval` is not a positive integer.
   *   Nothing is changed in that case.
   */
  withInterval(
    interval: number,
    unit: IntervalUnit,
  ): CalendarIntervalScheduleBuilder {
    validateInterval(interval);
    this.interval = interval;
    this.intervalUnit = unit;
    return this;
  }

  /** Same as `withInterval(intervalInSeconds, IntervalUnit.Second)`. */
  withIntervalInSeconds(intervalInSeconds: number): CalendarIntervalScheduleBuilder {
    return this.withInterval(intervalInSeconds, IntervalUnit.Second);
  }

  /** Same as `withInterval(intervalInMinutes, IntervalUnit.Minute)`. */
  withIntervalInMinutes(intervalInMinutes: number): CalendarIntervalScheduleBuilder {
    return this.withInterval(intervalInMinutes, IntervalUnit.Minute);
  }

  /** Same as `withInterval(intervalInHours, IntervalUnit.Hour)`. */
  withIntervalInHours(intervalInHours: number): CalendarIntervalScheduleBuilder {
    return this.withInterval(intervalInHours, IntervalUnit.Hour);
  }

  /** Same as `withInterval(intervalInDays, IntervalUnit.Day)`. */
  withIntervalInDays(intervalInDays: number): CalendarIntervalScheduleBuilder {
    return this.withInterval(intervalInDays, IntervalUnit.Day);
  }

  /** Same as `withInterval(intervalInWeeks, IntervalUnit.Week)`. */
  withIntervalInWeeks(intervalInWeeks: number): CalendarIntervalScheduleBuilder {
    return this.withInterval(intervalInWeeks, IntervalUnit.Week);
  }

  /** Same as `withInterval(intervalInMonths, IntervalUnit.Month)`. */
  withIntervalInMonths(intervalInMonths: number): CalendarIntervalScheduleBuilder {
    return this.withInterval(intervalInMonths, IntervalUnit.Month);
  }

  /** Same as `withInterval(intervalInYears, IntervalUnit.Year)`. */
  withIntervalInYears(intervalInYears: number): CalendarIntervalScheduleBuilder {
    return this.withInterval(intervalInYears, IntervalUnit.Year);
  }

  /**
   * On misfire, use `MisfireInstruction.IgnoreMisfirePolicy`.
   */
  withMisfireHandlingInstructionIgnoreMisfires(): CalendarIntervalScheduleBuilder {
    this.misfireInstruction = MisfireInstruction.IgnoreMisfirePolicy;
    return this;
  }

  /**
   * On misfire, use `MisfireInstruction.CalendarInterval.DoNothing`.
   */
  withMisfireHandlingInstructionDoNothing(): CalendarIntervalScheduleBuilder {
    this.misfireInstruction = MisfireInstruction.CalendarInterval.DoNothing;
    return this;
  }

  /**
   * On misfire, use `MisfireInstruction.CalendarInterval.FireOnceNow`.
   */
  withMisfireHandlingInstructionFireAndProceed(): CalendarIntervalScheduleBuilder {
    this.misfireInstruction = MisfireInstruction.CalendarInterval.FireOnceNow;
    return this;
  }

  /**
   * Set a raw misfire code. Reserved for code restoring a persisted
   * schedule; the code is not checked here, the firing engine decides
   * whether it is legal.
   */
  [withRawMisfireInstruction](
    misfireInstruction: number,
  ): CalendarIntervalScheduleBuilder {
    this.misfireInstruction = misfireInstruction;
    return this;
  }
}
