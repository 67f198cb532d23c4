/**
 * Schedule types for calendar-interval triggers.
 */

/**
 * Calendar granularity the repeat interval is counted in.
 */
export const IntervalUnit = {
  Second: "second",
  Minute: "minute",
  Hour: "hour",
  Day: "day",
  Week: "week",
  Month: "month",
  Year: "year",
} as const;

export type IntervalUnit = (typeof IntervalUnit)[keyof typeof IntervalUnit];

/** All interval units, smallest first. */
export const INTERVAL_UNITS = [
  IntervalUnit.Second,
  IntervalUnit.Minute,
  IntervalUnit.Hour,
  IntervalUnit.Day,
  IntervalUnit.Week,
  IntervalUnit.Month,
  IntervalUnit.Year,
] as const;

/**
 * Misfire instruction codes understood by the firing engine.
 *
 * `SmartPolicy` and `IgnoreMisfirePolicy` are shared by every trigger kind;
 * the `CalendarInterval` codes only apply to calendar-interval triggers.
 */
export const MisfireInstruction = {
  /** Let the engine pick its default handling. */
  SmartPolicy: 0,
  IgnoreMisfirePolicy: -1,
  CalendarInterval: {
    /** Fire once now, then resume the schedule. */
    FireOnceNow: 1,
    DoNothing: 2,
  },
} as const;

/**
 * Accumulated configuration of a calendar-interval schedule.
 */
export interface ScheduleSpec {
  /** Repeat interval, counted in `intervalUnit`. Always > 0. */
  interval: number;
  intervalUnit: IntervalUnit;
  misfireInstruction: number;
}

/**
 * Trigger fields a schedule builder is allowed to populate. The trigger
 * assembly layer adds identity, job binding and start/end bounds.
 */
export interface MutableTrigger {
  misfireInstruction: number;
}

/**
 * Descriptor produced by a calendar-interval schedule builder.
 */
export interface CalendarIntervalTrigger extends MutableTrigger {
  repeatInterval: number;
  repeatIntervalUnit: IntervalUnit;
}
