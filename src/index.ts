/**
 * calendar-interval-schedule
 *
 * Fluent builder for calendar-interval trigger schedules.
 */

export {
  IntervalUnit,
  INTERVAL_UNITS,
  MisfireInstruction,
  type ScheduleSpec,
  type MutableTrigger,
  type CalendarIntervalTrigger,
} from "./core/types/schedule.js";
export type { IScheduleBuilder } from "./core/interfaces/index.js";
export { InvalidArgumentError, ScheduleRecordError } from "./core/errors.js";
export * from "./application/index.js";
export * from "./infrastructure/index.js";
export { createLogger, type Logger } from "./utils/logger.js";
