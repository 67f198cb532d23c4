/**
 * Application module - schedule building and restoring.
 */

export { CalendarIntervalScheduleBuilder } from "./calendar-interval-schedule.js";
export {
  ScheduleRecordSchema,
  parseMisfireInstruction,
  scheduleBuilderFromRecord,
  scheduleBuilderFromTrigger,
  toScheduleRecord,
  type ScheduleRecord,
  type ScheduleRecordInput,
} from "./schedule-record.js";
