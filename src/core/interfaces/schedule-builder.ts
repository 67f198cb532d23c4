/**
 * Schedule builder interface.
 */

import type { MutableTrigger } from "../types/schedule.js";

/**
 * Interface for schedule builders.
 *
 * A schedule builder accumulates the schedule-specific part of a trigger.
 * The trigger assembly layer calls `build()` and fills in the rest.
 */
export interface IScheduleBuilder<T extends MutableTrigger> {
  /**
   * Build a new trigger from the current configuration.
   */
  build(): T;
}
