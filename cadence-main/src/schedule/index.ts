export { WeeklySchedule } from "./weekly-schedule.js";
export { resolveEntry, entryLabel } from "./entries.js";
export {
  parseWeekly,
  parseMonthly,
  clampDay,
  lastWeeklyOccurrenceOnOrBefore,
  lastMonthlyOccurrenceOnOrBefore,
  dailyRule,
  weeklyRule,
  monthlyRule,
  DailyRule,
  WeeklyRule,
  MonthlyRule,
} from "./recurrence.js";
export type { RecurrenceRule, WeeklySpec, MonthlySpec } from "./recurrence.js";
export {
  parseTime,
  formatTime,
  isValidTime,
  addMinutes,
  weekParity,
  isoWeekNumber,
  resolveTimeZone,
  toMoment,
} from "./time.js";
export type * from "./types.js";
