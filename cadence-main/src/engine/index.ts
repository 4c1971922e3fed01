export { ScheduleEngine, START_TITLE, END_TITLE, REMINDER_TITLE, startMessage, endMessage } from "./engine.js";
export type { EngineConfiguration, FiredEvent, ScheduleEngineOptions, TickOutcome } from "./engine.js";
export { EngineState } from "./state.js";
export {
  buildPeriodicTasks,
  describeDaysLeft,
  formatDailySummary,
  formatReviewMessage,
  formatUrgentDeadlines,
  formatUrgentTasks,
} from "./periodic-tasks.js";
export type {
  PeriodicTask,
  PeriodicTaskContext,
  PeriodicTaskServices,
  PeriodicTaskSet,
  RejectedSpec,
} from "./periodic-tasks.js";
export { ScheduleRunner } from "./runner.js";
export type { ScheduleRunnerOptions } from "./runner.js";
export { describeDay, formatStatus } from "./status.js";
export type { DayPosition, DayStatus, StatusEntry, UpcomingEntry } from "./status.js";
