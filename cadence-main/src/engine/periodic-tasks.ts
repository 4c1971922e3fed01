import type { AlertChannel } from "../alerts/types.js";
import type { ScheduleConfig } from "../config/settings.js";
import type { DeadlineStore } from "../data/deadline-store.js";
import type { HabitStore } from "../data/habit-store.js";
import type { TaskLog } from "../data/task-log.js";
import type { TaskStore } from "../data/task-store.js";
import { sortByPriority } from "../data/task-store.js";
import type { TaskItem, UrgentDeadline } from "../data/types.js";
import type { GeneratedReport, ReportGenerator } from "../reports/report-generator.js";
import { dailyRule, monthlyRule, weeklyRule } from "../schedule/recurrence.js";
import type { RecurrenceRule } from "../schedule/recurrence.js";
import type { ZonedMoment } from "../schedule/types.js";
import { createScopedLogger, errorMessage } from "../shared/index.js";

const log = createScopedLogger("tasks");

// ── Types ──────────────────────────────────────────────────────────

export interface PeriodicTaskContext {
  now: Date;
  moment: ZonedMoment;
}

export interface PeriodicTask {
  id: string;
  rule: RecurrenceRule;
  /** Daily chores stay quiet on skip days; reviews do not. */
  skipOnSkipDays: boolean;
  run(channel: AlertChannel, context: PeriodicTaskContext): Promise<void>;
}

export interface PeriodicTaskServices {
  tasks: TaskStore;
  taskLog: TaskLog;
  deadlines: DeadlineStore;
  habits: HabitStore;
  reports: ReportGenerator;
}

export interface RejectedSpec {
  taskId: string;
  spec: string;
  reason: string;
}

export interface PeriodicTaskSet {
  tasks: PeriodicTask[];
  rejected: RejectedSpec[];
}

// ── Messages ───────────────────────────────────────────────────────

export function formatDailySummary(completed: readonly TaskItem[]): string {
  if (completed.length === 0) {
    return "📋 Today's completed tasks\n\n✨ Nothing completed today. Keep going tomorrow!";
  }
  const lines = sortByPriority(completed).map(
    (task, index) => `${index + 1}. ${task.description} (priority: ${task.priority})`,
  );
  return `📋 Today's completed tasks\n\n🎉 You completed ${completed.length} task(s) today:\n\n${lines.join("\n")}`;
}

export function formatUrgentTasks(tasks: readonly TaskItem[]): string {
  const lines = tasks.map((task, index) => `${index + 1}. ${task.description} (priority: ${task.priority})`);
  return `🔥 ${tasks.length} urgent task(s):\n\n${lines.join("\n")}`;
}

export function describeDaysLeft(daysLeft: number): string {
  if (daysLeft < 0) return `overdue by ${-daysLeft} day(s)`;
  if (daysLeft === 0) return "due today";
  if (daysLeft === 1) return "due tomorrow";
  return `due in ${daysLeft} days`;
}

export function formatUrgentDeadlines(deadlines: readonly UrgentDeadline[]): string {
  const lines = deadlines.map(
    (item, index) => `${index + 1}. ${item.event} - ${item.deadline} (${describeDaysLeft(item.daysLeft)})`,
  );
  return `⏰ ${deadlines.length} deadline(s) coming up:\n\n${lines.join("\n")}`;
}

export function formatReviewMessage(heading: string, generated: readonly GeneratedReport[]): string {
  if (generated.length === 0) {
    return `${heading}\n\nReports are already up to date.`;
  }
  const lines = generated.map((report) => `${report.kind} report: ${report.path}`);
  return `${heading}\n\n${lines.join("\n")}`;
}

// ── Builder ────────────────────────────────────────────────────────

type RuleFactory = (id: string, spec: string) => RecurrenceRule;

/**
 * Turns the configured periodic specs into tasks. Specs that do not parse
 * are logged here, once, and left out.
 */
export function buildPeriodicTasks(config: ScheduleConfig, services: PeriodicTaskServices): PeriodicTaskSet {
  const tasks: PeriodicTask[] = [];
  const rejected: RejectedSpec[] = [];

  const add = (
    id: string,
    spec: string,
    factory: RuleFactory,
    skipOnSkipDays: boolean,
    run: PeriodicTask["run"],
  ): void => {
    if (!spec.trim()) return;
    try {
      tasks.push({ id, rule: factory(id, spec), skipOnSkipDays, run });
    } catch (err) {
      const reason = errorMessage(err);
      rejected.push({ taskId: id, spec, reason });
      log.warn(`${id} disabled: ${reason}`);
    }
  };

  add("daily_summary", config.dailySummaryTime, dailyRule, true, async (channel, { moment }) => {
    const completed = await services.taskLog.completedOn(moment.date, config.timezone);
    await channel.alert("Daily summary", formatDailySummary(completed));
  });

  add("habit_prompt", config.habitPromptTime, dailyRule, true, async (channel, { now, moment }) => {
    const habits = await services.habits.habits();
    if (habits.length === 0) {
      log.info("habit prompt skipped: no habits configured");
      return;
    }
    const result = await channel.promptMultiSelect(
      habits.map((habit) => habit.name),
      "Habits",
      "Which habits did you complete today?",
    );
    if (result.status === "cancelled") {
      log.info(`habit prompt for ${moment.date} cancelled`);
      return;
    }
    const record = await services.habits.saveRecord(moment.date, result.selected, now);
    log.info(`habit record saved for ${moment.date}: ${Object.keys(record.completed).length} completed`);
  });

  for (const time of config.dailyUrgentTimes) {
    add("daily_urgent", time, dailyRule, true, async (channel) => {
      const urgent = await services.tasks.urgent();
      if (urgent.length === 0) return;
      await channel.alert("Urgent tasks", formatUrgentTasks(urgent));
    });
  }

  for (const time of config.ddlUrgentTimes) {
    add("ddl_urgent", time, dailyRule, true, async (channel, { moment }) => {
      const urgent = await services.deadlines.urgent(moment);
      if (urgent.length === 0) return;
      await channel.alert("Deadlines", formatUrgentDeadlines(urgent));
    });
  }

  const reviewSpecs = { weekly: config.weeklyReviewSpec, monthly: config.monthlyReviewSpec };

  add("weekly_review", config.weeklyReviewSpec, weeklyRule, false, async (channel, { now }) => {
    const generated = await services.reports.generateDueReports(now, reviewSpecs);
    await channel.alert("Weekly review", formatReviewMessage("🗓 Time for the weekly review.", generated));
  });

  add("monthly_review", config.monthlyReviewSpec, monthlyRule, false, async (channel, { now }) => {
    const generated = await services.reports.generateDueReports(now, reviewSpecs);
    await channel.alert("Monthly review", formatReviewMessage("📅 Time for the monthly review.", generated));
  });

  return { tasks, rejected };
}
