import { access, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createScopedLogger, errorMessage } from "../shared/index.js";
import type { HabitStore } from "../data/habit-store.js";
import type { TaskLog } from "../data/task-log.js";
import type { HabitDefinition, HabitRecord, TaskLogEntry } from "../data/types.js";
import {
  lastMonthlyOccurrenceOnOrBefore,
  lastWeeklyOccurrenceOnOrBefore,
  parseMonthly,
  parseWeekly,
} from "../schedule/recurrence.js";
import { daysBetween, daysInMonth, shiftDate, toDateLabel, toMoment, weekdayOf } from "../schedule/time.js";
import type { LocalDate } from "../schedule/types.js";

const log = createScopedLogger("reports");

const DAY_ABBREVIATIONS = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"];

export type ReportKind = "weekly" | "monthly";

export interface ReportPeriod {
  kind: ReportKind;
  start: LocalDate;
  end: LocalDate;
}

export interface GeneratedReport {
  kind: ReportKind;
  path: string;
}

export interface ReviewSpecs {
  weekly: string;
  monthly: string;
}

export interface ReportData {
  period: ReportPeriod;
  completed: readonly TaskLogEntry[];
  habits: readonly HabitDefinition[];
  records: readonly HabitRecord[];
  timeZone: string;
}

// ── Periods ────────────────────────────────────────────────────────

export function weekContaining(date: LocalDate): ReportPeriod {
  const start = shiftDate(date, 1 - weekdayOf(date));
  return { kind: "weekly", start, end: shiftDate(start, 6) };
}

export function monthContaining(date: LocalDate): ReportPeriod {
  return {
    kind: "monthly",
    start: { year: date.year, month: date.month, day: 1 },
    end: { year: date.year, month: date.month, day: daysInMonth(date.year, date.month) },
  };
}

export function reportFileName(period: ReportPeriod): string {
  const compact = (date: LocalDate): string => toDateLabel(date).replaceAll("-", "");
  if (period.kind === "weekly") {
    return `weekly_report_${compact(period.start)}_${compact(period.end)}.md`;
  }
  return `monthly_report_${compact(period.start).slice(0, 6)}.md`;
}

// ── Rendering ──────────────────────────────────────────────────────

function periodDates(period: ReportPeriod): LocalDate[] {
  const count = daysBetween(period.start, period.end) + 1;
  return Array.from({ length: count }, (_, index) => shiftDate(period.start, index));
}

export function completionRate(data: Pick<ReportData, "period" | "habits" | "records">): number {
  const slots = data.habits.length * (daysBetween(data.period.start, data.period.end) + 1);
  if (slots === 0) return 0;
  const completed = data.records.reduce((sum, record) => sum + Object.keys(record.completed).length, 0);
  return (completed / slots) * 100;
}

function habitTable(data: ReportData): string[] {
  const dates = periodDates(data.period);
  const header =
    data.period.kind === "weekly"
      ? dates.map((date, index) => `${DAY_ABBREVIATIONS[index] ?? ""} ${String(date.day).padStart(2, "0")}`)
      : dates.map((date) => String(date.day));

  const byDate = new Map(data.records.map((record) => [record.date, record]));
  const rows = data.habits.map((habit) => {
    const cells = dates.map((date) => (byDate.get(toDateLabel(date))?.completed[habit.id] !== undefined ? "✓" : "·"));
    return `| ${habit.name} | ${cells.join(" | ")} |`;
  });

  return [
    `| Habit | ${header.join(" | ")} |`,
    `| --- | ${header.map(() => "---").join(" | ")} |`,
    ...rows,
  ];
}

function taskLines(data: ReportData): string[] {
  const sorted = [...data.completed].sort((a, b) => (a.timestamp < b.timestamp ? 1 : a.timestamp > b.timestamp ? -1 : 0));
  return sorted.map((entry, index) => {
    const moment = toMoment(new Date(entry.timestamp), data.timeZone);
    return `${index + 1}. ${entry.task.description} (priority: ${entry.task.priority}) - ${moment.date} ${moment.time}`;
  });
}

export function renderReport(data: ReportData): string {
  const { period } = data;
  const title =
    period.kind === "weekly"
      ? `# Weekly Report: ${toDateLabel(period.start)} to ${toDateLabel(period.end)}`
      : `# Monthly Report: ${toDateLabel(period.start).slice(0, 7)}`;

  const lines = [
    title,
    "",
    `- Tasks completed: ${data.completed.length}`,
    `- Habit completion rate: ${completionRate(data).toFixed(1)}%`,
    "",
    "## Habits",
    "",
  ];

  if (data.habits.length === 0) {
    lines.push("No habits configured.");
  } else {
    lines.push(...habitTable(data));
  }

  lines.push("", "## Completed tasks", "");
  if (data.completed.length === 0) {
    lines.push("Nothing completed in this period.");
  } else {
    lines.push(...taskLines(data));
  }

  return lines.join("\n") + "\n";
}

// ── Generator ──────────────────────────────────────────────────────

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export interface ReportGeneratorOptions {
  reportsDir: string;
  timeZone: string;
  taskLog: TaskLog;
  habits: HabitStore;
}

export class ReportGenerator {
  private readonly reportsDir: string;
  private readonly timeZone: string;
  private readonly taskLog: TaskLog;
  private readonly habits: HabitStore;

  constructor(options: ReportGeneratorOptions) {
    this.reportsDir = options.reportsDir;
    this.timeZone = options.timeZone;
    this.taskLog = options.taskLog;
    this.habits = options.habits;
  }

  pathFor(period: ReportPeriod): string {
    return join(this.reportsDir, reportFileName(period));
  }

  async generate(period: ReportPeriod): Promise<string> {
    const startLabel = toDateLabel(period.start);
    const endLabel = toDateLabel(period.end);
    const [completed, habits, records] = await Promise.all([
      this.taskLog.completedBetween(startLabel, endLabel, this.timeZone),
      this.habits.habits(),
      this.habits.records(),
    ]);

    const content = renderReport({
      period,
      completed,
      habits,
      records: records.filter((record) => record.date >= startLabel && record.date <= endLabel),
      timeZone: this.timeZone,
    });

    const target = this.pathFor(period);
    await mkdir(this.reportsDir, { recursive: true });
    await writeFile(target, content, "utf-8");
    log.info(`${period.kind} report written: ${target}`);
    return target;
  }

  /**
   * Writes the weekly report for the week of the last weekly review and the
   * monthly report for the month before the last monthly review, skipping
   * files that already exist. Blank specs are ignored.
   */
  async generateDueReports(now: Date, specs: ReviewSpecs): Promise<GeneratedReport[]> {
    const moment = toMoment(now, this.timeZone);
    const due: ReportPeriod[] = [];

    if (specs.weekly.trim()) {
      try {
        const { weekday, time } = parseWeekly(specs.weekly);
        due.push(weekContaining(lastWeeklyOccurrenceOnOrBefore(moment, weekday, time)));
      } catch (err) {
        log.warn("skipping weekly report:", errorMessage(err));
      }
    }

    if (specs.monthly.trim()) {
      try {
        const { day, time } = parseMonthly(specs.monthly);
        const occurrence = lastMonthlyOccurrenceOnOrBefore(moment, day, time);
        due.push(monthContaining(shiftDate(occurrence, -1)));
      } catch (err) {
        log.warn("skipping monthly report:", errorMessage(err));
      }
    }

    const generated: GeneratedReport[] = [];
    for (const period of due) {
      if (await fileExists(this.pathFor(period))) continue;
      generated.push({ kind: period.kind, path: await this.generate(period) });
    }
    return generated;
  }
}
