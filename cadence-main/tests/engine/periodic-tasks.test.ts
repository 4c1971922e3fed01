import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createServices } from "../../src/app/bootstrap.js";
import type { ScheduleConfig } from "../../src/config/settings.js";
import type { PeriodicTask, PeriodicTaskServices } from "../../src/engine/periodic-tasks.js";
import {
  buildPeriodicTasks,
  describeDaysLeft,
  formatDailySummary,
  formatReviewMessage,
  formatUrgentDeadlines,
  formatUrgentTasks,
} from "../../src/engine/periodic-tasks.js";
import { toMoment } from "../../src/schedule/time.js";
import { RecordingChannel, makeConfig } from "../helpers/fixtures.js";

let tempDir = "";

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "cadence-periodic-test-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

function configWith(tasks: Record<string, unknown>): ScheduleConfig {
  return makeConfig({
    tasks,
    paths: {
      tasks: join(tempDir, "tasks.json"),
      taskLog: join(tempDir, "task_log.json"),
      deadlines: join(tempDir, "deadlines.json"),
      habits: join(tempDir, "habits.json"),
      habitRecords: join(tempDir, "habit_records.json"),
      reports: join(tempDir, "reports"),
    },
  });
}

function setup(tasks: Record<string, unknown>): { services: PeriodicTaskServices; built: PeriodicTask[] } {
  const config = configWith(tasks);
  const services = createServices(config);
  return { services, built: buildPeriodicTasks(config, services).tasks };
}

function taskById(tasks: readonly PeriodicTask[], id: string): PeriodicTask {
  const task = tasks.find((candidate) => candidate.id === id);
  if (!task) throw new Error(`no task ${id}`);
  return task;
}

async function runAt(task: PeriodicTask, channel: RecordingChannel, iso: string): Promise<void> {
  const now = new Date(iso);
  await task.run(channel, { now, moment: toMoment(now, "UTC") });
}

describe("messages", () => {
  it("summarizes an empty day", () => {
    expect(formatDailySummary([])).toBe("📋 Today's completed tasks\n\n✨ Nothing completed today. Keep going tomorrow!");
  });

  it("lists completed tasks by priority", () => {
    expect(
      formatDailySummary([
        { description: "Low", priority: 2 },
        { description: "High", priority: 9 },
      ]),
    ).toBe("📋 Today's completed tasks\n\n🎉 You completed 2 task(s) today:\n\n1. High (priority: 9)\n2. Low (priority: 2)");
  });

  it("lists urgent tasks", () => {
    expect(formatUrgentTasks([{ description: "Taxes", priority: 10 }])).toBe("🔥 1 urgent task(s):\n\n1. Taxes (priority: 10)");
  });

  it("describes days left", () => {
    expect(describeDaysLeft(-2)).toBe("overdue by 2 day(s)");
    expect(describeDaysLeft(0)).toBe("due today");
    expect(describeDaysLeft(1)).toBe("due tomorrow");
    expect(describeDaysLeft(3)).toBe("due in 3 days");
  });

  it("lists urgent deadlines", () => {
    expect(
      formatUrgentDeadlines([
        { event: "Rent", deadline: "2026-10-19", added: "", daysLeft: 0 },
        { event: "Visa", deadline: "2026-10-21", added: "", daysLeft: 2 },
      ]),
    ).toBe("⏰ 2 deadline(s) coming up:\n\n1. Rent - 2026-10-19 (due today)\n2. Visa - 2026-10-21 (due in 2 days)");
  });

  it("mentions generated reports in the review", () => {
    expect(formatReviewMessage("🗓 Time for the weekly review.", [])).toBe(
      "🗓 Time for the weekly review.\n\nReports are already up to date.",
    );
    expect(formatReviewMessage("Review", [{ kind: "weekly", path: "/r/w.md" }])).toBe("Review\n\nweekly report: /r/w.md");
  });
});

describe("buildPeriodicTasks", () => {
  it("creates one task per configured time", () => {
    const { built } = setup({
      dailySummary: "22:00",
      habitPrompt: "21:30",
      dailyUrgent: ["09:00", "18:00"],
      deadlineUrgent: ["08:00"],
      weeklyReview: "sunday 20:00",
      monthlyReview: "1 09:00",
    });

    expect(built.map((task) => [task.id, task.rule.description, task.skipOnSkipDays])).toEqual([
      ["daily_summary", "daily at 22:00", true],
      ["habit_prompt", "daily at 21:30", true],
      ["daily_urgent", "daily at 09:00", true],
      ["daily_urgent", "daily at 18:00", true],
      ["ddl_urgent", "daily at 08:00", true],
      ["weekly_review", "every sunday at 20:00", false],
      ["monthly_review", "monthly on day 1 at 09:00", false],
    ]);
  });

  it("leaves out blank specs and reports bad ones", () => {
    const config = configWith({ dailySummary: "", weeklyReview: "funday 20:00", dailyUrgent: ["25:00"] });
    const { tasks, rejected } = buildPeriodicTasks(config, createServices(config));

    expect(tasks).toEqual([]);
    expect(rejected.map((entry) => [entry.taskId, entry.spec])).toEqual([
      ["daily_urgent", "25:00"],
      ["weekly_review", "funday 20:00"],
    ]);
  });

  it("sends the daily summary of today's completions", async () => {
    const { services, built } = setup({ dailySummary: "22:00" });
    await services.taskLog.append("deleted", { description: "Ship draft", priority: 7 }, new Date("2026-10-19T15:00:00Z"));
    await services.taskLog.append("deleted", { description: "Yesterday", priority: 9 }, new Date("2026-10-18T15:00:00Z"));

    const channel = new RecordingChannel();
    await runAt(taskById(built, "daily_summary"), channel, "2026-10-19T22:00:00Z");

    expect(channel.alerts).toEqual([
      {
        title: "Daily summary",
        message: "📋 Today's completed tasks\n\n🎉 You completed 1 task(s) today:\n\n1. Ship draft (priority: 7)",
      },
    ]);
  });

  describe("habit prompt", () => {
    beforeEach(async () => {
      await writeFile(join(tempDir, "habits.json"), JSON.stringify({ habits: { "1": "Read", "2": "Exercise" } }), "utf-8");
    });

    it("saves the selected habits", async () => {
      const { services, built } = setup({ habitPrompt: "21:30" });
      const channel = new RecordingChannel();
      channel.multiSelectResult = { status: "selected", selected: ["Exercise"] };

      await runAt(taskById(built, "habit_prompt"), channel, "2026-10-19T21:30:00Z");

      expect(channel.prompts).toEqual([["Read", "Exercise"]]);
      expect(await services.habits.records()).toEqual([
        { date: "2026-10-19", completed: { "2": "Exercise" }, timestamp: "2026-10-19T21:30:00.000Z" },
      ]);
    });

    it("saves nothing when cancelled", async () => {
      const { services, built } = setup({ habitPrompt: "21:30" });
      const channel = new RecordingChannel();
      channel.multiSelectResult = { status: "cancelled" };

      await runAt(taskById(built, "habit_prompt"), channel, "2026-10-19T21:30:00Z");

      expect(await services.habits.records()).toEqual([]);
    });
  });

  it("does not prompt without configured habits", async () => {
    const { built } = setup({ habitPrompt: "21:30" });
    const channel = new RecordingChannel();

    await runAt(taskById(built, "habit_prompt"), channel, "2026-10-19T21:30:00Z");

    expect(channel.prompts).toEqual([]);
  });

  it("alerts only when something is urgent", async () => {
    const { services, built } = setup({ dailyUrgent: ["09:00"] });
    const task = taskById(built, "daily_urgent");
    const channel = new RecordingChannel();

    await services.tasks.add("Minor", 3);
    await runAt(task, channel, "2026-10-19T09:00:00Z");
    expect(channel.alerts).toEqual([]);

    await services.tasks.add("Taxes", 9);
    await runAt(task, channel, "2026-10-19T09:00:00Z");
    expect(channel.alerts).toEqual([{ title: "Urgent tasks", message: "🔥 1 urgent task(s):\n\n1. Taxes (priority: 9)" }]);
  });

  it("alerts on deadlines within three days", async () => {
    const { services, built } = setup({ deadlineUrgent: ["08:00"] });
    const today = { year: 2026, month: 10, day: 19 };
    await services.deadlines.add("Visa", "10.21", today);
    await services.deadlines.add("Taxes", "12.1", today);

    const channel = new RecordingChannel();
    await runAt(taskById(built, "ddl_urgent"), channel, "2026-10-19T08:00:00Z");

    expect(channel.alerts).toEqual([
      { title: "Deadlines", message: "⏰ 1 deadline(s) coming up:\n\n1. Visa - 2026-10-21 (due in 2 days)" },
    ]);
  });

  it("writes the weekly report before announcing the review", async () => {
    const { built } = setup({ weeklyReview: "sunday 20:00" });
    const channel = new RecordingChannel();

    await runAt(taskById(built, "weekly_review"), channel, "2026-10-25T20:00:00Z");

    expect(channel.alerts).toEqual([
      {
        title: "Weekly review",
        message: `🗓 Time for the weekly review.\n\nweekly report: ${join(tempDir, "reports", "weekly_report_20261019_20261025.md")}`,
      },
    ]);
  });
});
