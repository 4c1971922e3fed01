import type { AlertDispatcher } from "../alerts/dispatcher.js";
import type { ScheduleConfig } from "../config/settings.js";
import type { WeeklySchedule } from "../schedule/weekly-schedule.js";
import { addMinutes, toMoment, weekParity } from "../schedule/time.js";
import type { EffectiveDaySchedule, ScheduleEntry, ZonedMoment } from "../schedule/types.js";
import { UnknownBlockReferenceError, createScopedLogger, errorMessage } from "../shared/index.js";
import type { PeriodicTask, RejectedSpec } from "./periodic-tasks.js";
import { EngineState } from "./state.js";
import { describeDay } from "./status.js";
import type { DayStatus } from "./status.js";

const log = createScopedLogger("engine");

export const START_TITLE = "Start";
export const END_TITLE = "Time's up";
export const REMINDER_TITLE = "Reminder";

export function startMessage(title: string, durationMinutes: number): string {
  return `${title} ⏱ (${durationMinutes}min)`;
}

export function endMessage(title: string): string {
  return `${title} finished! Take a break`;
}

// ── Types ──────────────────────────────────────────────────────────

export type FiredEvent =
  | { kind: "start"; time: string; message: string; endsAt: string }
  | { kind: "end"; time: string; message: string }
  | { kind: "message"; time: string; text: string }
  | { kind: "periodic"; taskId: string; key: string }
  | { kind: "unknown-block"; time: string; blockName: string };

export interface TickOutcome {
  date: string;
  time: string;
  /** True when this tick cleared the previous day's state. */
  reset: boolean;
  skipDay: boolean;
  fired: FiredEvent[];
}

export interface EngineConfiguration {
  config: ScheduleConfig;
  weekly: WeeklySchedule;
  tasks: readonly PeriodicTask[];
  rejected?: readonly RejectedSpec[];
}

export interface ScheduleEngineOptions extends EngineConfiguration {
  dispatcher: AlertDispatcher;
}

// ── Engine ─────────────────────────────────────────────────────────

/**
 * Decides what is due at a given instant and hands alerts to the
 * dispatcher. `tick` never waits for delivery; keys are recorded before
 * the alert is enqueued, so a second tick in the same minute is a no-op.
 */
export class ScheduleEngine {
  private config: ScheduleConfig;
  private weekly: WeeklySchedule;
  private tasks: readonly PeriodicTask[];
  private rejected: readonly RejectedSpec[];
  private readonly dispatcher: AlertDispatcher;
  private readonly state = new EngineState();

  constructor(options: ScheduleEngineOptions) {
    this.config = options.config;
    this.weekly = options.weekly;
    this.tasks = options.tasks;
    this.rejected = options.rejected ?? [];
    this.dispatcher = options.dispatcher;
  }

  get firedKeys(): ReadonlySet<string> {
    return this.state.firedKeys;
  }

  get pendingEndAlarms(): ReadonlyMap<string, string> {
    return this.state.pendingEndAlarms;
  }

  get rejectedSpecs(): readonly RejectedSpec[] {
    return this.rejected;
  }

  get currentConfig(): ScheduleConfig {
    return this.config;
  }

  /** Swaps configuration; fired keys and pending end alarms are kept. */
  reconfigure(next: EngineConfiguration): void {
    this.config = next.config;
    this.weekly = next.weekly;
    this.tasks = next.tasks;
    this.rejected = next.rejected ?? [];
  }

  tick(now: Date = this.config.now()): TickOutcome {
    const moment = toMoment(now, this.config.timezone);
    const reset = this.state.rollOver(moment.date, moment.time);
    if (reset) {
      log.info(`new day ${moment.date}: fired keys and pending end alarms cleared`);
    }

    const fired: FiredEvent[] = [];
    const nowStr = moment.time;
    const skipDay = this.config.shouldSkipToday(now);

    let schedule: EffectiveDaySchedule = {};
    try {
      schedule = this.weekly.todaysEffectiveSchedule(this.config, now);
    } catch (err) {
      log.error("could not resolve today's schedule:", errorMessage(err));
    }

    const entry = schedule[nowStr];
    if (entry && !this.state.firedKeys.has(nowStr)) {
      this.guard(`entry at ${nowStr}`, () => this.fireStart(nowStr, entry, fired));
    }

    const endMessageText = this.state.pendingEndAlarms.get(nowStr);
    if (endMessageText !== undefined && !this.state.firedKeys.has(nowStr)) {
      this.guard(`end alarm at ${nowStr}`, () => {
        this.state.firedKeys.add(nowStr);
        this.state.pendingEndAlarms.delete(nowStr);
        this.dispatcher.alert(`end ${nowStr}`, END_TITLE, endMessageText);
        fired.push({ kind: "end", time: nowStr, message: endMessageText });
      });
    }

    for (const task of this.tasks) {
      this.guard(`periodic task ${task.id}`, () => this.firePeriodic(task, now, moment, skipDay, fired));
    }

    return { date: moment.date, time: nowStr, reset, skipDay, fired };
  }

  status(now: Date = this.config.now()): DayStatus {
    const moment = toMoment(now, this.config.timezone);
    const skipped = this.config.shouldSkipToday(now);
    const schedule = this.weekly.todaysEffectiveSchedule(this.config, now);
    return {
      ...describeDay(schedule, moment),
      date: moment.date,
      time: moment.time,
      weekdayName: moment.weekdayName,
      parity: weekParity(moment),
      skipped,
      pendingEndAlarms: [...this.state.pendingEndAlarms.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([time, label]) => ({ time, label })),
    };
  }

  private fireStart(time: string, entry: ScheduleEntry, fired: FiredEvent[]): void {
    if (entry.kind === "block") {
      const duration = this.config.blocks.get(entry.blockName);
      if (duration === undefined) {
        log.warn(new UnknownBlockReferenceError(entry.blockName, time).message);
        fired.push({ kind: "unknown-block", time, blockName: entry.blockName });
        return;
      }

      const message = startMessage(entry.title, duration);
      const endsAt = addMinutes(time, duration);
      this.state.firedKeys.add(time);
      this.state.pendingEndAlarms.set(endsAt, endMessage(entry.title));
      this.dispatcher.alert(`start ${time}`, START_TITLE, message);
      fired.push({ kind: "start", time, message, endsAt });
      return;
    }

    this.state.firedKeys.add(time);
    this.dispatcher.alert(`reminder ${time}`, REMINDER_TITLE, entry.text);
    fired.push({ kind: "message", time, text: entry.text });
  }

  private firePeriodic(
    task: PeriodicTask,
    now: Date,
    moment: ZonedMoment,
    skipDay: boolean,
    fired: FiredEvent[],
  ): void {
    if (!task.rule.isDueAt(moment)) return;
    if (task.skipOnSkipDays && skipDay) return;

    const key = task.rule.compositeKeyFor(moment);
    if (this.state.firedKeys.has(key)) return;

    this.state.firedKeys.add(key);
    this.dispatcher.enqueue(task.id, (channel) => task.run(channel, { now, moment }));
    fired.push({ kind: "periodic", taskId: task.id, key });
  }

  private guard(label: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      log.error(`${label} failed:`, errorMessage(err));
    }
  }
}
