import { InvalidSpecError } from "../shared/errors.js";
import { daysInMonth, formatTime, parseTime, parseWeekday, shiftDate, toDateLabel, weekdayName, weekdayOf } from "./time.js";
import type { LocalDateTime, TimeOfDay, Weekday, ZonedMoment } from "./types.js";

export interface WeeklySpec {
  weekday: Weekday;
  time: TimeOfDay;
}

export interface MonthlySpec {
  day: number;
  time: TimeOfDay;
}

/**
 * A recurring instant the engine checks on every tick. `compositeKeyFor`
 * names the occurrence so the engine can record it as handled.
 */
export interface RecurrenceRule {
  readonly id: string;
  readonly description: string;
  isDueAt(moment: ZonedMoment): boolean;
  compositeKeyFor(moment: ZonedMoment): string;
}

function splitSpec(spec: string, shape: string): [string, string] {
  const parts = spec.trim().split(/\s+/);
  const [first, second] = parts;
  if (parts.length !== 2 || first === undefined || second === undefined) {
    throw new InvalidSpecError(spec, `expected ${shape}`);
  }
  return [first, second];
}

function parseSpecTime(spec: string, token: string): TimeOfDay {
  try {
    return parseTime(token);
  } catch {
    throw new InvalidSpecError(spec, `invalid time '${token}'`);
  }
}

export function parseWeekly(spec: string): WeeklySpec {
  const [weekdayToken, timeToken] = splitSpec(spec, "'<weekday> HH:MM' such as 'sunday 20:00'");
  const weekday = parseWeekday(weekdayToken);
  if (weekday === undefined) {
    throw new InvalidSpecError(spec, `unknown weekday '${weekdayToken}'`);
  }
  return { weekday, time: parseSpecTime(spec, timeToken) };
}

export function parseMonthly(spec: string): MonthlySpec {
  const [dayToken, timeToken] = splitSpec(spec, "'<day-of-month> HH:MM' such as '1 20:00'");
  if (!/^\d+$/.test(dayToken)) {
    throw new InvalidSpecError(spec, `invalid day '${dayToken}'`);
  }
  const day = Number(dayToken);
  if (day < 1 || day > 31) {
    throw new InvalidSpecError(spec, "day of month must be between 1 and 31");
  }
  return { day, time: parseSpecTime(spec, timeToken) };
}

export function clampDay(day: number, year: number, month: number): number {
  return Math.min(day, daysInMonth(year, month));
}

function epochMinutes(value: LocalDateTime): number {
  return Date.UTC(value.year, value.month - 1, value.day, value.hour, value.minute) / 60_000;
}

export function lastWeeklyOccurrenceOnOrBefore(now: LocalDateTime, weekday: Weekday, time: TimeOfDay): LocalDateTime {
  const daysSince = (weekdayOf(now) - weekday + 7) % 7;
  let occurrence: LocalDateTime = { ...shiftDate(now, -daysSince), ...time };
  if (epochMinutes(occurrence) > epochMinutes(now)) {
    occurrence = { ...shiftDate(occurrence, -7), ...time };
  }
  return occurrence;
}

export function lastMonthlyOccurrenceOnOrBefore(now: LocalDateTime, day: number, time: TimeOfDay): LocalDateTime {
  let year = now.year;
  let month = now.month;
  let occurrence: LocalDateTime = { year, month, day: clampDay(day, year, month), ...time };

  if (epochMinutes(occurrence) > epochMinutes(now)) {
    month -= 1;
    if (month === 0) {
      month = 12;
      year -= 1;
    }
    occurrence = { year, month, day: clampDay(day, year, month), ...time };
  }
  return occurrence;
}

// ── Rules ──────────────────────────────────────────────────────────

export class DailyRule implements RecurrenceRule {
  readonly description: string;
  private readonly time: string;

  constructor(readonly id: string, time: TimeOfDay) {
    this.time = formatTime(time);
    this.description = `daily at ${this.time}`;
  }

  isDueAt(moment: ZonedMoment): boolean {
    return moment.time === this.time;
  }

  compositeKeyFor(_moment: ZonedMoment): string {
    return `${this.id}_${this.time}`;
  }
}

export class WeeklyRule implements RecurrenceRule {
  readonly description: string;
  private readonly time: string;

  constructor(readonly id: string, private readonly spec: WeeklySpec) {
    this.time = formatTime(spec.time);
    this.description = `every ${weekdayName(spec.weekday)} at ${this.time}`;
  }

  isDueAt(moment: ZonedMoment): boolean {
    return moment.weekday === this.spec.weekday && moment.time === this.time;
  }

  compositeKeyFor(moment: ZonedMoment): string {
    return `${this.id}_${moment.date}`;
  }
}

export class MonthlyRule implements RecurrenceRule {
  readonly description: string;
  private readonly time: string;

  constructor(readonly id: string, private readonly spec: MonthlySpec) {
    this.time = formatTime(spec.time);
    this.description = `monthly on day ${spec.day} at ${this.time}`;
  }

  isDueAt(moment: ZonedMoment): boolean {
    return moment.day === clampDay(this.spec.day, moment.year, moment.month) && moment.time === this.time;
  }

  compositeKeyFor(moment: ZonedMoment): string {
    return `${this.id}_${toDateLabel(moment).slice(0, 7)}`;
  }
}

export function dailyRule(id: string, spec: string): DailyRule {
  return new DailyRule(id, parseSpecTime(spec, spec.trim()));
}

export function weeklyRule(id: string, spec: string): WeeklyRule {
  return new WeeklyRule(id, parseWeekly(spec));
}

export function monthlyRule(id: string, spec: string): MonthlyRule {
  return new MonthlyRule(id, parseMonthly(spec));
}
