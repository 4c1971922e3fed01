import { InvalidFormatError } from "../shared/errors.js";
import type {
  LocalDate,
  LocalDateTime,
  TimeOfDay,
  WeekParity,
  Weekday,
  WeekdayName,
  ZonedMoment,
} from "./types.js";

export interface ZonedDateParts extends LocalDateTime {
  second: number;
  weekday: Weekday;
}

const FALLBACK_TIMEZONE = "UTC";
const DAY_MS = 24 * 60 * 60 * 1000;
const MINUTES_PER_DAY = 24 * 60;
const TIME_PATTERN = /^(\d{2}):(\d{2})$/;

const WEEKDAY_MAP: Record<WeekdayName, Weekday> = {
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
  sunday: 7,
};

const WEEKDAY_ALIASES: Record<string, Weekday> = {
  ...WEEKDAY_MAP,
  mon: 1,
  tue: 2,
  tues: 2,
  wed: 3,
  thu: 4,
  thur: 4,
  thurs: 4,
  fri: 5,
  sat: 6,
  sun: 7,
};

const JS_DAY_TO_WEEKDAY: readonly Weekday[] = [7, 1, 2, 3, 4, 5, 6];

export const WEEKDAY_NAMES: readonly WeekdayName[] = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
];

function toNumber(part: string | undefined): number {
  return Number(part ?? "0");
}

function extractPart(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string {
  const found = parts.find((part) => part.type === type);
  return found?.value ?? "";
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

// ── Time of day ────────────────────────────────────────────────────

export function parseTime(value: string): TimeOfDay {
  const match = TIME_PATTERN.exec(value);
  if (!match) throw new InvalidFormatError(value);

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) throw new InvalidFormatError(value);

  return { hour, minute };
}

export function isValidTime(value: string): boolean {
  try {
    parseTime(value);
    return true;
  } catch {
    return false;
  }
}

export function formatTime(time: TimeOfDay): string {
  return `${pad(time.hour)}:${pad(time.minute)}`;
}

export function toMinuteOfDay(time: TimeOfDay): number {
  return time.hour * 60 + time.minute;
}

/** Adds `minutes` to an "HH:MM" string, wrapping past midnight. */
export function addMinutes(value: string, minutes: number): string {
  if (!Number.isInteger(minutes) || minutes < 0) {
    throw new InvalidFormatError(String(minutes), "a non-negative whole number of minutes");
  }
  const total = (toMinuteOfDay(parseTime(value)) + minutes) % MINUTES_PER_DAY;
  return formatTime({ hour: Math.floor(total / 60), minute: total % 60 });
}

// ── Calendar ───────────────────────────────────────────────────────

export function parseWeekday(token: string): Weekday | undefined {
  const key = token.trim().toLowerCase();
  return Object.hasOwn(WEEKDAY_ALIASES, key) ? WEEKDAY_ALIASES[key] : undefined;
}

export function weekdayName(weekday: Weekday): WeekdayName {
  return WEEKDAY_NAMES[weekday - 1] ?? "monday";
}

export function weekdayOf(date: LocalDate): Weekday {
  const jsDay = new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
  return JS_DAY_TO_WEEKDAY[jsDay] ?? 1;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function shiftDate(date: LocalDate, days: number): LocalDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: LocalDate, to: LocalDate): number {
  const fromMs = Date.UTC(from.year, from.month - 1, from.day);
  const toMs = Date.UTC(to.year, to.month - 1, to.day);
  return Math.round((toMs - fromMs) / DAY_MS);
}

export function toDateLabel(parts: LocalDate): string {
  return `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)}`;
}

export function parseDateLabel(value: string): LocalDate | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  if (date.month < 1 || date.month > 12) return null;
  if (date.day < 1 || date.day > daysInMonth(date.year, date.month)) return null;
  return date;
}

export function isoWeekNumber(date: LocalDate): number {
  const thursday = shiftDate(date, 4 - weekdayOf(date));
  const yearStart = Date.UTC(thursday.year, 0, 1);
  const thursdayMs = Date.UTC(thursday.year, thursday.month - 1, thursday.day);
  return Math.ceil(((thursdayMs - yearStart) / DAY_MS + 1) / 7);
}

export function weekParity(date: LocalDate): WeekParity {
  return isoWeekNumber(date) % 2 === 1 ? "odd" : "even";
}

// ── Time zones ─────────────────────────────────────────────────────

export function isValidTimeZone(value: string): boolean {
  try {
    const formatter = new Intl.DateTimeFormat("en-US", { timeZone: value });
    formatter.format(new Date());
    return true;
  } catch {
    return false;
  }
}

export function resolveTimeZone(value?: string): string {
  const requested = value?.trim();
  if (requested && isValidTimeZone(requested)) {
    return requested;
  }

  const envTz = process.env["CADENCE_TIMEZONE"]?.trim();
  if (envTz && isValidTimeZone(envTz)) {
    return envTz;
  }

  const hostTz = new Intl.DateTimeFormat().resolvedOptions().timeZone;
  return hostTz && isValidTimeZone(hostTz) ? hostTz : FALLBACK_TIMEZONE;
}

export function getZonedDateParts(date: Date, timeZone: string): ZonedDateParts {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    weekday: "long",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
    hourCycle: "h23",
  });

  const parts = formatter.formatToParts(date);
  const weekdayLabel = extractPart(parts, "weekday").trim().toLowerCase();

  return {
    year: toNumber(extractPart(parts, "year")),
    month: toNumber(extractPart(parts, "month")),
    day: toNumber(extractPart(parts, "day")),
    hour: toNumber(extractPart(parts, "hour")) % 24,
    minute: toNumber(extractPart(parts, "minute")),
    second: toNumber(extractPart(parts, "second")),
    weekday: parseWeekday(weekdayLabel) ?? 1,
  };
}

export function toMoment(date: Date, timeZone: string): ZonedMoment {
  const parts = getZonedDateParts(date, timeZone);
  return {
    year: parts.year,
    month: parts.month,
    day: parts.day,
    hour: parts.hour,
    minute: parts.minute,
    date: toDateLabel(parts),
    time: formatTime(parts),
    weekday: parts.weekday,
    weekdayName: weekdayName(parts.weekday),
  };
}
