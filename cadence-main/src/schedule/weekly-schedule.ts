import type { ScheduleConfig } from "../config/settings.js";
import { ConfigLoadError } from "../shared/errors.js";
import { createScopedLogger, isObject, readJsonDocument } from "../shared/index.js";
import { resolveEntry } from "./entries.js";
import { isValidTime, toMoment, weekParity, weekdayName, weekdayOf, WEEKDAY_NAMES } from "./time.js";
import type {
  EffectiveDaySchedule,
  LocalDate,
  ScheduleBucket,
  WeekParity,
  WeekScheduleData,
} from "./types.js";

const log = createScopedLogger("schedule");

const BUCKETS: readonly ScheduleBucket[] = ["common", ...WEEKDAY_NAMES];

function isBucket(value: string): value is ScheduleBucket {
  return BUCKETS.some((bucket) => bucket === value);
}

function resolveBucket(raw: unknown, label: string, config: ScheduleConfig): EffectiveDaySchedule {
  const resolved: EffectiveDaySchedule = {};
  if (!isObject(raw)) {
    log.warn(`${label} should map times to activities, ignoring it.`);
    return resolved;
  }

  for (const [time, value] of Object.entries(raw)) {
    if (!isValidTime(time)) {
      log.warn(`${label}: '${time}' is not an HH:MM time, dropping it.`);
      continue;
    }
    const entry = resolveEntry(value, config);
    if (!entry) {
      log.warn(`${label} ${time}: expected a string or {"block": ...}, dropping it.`);
      continue;
    }
    resolved[time] = entry;
  }
  return resolved;
}

function resolveWeek(raw: unknown, filePath: string, config: ScheduleConfig): WeekScheduleData {
  if (!isObject(raw)) {
    throw new ConfigLoadError(filePath, "top level must be a JSON object");
  }

  const data: WeekScheduleData = {};
  for (const [key, value] of Object.entries(raw)) {
    const bucket = key.toLowerCase();
    if (!isBucket(bucket)) {
      log.warn(`${filePath}: unknown section '${key}', expected 'common' or a weekday.`);
      continue;
    }
    data[bucket] = resolveBucket(value, `${filePath} [${key}]`, config);
  }
  return data;
}

async function readWeekFile(filePath: string, config: ScheduleConfig): Promise<WeekScheduleData> {
  const result = await readJsonDocument(filePath);
  if (result.status === "missing") throw new ConfigLoadError(filePath, "file not found");
  if (result.status === "invalid") throw new ConfigLoadError(filePath, result.reason);
  return resolveWeek(result.value, filePath, config);
}

/**
 * The odd- and even-week schedule variants, with entries already resolved
 * against the config they were loaded with.
 */
export class WeeklySchedule {
  constructor(
    readonly oddData: WeekScheduleData,
    readonly evenData: WeekScheduleData,
  ) {}

  static fromRaw(
    oddRaw: unknown,
    evenRaw: unknown,
    config: ScheduleConfig,
    sources: { odd: string; even: string } = { odd: "odd_weeks.json", even: "even_weeks.json" },
  ): WeeklySchedule {
    return new WeeklySchedule(
      resolveWeek(oddRaw, sources.odd, config),
      resolveWeek(evenRaw, sources.even, config),
    );
  }

  static async load(oddPath: string, evenPath: string, config: ScheduleConfig): Promise<WeeklySchedule> {
    const [odd, even] = await Promise.all([readWeekFile(oddPath, config), readWeekFile(evenPath, config)]);
    return new WeeklySchedule(odd, even);
  }

  dataFor(parity: WeekParity): WeekScheduleData {
    return parity === "odd" ? this.oddData : this.evenData;
  }

  /** Common entries overlaid by the weekday's own entries at the same time key. */
  effectiveScheduleFor(date: LocalDate, parity: WeekParity): EffectiveDaySchedule {
    const data = this.dataFor(parity);
    const day = weekdayName(weekdayOf(date));
    return { ...(data.common ?? {}), ...(data[day] ?? {}) };
  }

  todaysEffectiveSchedule(config: ScheduleConfig, now: Date = config.now()): EffectiveDaySchedule {
    if (config.shouldSkipToday(now)) return {};
    const moment = toMoment(now, config.timezone);
    return this.effectiveScheduleFor(moment, weekParity(moment));
  }
}
