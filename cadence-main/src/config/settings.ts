import { ConfigLoadError } from "../shared/errors.js";
import { createScopedLogger, isObject, readJsonDocument } from "../shared/index.js";
import { resolveTimeZone, toMoment } from "../schedule/time.js";
import { resolveDataPath } from "./paths.js";

const log = createScopedLogger("config");

// ── Defaults ───────────────────────────────────────────────────────

const DEFAULT_SOUND_FILE = "/System/Library/Sounds/Ping.aiff";
const DEFAULT_ALERT_INTERVAL_SECONDS = 5;
const DEFAULT_MAX_ALERT_DURATION_SECONDS = 5 * 60;
const DEFAULT_PROMPT_TIMEOUT_SECONDS = 10 * 60;
const DEFAULT_DAILY_SUMMARY_TIME = "22:00";
const DEFAULT_SERVER_PORT = 8080;

const DEFAULT_PATHS: DataPaths = {
  tasks: "tasks/tasks.json",
  taskLog: "tasks/tasks.log",
  deadlines: "ddl.json",
  habits: "habits.json",
  habitRecords: "tasks/record.json",
  reports: "reports",
};

// ── Types ──────────────────────────────────────────────────────────

export interface DataPaths {
  tasks: string;
  taskLog: string;
  deadlines: string;
  habits: string;
  habitRecords: string;
  reports: string;
}

export interface ScheduleConfigOptions {
  configDir: string;
  /** Used in error messages; defaults to `<configDir>/settings.json`. */
  filePath?: string;
  now?: () => Date;
}

// ── Section readers ────────────────────────────────────────────────

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = root[key];
  if (value === undefined) return {};
  if (isObject(value)) return value;
  log.warn(`'${key}' should be an object, ignoring it.`);
  return {};
}

function readString(obj: Record<string, unknown>, key: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value === "string") return value.trim();
  log.warn(`'${key}' should be a string, using default '${fallback}'.`);
  return fallback;
}

function readPositiveNumber(obj: Record<string, unknown>, key: string, fallback: number): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value === "number" && Number.isFinite(value) && value > 0) return value;
  log.warn(`'${key}' should be a positive number, using default ${fallback}.`);
  return fallback;
}

function readStringList(obj: Record<string, unknown>, key: string): string[] {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    log.warn(`'${key}' should be a list of strings, ignoring it.`);
    return [];
  }
  return value.filter((item): item is string => typeof item === "string").map((item) => item.trim());
}

function readBlocks(obj: Record<string, unknown>): ReadonlyMap<string, number> {
  const blocks = new Map<string, number>();
  for (const [name, duration] of Object.entries(obj)) {
    if (typeof duration === "number" && Number.isInteger(duration) && duration > 0) {
      blocks.set(name, duration);
    } else {
      log.warn(`Block '${name}' needs a positive whole number of minutes, dropping it.`);
    }
  }
  return blocks;
}

function readPoints(obj: Record<string, unknown>): ReadonlyMap<string, string> {
  const points = new Map<string, string>();
  for (const [key, message] of Object.entries(obj)) {
    if (typeof message === "string") {
      points.set(key, message);
    } else {
      log.warn(`Point '${key}' needs a message string, dropping it.`);
    }
  }
  return points;
}

function envPort(): number | undefined {
  const raw = process.env["CADENCE_PORT"];
  if (!raw) return undefined;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

// ── Config ─────────────────────────────────────────────────────────

/**
 * Read-only view over `settings.json`. A reload builds a new instance.
 */
export class ScheduleConfig {
  readonly configDir: string;
  readonly soundFile: string;
  readonly alertIntervalSeconds: number;
  readonly maxAlertDurationSeconds: number;
  readonly promptTimeoutSeconds: number;
  readonly timezone: string;
  readonly skipDays: ReadonlySet<string>;
  readonly blocks: ReadonlyMap<string, number>;
  readonly points: ReadonlyMap<string, string>;
  readonly dailySummaryTime: string;
  readonly weeklyReviewSpec: string;
  readonly monthlyReviewSpec: string;
  readonly dailyUrgentTimes: readonly string[];
  readonly ddlUrgentTimes: readonly string[];
  readonly habitPromptTime: string;
  readonly serverPort: number;
  readonly paths: Readonly<DataPaths>;

  private readonly clock: () => Date;

  constructor(raw: unknown, options: ScheduleConfigOptions) {
    const filePath = options.filePath ?? resolveDataPath(options.configDir, "settings.json");
    if (!isObject(raw)) {
      throw new ConfigLoadError(filePath, "top level must be a JSON object");
    }

    const alerts = section(raw, "alerts");
    const tasks = section(raw, "tasks");
    const paths = section(raw, "paths");
    const server = section(raw, "server");

    this.configDir = options.configDir;
    this.clock = options.now ?? (() => new Date());

    this.soundFile = readString(alerts, "soundFile", DEFAULT_SOUND_FILE);
    this.alertIntervalSeconds = readPositiveNumber(alerts, "intervalSeconds", DEFAULT_ALERT_INTERVAL_SECONDS);
    this.maxAlertDurationSeconds = readPositiveNumber(alerts, "maxDurationSeconds", DEFAULT_MAX_ALERT_DURATION_SECONDS);
    this.promptTimeoutSeconds = readPositiveNumber(alerts, "promptTimeoutSeconds", DEFAULT_PROMPT_TIMEOUT_SECONDS);

    this.timezone = resolveTimeZone(readString(raw, "timezone", ""));
    this.skipDays = new Set(readStringList(raw, "skipDays").map((day) => day.toLowerCase()));
    this.blocks = readBlocks(section(raw, "blocks"));
    this.points = readPoints(section(raw, "points"));

    this.dailySummaryTime = readString(tasks, "dailySummary", DEFAULT_DAILY_SUMMARY_TIME);
    this.weeklyReviewSpec = readString(tasks, "weeklyReview", "");
    this.monthlyReviewSpec = readString(tasks, "monthlyReview", "");
    this.dailyUrgentTimes = readStringList(tasks, "dailyUrgent");
    this.ddlUrgentTimes = readStringList(tasks, "deadlineUrgent");
    this.habitPromptTime = readString(tasks, "habitPrompt", "");

    this.serverPort = envPort() ?? readPositiveNumber(server, "port", DEFAULT_SERVER_PORT);

    this.paths = {
      tasks: resolveDataPath(this.configDir, readString(paths, "tasks", DEFAULT_PATHS.tasks)),
      taskLog: resolveDataPath(this.configDir, readString(paths, "taskLog", DEFAULT_PATHS.taskLog)),
      deadlines: resolveDataPath(this.configDir, readString(paths, "deadlines", DEFAULT_PATHS.deadlines)),
      habits: resolveDataPath(this.configDir, readString(paths, "habits", DEFAULT_PATHS.habits)),
      habitRecords: resolveDataPath(this.configDir, readString(paths, "habitRecords", DEFAULT_PATHS.habitRecords)),
      reports: resolveDataPath(this.configDir, readString(paths, "reports", DEFAULT_PATHS.reports)),
    };
  }

  static async load(filePath: string, options: ScheduleConfigOptions): Promise<ScheduleConfig> {
    const result = await readJsonDocument(filePath);
    if (result.status === "missing") {
      throw new ConfigLoadError(filePath, "file not found");
    }
    if (result.status === "invalid") {
      throw new ConfigLoadError(filePath, result.reason);
    }
    return new ScheduleConfig(result.value, { ...options, filePath });
  }

  now(): Date {
    return this.clock();
  }

  shouldSkipToday(now: Date = this.clock()): boolean {
    if (this.skipDays.size === 0) return false;
    return this.skipDays.has(toMoment(now, this.timezone).weekdayName);
  }
}
