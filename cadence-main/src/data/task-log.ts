import { isObject, readJsonFile, writeJsonFileAtomic } from "../shared/index.js";
import { toMoment } from "../schedule/time.js";
import { FileLock } from "./lock.js";
import type { TaskAction, TaskItem, TaskLogEntry } from "./types.js";

function isTaskItem(value: unknown): value is TaskItem {
  return isObject(value) && typeof value["description"] === "string" && typeof value["priority"] === "number";
}

function isTaskAction(value: unknown): value is TaskAction {
  return value === "added" || value === "updated" || value === "deleted";
}

function toLogEntry(value: unknown): TaskLogEntry | null {
  if (!isObject(value)) return null;
  const { timestamp, action, task, metadata } = value;
  if (typeof timestamp !== "string" || !isTaskAction(action) || !isTaskItem(task)) return null;
  return {
    timestamp,
    action,
    task: { description: task.description, priority: task.priority },
    ...(isObject(metadata) ? { metadata } : {}),
  };
}

/**
 * Append-only record of task changes. A `deleted` entry means the task was
 * completed, which is what summaries and reports count.
 */
export class TaskLog {
  private readonly lock = new FileLock();

  constructor(readonly filePath: string) {}

  async entries(): Promise<TaskLogEntry[]> {
    const raw = await readJsonFile(this.filePath, "task log");
    if (!Array.isArray(raw)) return [];
    return raw.map(toLogEntry).filter((entry): entry is TaskLogEntry => entry !== null);
  }

  async append(action: TaskAction, task: TaskItem, now: Date, metadata?: Record<string, unknown>): Promise<TaskLogEntry> {
    const entry: TaskLogEntry = {
      timestamp: now.toISOString(),
      action,
      task: { ...task },
      ...(metadata ? { metadata: { ...metadata } } : {}),
    };

    return this.lock.run(async () => {
      const existing = await this.entries();
      existing.push(entry);
      await writeJsonFileAtomic(this.filePath, existing);
      return entry;
    });
  }

  /** Completed entries whose local date falls within [startDate, endDate]. */
  async completedBetween(startDate: string, endDate: string, timeZone: string): Promise<TaskLogEntry[]> {
    const entries = await this.entries();
    return entries.filter((entry) => {
      if (entry.action !== "deleted") return false;
      const millis = Date.parse(entry.timestamp);
      if (!Number.isFinite(millis)) return false;
      const date = toMoment(new Date(millis), timeZone).date;
      return date >= startDate && date <= endDate;
    });
  }

  async completedOn(date: string, timeZone: string): Promise<TaskItem[]> {
    const entries = await this.completedBetween(date, date, timeZone);
    return entries.map((entry) => entry.task);
  }
}
