import { isObject, readJsonFile, writeJsonFileAtomic } from "../shared/index.js";
import { FileLock } from "./lock.js";
import type { TaskLog } from "./task-log.js";
import type { TaskItem } from "./types.js";

export const URGENT_PRIORITY_THRESHOLD = 7;

export interface AddTaskResult {
  task: TaskItem;
  previousPriority?: number;
}

export interface RemoveTasksResult {
  removed: TaskItem[];
  errors: string[];
}

function toTask(value: unknown): TaskItem | null {
  if (!isObject(value)) return null;
  const { description, priority } = value;
  if (typeof description !== "string" || typeof priority !== "number" || !Number.isFinite(priority)) return null;
  return { description, priority };
}

export function sortByPriority(tasks: readonly TaskItem[]): TaskItem[] {
  return [...tasks].sort((a, b) => b.priority - a.priority);
}

export interface TaskStoreOptions {
  filePath: string;
  log: TaskLog;
  now?: () => Date;
}

export class TaskStore {
  readonly filePath: string;
  private readonly log: TaskLog;
  private readonly nowProvider: () => Date;
  private readonly lock = new FileLock();

  constructor(options: TaskStoreOptions) {
    this.filePath = options.filePath;
    this.log = options.log;
    this.nowProvider = options.now ?? (() => new Date());
  }

  async list(): Promise<TaskItem[]> {
    const raw = await readJsonFile(this.filePath, "tasks");
    if (!Array.isArray(raw)) return [];
    return raw.map(toTask).filter((task): task is TaskItem => task !== null);
  }

  /** Open tasks above the threshold, most important first. */
  async urgent(threshold = URGENT_PRIORITY_THRESHOLD): Promise<TaskItem[]> {
    const tasks = await this.list();
    return sortByPriority(tasks.filter((task) => task.priority > threshold));
  }

  async add(description: string, priority: number): Promise<AddTaskResult> {
    const trimmed = description.trim();
    if (trimmed.length === 0) {
      throw new Error("Task description must not be empty.");
    }
    if (!Number.isInteger(priority) || priority <= 0) {
      throw new Error("Priority must be a positive integer.");
    }

    const task: TaskItem = { description: trimmed, priority };
    const result = await this.lock.run(async () => {
      const tasks = await this.list();
      const index = tasks.findIndex((item) => item.description === trimmed);
      const previous = index >= 0 ? tasks[index] : undefined;
      if (index >= 0) {
        tasks[index] = task;
      } else {
        tasks.push(task);
      }
      await writeJsonFileAtomic(this.filePath, tasks);
      return previous ? { task, previousPriority: previous.priority } : { task };
    });

    if (result.previousPriority === undefined) {
      await this.log.append("added", task, this.nowProvider());
    } else {
      await this.log.append("updated", task, this.nowProvider(), { old_priority: result.previousPriority });
    }
    return result;
  }

  /**
   * Removes tasks by 1-based position in priority order (as listed) or by
   * exact description. Positions refer to the list before any removal.
   */
  async remove(identifiers: readonly string[]): Promise<RemoveTasksResult> {
    const outcome = await this.lock.run(async () => {
      let tasks = await this.list();
      const ordered = sortByPriority(tasks);
      const removed: TaskItem[] = [];
      const errors: string[] = [];

      for (const identifier of identifiers) {
        let description = identifier;
        if (/^\d+$/.test(identifier)) {
          const position = Number(identifier);
          const target = ordered[position - 1];
          if (!target) {
            errors.push(`Invalid task ID: ${position}. Use a number between 1 and ${ordered.length}.`);
            continue;
          }
          description = target.description;
        }

        const matches = tasks.filter((task) => task.description === description);
        if (matches.length === 0) {
          errors.push(`Task '${description}' not found.`);
          continue;
        }
        tasks = tasks.filter((task) => task.description !== description);
        removed.push(...matches);
      }

      if (removed.length > 0) {
        await writeJsonFileAtomic(this.filePath, tasks);
      }
      return { removed, errors };
    });

    for (const task of outcome.removed) {
      await this.log.append("deleted", task, this.nowProvider());
    }
    return outcome;
  }
}
