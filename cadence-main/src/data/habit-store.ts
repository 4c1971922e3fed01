import { isObject, readJsonFile, writeJsonFileAtomic } from "../shared/index.js";
import { FileLock } from "./lock.js";
import type { HabitDefinition, HabitRecord } from "./types.js";

function compareIds(a: string, b: string): number {
  const left = Number(a);
  const right = Number(b);
  if (Number.isFinite(left) && Number.isFinite(right)) return left - right;
  return a.localeCompare(b);
}

/**
 * Reads `{habits: {id: name}}`. Entries written the other way round
 * (`{name: id}` with a numeric id) are accepted too.
 */
export function parseHabitDefinitions(raw: unknown): HabitDefinition[] {
  if (!isObject(raw) || !isObject(raw["habits"])) return [];
  const habits: HabitDefinition[] = [];
  for (const [key, value] of Object.entries(raw["habits"])) {
    if (typeof value === "number") {
      habits.push({ id: String(value), name: key });
    } else if (typeof value === "string") {
      habits.push({ id: key, name: value });
    }
  }
  return habits.sort((a, b) => compareIds(a.id, b.id));
}

function toRecord(value: unknown): HabitRecord | null {
  if (!isObject(value)) return null;
  const { date, completed, timestamp } = value;
  if (typeof date !== "string" || !isObject(completed)) return null;
  const names: Record<string, string> = {};
  for (const [id, name] of Object.entries(completed)) {
    if (typeof name === "string") names[id] = name;
  }
  return { date, completed: names, timestamp: typeof timestamp === "string" ? timestamp : "" };
}

export interface HabitStoreOptions {
  habitsPath: string;
  recordsPath: string;
}

export class HabitStore {
  readonly habitsPath: string;
  readonly recordsPath: string;
  private readonly lock = new FileLock();

  constructor(options: HabitStoreOptions) {
    this.habitsPath = options.habitsPath;
    this.recordsPath = options.recordsPath;
  }

  async habits(): Promise<HabitDefinition[]> {
    return parseHabitDefinitions(await readJsonFile(this.habitsPath, "habits"));
  }

  async records(): Promise<HabitRecord[]> {
    const raw = await readJsonFile(this.recordsPath, "habit records");
    if (!Array.isArray(raw)) return [];
    return raw.map(toRecord).filter((record): record is HabitRecord => record !== null);
  }

  /**
   * Stores the habits completed on `date`, replacing an earlier record for
   * the same date. Names that are not configured habits are ignored.
   */
  async saveRecord(date: string, selectedNames: readonly string[], timestamp: Date): Promise<HabitRecord> {
    const habits = await this.habits();
    const selected = new Set(selectedNames);
    const completed: Record<string, string> = {};
    for (const habit of habits) {
      if (selected.has(habit.name)) completed[habit.id] = habit.name;
    }

    const record: HabitRecord = { date, completed, timestamp: timestamp.toISOString() };
    await this.lock.run(async () => {
      const records = await this.records();
      const index = records.findIndex((existing) => existing.date === date);
      if (index >= 0) {
        records[index] = record;
      } else {
        records.push(record);
      }
      await writeJsonFileAtomic(this.recordsPath, records);
    });
    return record;
  }
}
