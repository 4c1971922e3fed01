import { isObject, readJsonFile, writeJsonFileAtomic } from "../shared/index.js";
import { daysBetween, parseDateLabel, toDateLabel } from "../schedule/time.js";
import type { LocalDate } from "../schedule/types.js";
import { FileLock } from "./lock.js";
import type { DeadlineItem, UrgentDeadline } from "./types.js";

export const DEFAULT_URGENT_WINDOW_DAYS = 3;

function toDeadline(value: unknown): DeadlineItem | null {
  if (!isObject(value)) return null;
  const { event, deadline, added } = value;
  if (typeof event !== "string" || typeof deadline !== "string") return null;
  if (!parseDateLabel(deadline)) return null;
  return { event, deadline, added: typeof added === "string" ? added : "" };
}

function compareDeadlines(a: DeadlineItem, b: DeadlineItem): number {
  if (a.deadline !== b.deadline) return a.deadline < b.deadline ? -1 : 1;
  return a.event.localeCompare(b.event);
}

/**
 * Accepts "M.D" (this year, or next year once the date has passed) and
 * "YYYY-MM-DD". Returns null for anything else, including impossible dates.
 */
export function resolveDeadlineDate(input: string, today: LocalDate): string | null {
  const trimmed = input.trim();
  const short = /^(\d{1,2})\.(\d{1,2})$/.exec(trimmed);
  if (short) {
    const month = Number(short[1] ?? "");
    const day = Number(short[2] ?? "");
    const thisYear = toDateLabel({ year: today.year, month, day });
    if (!parseDateLabel(thisYear)) return null;
    if (thisYear >= toDateLabel(today)) return thisYear;
    const nextYear = toDateLabel({ year: today.year + 1, month, day });
    return parseDateLabel(nextYear) ? nextYear : null;
  }

  return parseDateLabel(trimmed) ? trimmed : null;
}

export class DeadlineStore {
  private readonly lock = new FileLock();

  constructor(readonly filePath: string) {}

  async list(): Promise<DeadlineItem[]> {
    const raw = await readJsonFile(this.filePath, "deadlines");
    if (!Array.isArray(raw)) return [];
    return raw
      .map(toDeadline)
      .filter((item): item is DeadlineItem => item !== null)
      .sort(compareDeadlines);
  }

  async add(event: string, dateInput: string, today: LocalDate, now: Date = new Date()): Promise<DeadlineItem> {
    const name = event.trim();
    if (name.length === 0) {
      throw new Error("Deadline event must not be empty.");
    }
    const deadline = resolveDeadlineDate(dateInput, today);
    if (!deadline) {
      throw new Error(`Invalid date '${dateInput}'. Use M.D (e.g. 7.4) or YYYY-MM-DD.`);
    }

    const item: DeadlineItem = { event: name, deadline, added: now.toISOString() };
    await this.lock.run(async () => {
      const items = (await this.list()).filter((existing) => existing.event !== name);
      items.push(item);
      await writeJsonFileAtomic(this.filePath, items.sort(compareDeadlines));
    });
    return item;
  }

  /** Returns false when no deadline had that event name. */
  async remove(event: string): Promise<boolean> {
    const name = event.trim();
    return this.lock.run(async () => {
      const items = await this.list();
      const kept = items.filter((item) => item.event !== name);
      if (kept.length === items.length) return false;
      await writeJsonFileAtomic(this.filePath, kept);
      return true;
    });
  }

  /** Deadlines due within `withinDays` of `today`, overdue ones included. */
  async urgent(today: LocalDate, withinDays = DEFAULT_URGENT_WINDOW_DAYS): Promise<UrgentDeadline[]> {
    const items = await this.list();
    const urgent: UrgentDeadline[] = [];
    for (const item of items) {
      const date = parseDateLabel(item.deadline);
      if (!date) continue;
      const daysLeft = daysBetween(today, date);
      if (daysLeft <= withinDays) {
        urgent.push({ ...item, daysLeft });
      }
    }

    return urgent.sort((a, b) => a.daysLeft - b.daysLeft || compareDeadlines(a, b));
  }
}
