import type { ScheduleConfig } from "../config/settings.js";
import { isObject } from "../shared/io.js";
import type { ScheduleEntry } from "./types.js";

type EntryLookup = Pick<ScheduleConfig, "blocks" | "points">;

/**
 * Turns a raw schedule value into a tagged entry. Bare strings are matched
 * against block names first, then point keys, and otherwise kept as message
 * text. Returns null for values that are neither.
 */
export function resolveEntry(raw: unknown, lookup: EntryLookup): ScheduleEntry | null {
  if (typeof raw === "string") {
    if (lookup.blocks.has(raw)) {
      return { kind: "block", blockName: raw, title: raw };
    }
    const pointText = lookup.points.get(raw);
    if (pointText !== undefined) {
      return { kind: "point", key: raw, text: pointText };
    }
    return { kind: "message", text: raw };
  }

  if (isObject(raw) && typeof raw["block"] === "string") {
    const blockName = raw["block"];
    const title = typeof raw["title"] === "string" && raw["title"].trim().length > 0 ? raw["title"] : blockName;
    return { kind: "block", blockName, title };
  }

  return null;
}

export function entryLabel(entry: ScheduleEntry): string {
  switch (entry.kind) {
    case "block":
      return entry.title;
    case "point":
      return entry.text;
    case "message":
      return entry.text;
  }
}
