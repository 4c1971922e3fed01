import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { devWarn } from "./debug-log.js";

export type JsonReadResult =
  | { status: "ok"; value: unknown }
  | { status: "missing" }
  | { status: "invalid"; reason: string };

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFileError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export async function readJsonDocument(filePath: string): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFileError(err)) return { status: "missing" };
    return { status: "invalid", reason: err instanceof Error ? err.message : String(err) };
  }

  try {
    const value: unknown = JSON.parse(raw);
    return { status: "ok", value };
  } catch (err) {
    return { status: "invalid", reason: err instanceof Error ? err.message : String(err) };
  }
}

/** Lenient read for data files: missing or broken files come back as undefined. */
export async function readJsonFile(filePath: string, fileName: string): Promise<unknown | undefined> {
  const result = await readJsonDocument(filePath);
  if (result.status === "missing") return undefined;
  if (result.status === "invalid") {
    devWarn(`Data file has invalid JSON, ignoring: ${fileName} (${result.reason})`);
    return undefined;
  }
  return result.value;
}

export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp-${randomUUID()}`;
  await writeFile(tmpPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
  await rename(tmpPath, filePath);
}
