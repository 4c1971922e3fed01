import { unwatchFile, watchFile } from "node:fs";
import type { ConfigFiles } from "./paths.js";

const WATCH_INTERVAL_MS = 2000;

let watched: string[] = [];

export function startConfigWatcher(files: ConfigFiles, onChange: (filePath: string) => void): void {
  stopConfigWatcher();
  watched = [files.settings, files.oddWeeks, files.evenWeeks];
  for (const filePath of watched) {
    watchFile(filePath, { interval: WATCH_INTERVAL_MS }, (current, previous) => {
      if (current.mtimeMs === previous.mtimeMs) return;
      onChange(filePath);
    });
  }
}

export function stopConfigWatcher(): void {
  for (const filePath of watched) {
    unwatchFile(filePath);
  }
  watched = [];
}
