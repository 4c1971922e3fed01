import { homedir } from "node:os";
import { dirname, isAbsolute, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const thisDir = dirname(fileURLToPath(import.meta.url));
const projectRoot = resolve(thisDir, "..", "..");
const DEFAULT_CONFIG_DIR = resolve(projectRoot, "config");

const CONFIG_DIR_ENV = "CADENCE_CONFIG_DIR";

export interface ConfigFiles {
  settings: string;
  oddWeeks: string;
  evenWeeks: string;
}

export function resolveConfigDir(): string {
  const fromEnv = process.env[CONFIG_DIR_ENV]?.trim();
  if (fromEnv && fromEnv.length > 0) {
    return resolve(expandHome(fromEnv));
  }
  return DEFAULT_CONFIG_DIR;
}

export function configFiles(configDir: string): ConfigFiles {
  return {
    settings: resolve(configDir, "settings.json"),
    oddWeeks: resolve(configDir, "odd_weeks.json"),
    evenWeeks: resolve(configDir, "even_weeks.json"),
  };
}

export function expandHome(value: string): string {
  if (value === "~") return homedir();
  if (value.startsWith("~/")) return resolve(homedir(), value.slice(2));
  return value.replace(/\$HOME\b/g, homedir());
}

/** Absolute paths pass through; relative ones hang off the config root. */
export function resolveDataPath(configDir: string, value: string): string {
  const expanded = expandHome(value.trim());
  return isAbsolute(expanded) ? expanded : resolve(configDir, expanded);
}
