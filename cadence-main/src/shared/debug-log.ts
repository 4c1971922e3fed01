/**
 * Color-coded console logger for the daemon.
 *
 * Every line carries a [CADENCE] prefix and a level tag so the output of a
 * long-running daemon can be filtered with:
 *
 *   grep "\[CADENCE\].*WARN"
 *
 * Scoped loggers add a module label after the level, e.g. `engine`.
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const DIM = "\x1b[2m";

const PREFIX = `${MAGENTA}[CADENCE]${RESET}`;

function stamp(): string {
  return `${DIM}${new Date().toISOString().slice(11, 19)}${RESET}`;
}

export function devLog(...args: unknown[]): void {
  console.log(PREFIX, stamp(), `${CYAN}INFO${RESET}`, ...args);
}

export function devWarn(...args: unknown[]): void {
  console.log(PREFIX, stamp(), `${YELLOW}WARN${RESET}`, ...args);
}

export function devError(...args: unknown[]): void {
  console.log(PREFIX, stamp(), `${RED}ERROR${RESET}`, ...args);
}

export interface ScopedLogger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createScopedLogger(scope: string): ScopedLogger {
  const label = `${DIM}${scope}${RESET}`;

  return {
    info: (...args) => devLog(label, ...args),
    warn: (...args) => devWarn(label, ...args),
    error: (...args) => devError(label, ...args),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
