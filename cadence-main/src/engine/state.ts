const MIDNIGHT = "00:00";

/**
 * Per-day delivery state. Owned by a single engine; nothing else mutates it.
 */
export class EngineState {
  /** Time keys and periodic composite keys already handled today. */
  readonly firedKeys = new Set<string>();
  /** End time ("HH:MM") to the message shown when it arrives. */
  readonly pendingEndAlarms = new Map<string, string>();

  private currentDay: string | null = null;
  private lastResetDate: string | null = null;

  get day(): string | null {
    return this.currentDay;
  }

  get lastReset(): string | null {
    return this.lastResetDate;
  }

  /**
   * Moves the state to `date` at local `time`. Clears everything the first
   * time a new calendar date is seen and returns true when it did. An end
   * alarm due at 00:00 survives the clear so the midnight tick can still
   * deliver it.
   */
  rollOver(date: string, time: string): boolean {
    if (this.currentDay === null) {
      this.currentDay = date;
      return false;
    }
    if (this.currentDay === date) return false;

    this.currentDay = date;
    if (this.lastResetDate === date) return false;

    const midnightAlarm = time === MIDNIGHT ? this.pendingEndAlarms.get(MIDNIGHT) : undefined;
    this.firedKeys.clear();
    this.pendingEndAlarms.clear();
    if (midnightAlarm !== undefined) {
      this.pendingEndAlarms.set(MIDNIGHT, midnightAlarm);
    }
    this.lastResetDate = date;
    return true;
  }
}
