import { entryLabel } from "../schedule/entries.js";
import { parseTime, toMinuteOfDay } from "../schedule/time.js";
import type { EffectiveDaySchedule, WeekParity, ZonedMoment } from "../schedule/types.js";

export interface StatusEntry {
  time: string;
  label: string;
}

export interface UpcomingEntry extends StatusEntry {
  minutesUntil: number;
}

export interface DayPosition {
  current: StatusEntry | null;
  next: UpcomingEntry | null;
}

export interface DayStatus extends DayPosition {
  date: string;
  time: string;
  weekdayName: string;
  parity: WeekParity;
  skipped: boolean;
  pendingEndAlarms: StatusEntry[];
}

/** The latest entry at or before `moment` and the first one after it. */
export function describeDay(schedule: EffectiveDaySchedule, moment: ZonedMoment): DayPosition {
  const nowMinute = toMinuteOfDay(moment);
  const times = Object.keys(schedule).sort();

  let current: StatusEntry | null = null;
  let next: UpcomingEntry | null = null;
  for (const time of times) {
    const entry = schedule[time];
    if (!entry) continue;
    const minute = toMinuteOfDay(parseTime(time));
    if (minute <= nowMinute) {
      current = { time, label: entryLabel(entry) };
    } else if (!next) {
      next = { time, label: entryLabel(entry), minutesUntil: minute - nowMinute };
    }
  }

  return { current, next };
}

export function formatStatus(status: DayStatus): string {
  const lines = [`${status.weekdayName} ${status.date} ${status.time} (${status.parity} week)`];

  if (status.skipped) {
    lines.push("Today is a skip day. No schedule alerts.");
    return lines.join("\n");
  }

  lines.push(status.current ? `Now: ${status.current.label} (since ${status.current.time})` : "Now: nothing scheduled yet");
  lines.push(
    status.next
      ? `Next: ${status.next.label} at ${status.next.time} (in ${status.next.minutesUntil} min)`
      : "Next: nothing else today",
  );

  for (const alarm of status.pendingEndAlarms) {
    lines.push(`Ends at ${alarm.time}: ${alarm.label}`);
  }
  return lines.join("\n");
}
