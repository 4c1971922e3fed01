export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export type WeekdayName =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

export type WeekParity = "odd" | "even";

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface LocalDate {
  year: number;
  month: number;
  day: number;
}

export interface LocalDateTime extends LocalDate, TimeOfDay {}

/** Wall-clock reading of an instant in the configured time zone. */
export interface ZonedMoment extends LocalDateTime {
  date: string;
  time: string;
  weekday: Weekday;
  weekdayName: WeekdayName;
}

export interface MessageEntry {
  kind: "message";
  text: string;
}

export interface PointEntry {
  kind: "point";
  key: string;
  text: string;
}

export interface BlockEntry {
  kind: "block";
  blockName: string;
  title: string;
}

export type ScheduleEntry = MessageEntry | PointEntry | BlockEntry;

/** Time key ("HH:MM") to entry. */
export type EffectiveDaySchedule = Record<string, ScheduleEntry>;

export type ScheduleBucket = "common" | WeekdayName;

export type WeekScheduleData = Partial<Record<ScheduleBucket, EffectiveDaySchedule>>;
