import { describe, it, expect } from "vitest";
import {
  clampDay,
  dailyRule,
  lastMonthlyOccurrenceOnOrBefore,
  lastWeeklyOccurrenceOnOrBefore,
  monthlyRule,
  parseMonthly,
  parseWeekly,
  weeklyRule,
} from "../../src/schedule/recurrence.js";
import { toMoment } from "../../src/schedule/time.js";
import { InvalidSpecError } from "../../src/shared/errors.js";

const at = (iso: string) => toMoment(new Date(iso), "UTC");

describe("parseWeekly", () => {
  it("reads a weekday and a time", () => {
    expect(parseWeekly("sunday 20:00")).toEqual({ weekday: 7, time: { hour: 20, minute: 0 } });
    expect(parseWeekly("  Fri   18:30 ")).toEqual({ weekday: 5, time: { hour: 18, minute: 30 } });
  });

  it("rejects malformed specs", () => {
    for (const spec of ["sunday", "sunday 20:00 extra", "someday 20:00", "sunday 8pm", ""]) {
      expect(() => parseWeekly(spec)).toThrow(InvalidSpecError);
    }
  });

  it("explains what was wrong", () => {
    expect(() => parseWeekly("someday 20:00")).toThrow("Invalid recurrence 'someday 20:00': unknown weekday 'someday'");
  });
});

describe("parseMonthly", () => {
  it("reads a day of month and a time", () => {
    expect(parseMonthly("1 09:30")).toEqual({ day: 1, time: { hour: 9, minute: 30 } });
    expect(parseMonthly("31 20:00")).toEqual({ day: 31, time: { hour: 20, minute: 0 } });
  });

  it("rejects days outside 1-31 and bad times", () => {
    for (const spec of ["0 09:00", "32 09:00", "x 09:00", "1.5 09:00", "1 9:00", "1"]) {
      expect(() => parseMonthly(spec)).toThrow(InvalidSpecError);
    }
  });
});

describe("clampDay", () => {
  it("falls back to the last day of short months", () => {
    expect(clampDay(31, 2026, 4)).toBe(30);
    expect(clampDay(31, 2026, 2)).toBe(28);
    expect(clampDay(15, 2026, 2)).toBe(15);
  });
});

describe("last occurrence", () => {
  it("finds the most recent weekly occurrence", () => {
    // Monday 2026-10-19 10:00; the last Sunday 20:00 was 2026-10-18.
    const now = { year: 2026, month: 10, day: 19, hour: 10, minute: 0 };
    expect(lastWeeklyOccurrenceOnOrBefore(now, 7, { hour: 20, minute: 0 })).toEqual({
      year: 2026,
      month: 10,
      day: 18,
      hour: 20,
      minute: 0,
    });
  });

  it("steps back a week when today's occurrence is still ahead", () => {
    const now = { year: 2026, month: 10, day: 25, hour: 19, minute: 59 };
    expect(lastWeeklyOccurrenceOnOrBefore(now, 7, { hour: 20, minute: 0 })).toEqual({
      year: 2026,
      month: 10,
      day: 18,
      hour: 20,
      minute: 0,
    });
  });

  it("counts an occurrence at exactly now", () => {
    const now = { year: 2026, month: 10, day: 25, hour: 20, minute: 0 };
    expect(lastWeeklyOccurrenceOnOrBefore(now, 7, { hour: 20, minute: 0 }).day).toBe(25);
  });

  it("steps back a month and clamps the day", () => {
    const now = { year: 2026, month: 3, day: 15, hour: 12, minute: 0 };
    expect(lastMonthlyOccurrenceOnOrBefore(now, 31, { hour: 9, minute: 0 })).toEqual({
      year: 2026,
      month: 2,
      day: 28,
      hour: 9,
      minute: 0,
    });
  });

  it("crosses the year boundary", () => {
    const now = { year: 2026, month: 1, day: 1, hour: 8, minute: 0 };
    expect(lastMonthlyOccurrenceOnOrBefore(now, 1, { hour: 9, minute: 0 })).toEqual({
      year: 2025,
      month: 12,
      day: 1,
      hour: 9,
      minute: 0,
    });
  });
});

describe("rules", () => {
  it("daily rule matches its time and keys by time", () => {
    const rule = dailyRule("daily_summary", "22:00");
    const moment = at("2026-10-19T22:00:00Z");
    expect(rule.isDueAt(moment)).toBe(true);
    expect(rule.isDueAt(at("2026-10-19T22:01:00Z"))).toBe(false);
    expect(rule.compositeKeyFor(moment)).toBe("daily_summary_22:00");
  });

  it("weekly rule needs the weekday and the time", () => {
    const rule = weeklyRule("weekly_review", "sunday 20:00");
    expect(rule.isDueAt(at("2026-10-25T20:00:00Z"))).toBe(true);
    expect(rule.isDueAt(at("2026-10-24T20:00:00Z"))).toBe(false);
    expect(rule.isDueAt(at("2026-10-25T20:01:00Z"))).toBe(false);
    expect(rule.compositeKeyFor(at("2026-10-25T20:00:00Z"))).toBe("weekly_review_2026-10-25");
  });

  it("monthly rule fires on the clamped last day", () => {
    const rule = monthlyRule("monthly_review", "31 20:00");
    expect(rule.isDueAt(at("2026-04-30T20:00:00Z"))).toBe(true);
    expect(rule.isDueAt(at("2026-05-30T20:00:00Z"))).toBe(false);
    expect(rule.isDueAt(at("2026-05-31T20:00:00Z"))).toBe(true);
    expect(rule.compositeKeyFor(at("2026-04-30T20:00:00Z"))).toBe("monthly_review_2026-04");
  });

  it("factories reject bad specs", () => {
    expect(() => dailyRule("daily_summary", "10pm")).toThrow(InvalidSpecError);
    expect(() => weeklyRule("weekly_review", "sunday")).toThrow(InvalidSpecError);
    expect(() => monthlyRule("monthly_review", "40 10:00")).toThrow(InvalidSpecError);
  });
});
