import { describe, it, expect } from "vitest";
import {
  addMinutes,
  daysBetween,
  daysInMonth,
  formatTime,
  isValidTime,
  isoWeekNumber,
  parseDateLabel,
  parseTime,
  parseWeekday,
  shiftDate,
  toMoment,
  weekParity,
  weekdayOf,
} from "../../src/schedule/time.js";
import { InvalidFormatError } from "../../src/shared/errors.js";

describe("parseTime", () => {
  it("parses zero-padded HH:MM", () => {
    expect(parseTime("09:05")).toEqual({ hour: 9, minute: 5 });
    expect(parseTime("00:00")).toEqual({ hour: 0, minute: 0 });
    expect(parseTime("23:59")).toEqual({ hour: 23, minute: 59 });
  });

  it("rejects anything else", () => {
    for (const value of ["9:05", "09:5", "24:00", "12:60", "0900", "09:00:00", " 09:00", "ab:cd", ""]) {
      expect(() => parseTime(value)).toThrow(InvalidFormatError);
    }
  });

  it("names the bad value in the error", () => {
    expect(() => parseTime("25:00")).toThrow("Invalid time '25:00', expected HH:MM");
  });

  it("reports validity without throwing", () => {
    expect(isValidTime("07:30")).toBe(true);
    expect(isValidTime("7:30")).toBe(false);
  });
});

describe("formatTime", () => {
  it("pads both fields", () => {
    expect(formatTime({ hour: 7, minute: 3 })).toBe("07:03");
  });
});

describe("addMinutes", () => {
  it("adds within the day", () => {
    expect(addMinutes("09:00", 25)).toBe("09:25");
    expect(addMinutes("09:50", 25)).toBe("10:15");
  });

  it("wraps past midnight", () => {
    expect(addMinutes("23:50", 30)).toBe("00:20");
    expect(addMinutes("12:00", 1440)).toBe("12:00");
  });

  it("rejects negative or fractional minutes", () => {
    expect(() => addMinutes("09:00", -5)).toThrow(InvalidFormatError);
    expect(() => addMinutes("09:00", 1.5)).toThrow(InvalidFormatError);
  });
});

describe("calendar helpers", () => {
  it("knows weekdays and month lengths", () => {
    expect(weekdayOf({ year: 2026, month: 10, day: 19 })).toBe(1);
    expect(weekdayOf({ year: 2026, month: 10, day: 25 })).toBe(7);
    expect(daysInMonth(2026, 2)).toBe(28);
    expect(daysInMonth(2028, 2)).toBe(29);
    expect(daysInMonth(2026, 4)).toBe(30);
  });

  it("shifts dates across month and year boundaries", () => {
    expect(shiftDate({ year: 2026, month: 2, day: 28 }, 1)).toEqual({ year: 2026, month: 3, day: 1 });
    expect(shiftDate({ year: 2027, month: 1, day: 1 }, -1)).toEqual({ year: 2026, month: 12, day: 31 });
    expect(daysBetween({ year: 2026, month: 10, day: 19 }, { year: 2026, month: 10, day: 22 })).toBe(3);
    expect(daysBetween({ year: 2026, month: 10, day: 19 }, { year: 2026, month: 10, day: 17 })).toBe(-2);
  });

  it("parses date labels and rejects impossible dates", () => {
    expect(parseDateLabel("2026-10-19")).toEqual({ year: 2026, month: 10, day: 19 });
    expect(parseDateLabel("2026-02-30")).toBeNull();
    expect(parseDateLabel("2026-13-01")).toBeNull();
    expect(parseDateLabel("10/19/2026")).toBeNull();
  });

  it("accepts weekday names and abbreviations", () => {
    expect(parseWeekday("Sunday")).toBe(7);
    expect(parseWeekday("thurs")).toBe(4);
    expect(parseWeekday("tue")).toBe(2);
    expect(parseWeekday("funday")).toBeUndefined();
    expect(parseWeekday("constructor")).toBeUndefined();
  });
});

describe("week parity", () => {
  it("uses ISO week numbers", () => {
    expect(isoWeekNumber({ year: 2026, month: 1, day: 1 })).toBe(1);
    expect(isoWeekNumber({ year: 2027, month: 1, day: 1 })).toBe(53);
    expect(isoWeekNumber({ year: 2026, month: 10, day: 19 })).toBe(43);
  });

  it("maps odd ISO weeks to odd", () => {
    expect(weekParity({ year: 2026, month: 10, day: 19 })).toBe("odd");
    expect(weekParity({ year: 2026, month: 10, day: 26 })).toBe("even");
    expect(weekParity({ year: 2026, month: 10, day: 25 })).toBe("odd");
  });
});

describe("toMoment", () => {
  it("reads the wall clock in the given zone", () => {
    const moment = toMoment(new Date("2026-10-19T07:30:00Z"), "Europe/Berlin");
    expect(moment.date).toBe("2026-10-19");
    expect(moment.time).toBe("09:30");
    expect(moment.weekday).toBe(1);
    expect(moment.weekdayName).toBe("monday");
  });

  it("rolls the date in zones behind UTC", () => {
    const moment = toMoment(new Date("2026-10-19T02:00:00Z"), "America/New_York");
    expect(moment.date).toBe("2026-10-18");
    expect(moment.time).toBe("22:00");
    expect(moment.weekdayName).toBe("sunday");
  });
});
