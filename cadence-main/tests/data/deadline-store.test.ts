import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DeadlineStore, resolveDeadlineDate } from "../../src/data/deadline-store.js";

const TODAY = { year: 2026, month: 10, day: 19 };
const ADDED = new Date("2026-10-19T09:00:00.000Z");

let tempDir = "";
let store: DeadlineStore;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "cadence-deadlines-test-"));
  store = new DeadlineStore(join(tempDir, "deadlines.json"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("resolveDeadlineDate", () => {
  it("places M.D dates in this year until they pass", () => {
    expect(resolveDeadlineDate("10.19", TODAY)).toBe("2026-10-19");
    expect(resolveDeadlineDate("12.1", TODAY)).toBe("2026-12-01");
    expect(resolveDeadlineDate("7.4", TODAY)).toBe("2027-07-04");
  });

  it("accepts full dates and rejects impossible ones", () => {
    expect(resolveDeadlineDate(" 2027-02-28 ", TODAY)).toBe("2027-02-28");
    expect(resolveDeadlineDate("2.30", TODAY)).toBeNull();
    expect(resolveDeadlineDate("2027-13-01", TODAY)).toBeNull();
    expect(resolveDeadlineDate("next friday", TODAY)).toBeNull();
  });
});

describe("DeadlineStore", () => {
  it("keeps deadlines sorted by date, then name", async () => {
    await store.add("Taxes", "12.1", TODAY, ADDED);
    await store.add("Visa", "10.21", TODAY, ADDED);
    await store.add("Rent", "10.21", TODAY, ADDED);

    expect((await store.list()).map((item) => `${item.deadline} ${item.event}`)).toEqual([
      "2026-10-21 Rent",
      "2026-10-21 Visa",
      "2026-12-01 Taxes",
    ]);
  });

  it("replaces an existing event", async () => {
    await store.add("Visa", "10.21", TODAY, ADDED);
    const item = await store.add("Visa", "2026-11-02", TODAY, ADDED);

    expect(item).toEqual({ event: "Visa", deadline: "2026-11-02", added: "2026-10-19T09:00:00.000Z" });
    expect(await store.list()).toEqual([item]);
  });

  it("explains an unreadable date", async () => {
    await expect(store.add("Visa", "soon", TODAY)).rejects.toThrow(
      "Invalid date 'soon'. Use M.D (e.g. 7.4) or YYYY-MM-DD.",
    );
  });

  it("removes by event name", async () => {
    await store.add("Visa", "10.21", TODAY, ADDED);

    expect(await store.remove("Visa")).toBe(true);
    expect(await store.remove("Visa")).toBe(false);
    expect(await store.list()).toEqual([]);
  });

  it("lists urgent deadlines, overdue first", async () => {
    await store.add("Overdue", "2026-10-17", TODAY, ADDED);
    await store.add("Today", "10.19", TODAY, ADDED);
    await store.add("Edge", "10.22", TODAY, ADDED);
    await store.add("Later", "10.23", TODAY, ADDED);

    const urgent = await store.urgent(TODAY);
    expect(urgent.map((item) => [item.event, item.daysLeft])).toEqual([
      ["Overdue", -2],
      ["Today", 0],
      ["Edge", 3],
    ]);
    expect((await store.urgent(TODAY, 4)).map((item) => item.event)).toEqual(["Overdue", "Today", "Edge", "Later"]);
  });
});
