import { describe, expect, it } from "vitest";
import { EngineState } from "../../src/engine/state.js";

describe("EngineState.rollOver", () => {
  it("adopts the first date without resetting", () => {
    const state = new EngineState();

    expect(state.rollOver("2026-10-19", "14:32")).toBe(false);
    expect(state.day).toBe("2026-10-19");
    expect(state.lastReset).toBeNull();
  });

  it("clears keys and alarms once per new date", () => {
    const state = new EngineState();
    state.rollOver("2026-10-19", "09:00");
    state.firedKeys.add("09:00");
    state.pendingEndAlarms.set("09:25", "Focus finished! Take a break");

    expect(state.rollOver("2026-10-19", "10:00")).toBe(false);
    expect(state.firedKeys.has("09:00")).toBe(true);

    expect(state.rollOver("2026-10-20", "00:01")).toBe(true);
    expect(state.day).toBe("2026-10-20");
    expect(state.lastReset).toBe("2026-10-20");
    expect(state.firedKeys.size).toBe(0);
    expect(state.pendingEndAlarms.size).toBe(0);

    state.firedKeys.add("00:01");
    expect(state.rollOver("2026-10-20", "00:02")).toBe(false);
    expect(state.firedKeys.has("00:01")).toBe(true);
  });

  it("keeps the alarm due at midnight through the reset", () => {
    const state = new EngineState();
    state.rollOver("2026-10-19", "23:00");
    state.firedKeys.add("23:00");
    state.pendingEndAlarms.set("00:00", "deep finished! Take a break");
    state.pendingEndAlarms.set("00:15", "pomodoro finished! Take a break");

    expect(state.rollOver("2026-10-20", "00:00")).toBe(true);
    expect([...state.firedKeys]).toEqual([]);
    expect([...state.pendingEndAlarms]).toEqual([["00:00", "deep finished! Take a break"]]);
  });

  it("drops a midnight alarm when the first tick of the day comes later", () => {
    const state = new EngineState();
    state.rollOver("2026-10-19", "23:00");
    state.pendingEndAlarms.set("00:00", "deep finished! Take a break");

    expect(state.rollOver("2026-10-20", "00:03")).toBe(true);
    expect(state.pendingEndAlarms.size).toBe(0);
  });
});
