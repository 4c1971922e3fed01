import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { AlertTimings } from "../../src/alerts/terminal-channel.js";
import { TerminalAlertChannel } from "../../src/alerts/terminal-channel.js";
import type { ClientTransport, ServerMessage } from "../../src/server/index.js";
import { AlertDeliveryError } from "../../src/shared/errors.js";

class FakeTransport implements ClientTransport {
  readonly sent: ServerMessage[] = [];
  clients = 1;

  broadcast(data: ServerMessage): number {
    this.sent.push(data);
    return this.clients;
  }

  clientCount(): number {
    return this.clients;
  }

  ofType<T extends ServerMessage["type"]>(type: T): Extract<ServerMessage, { type: T }>[] {
    return this.sent.filter((message): message is Extract<ServerMessage, { type: T }> => message.type === type);
  }
}

const TIMINGS: AlertTimings = {
  intervalSeconds: 10,
  maxDurationSeconds: 35,
  promptTimeoutSeconds: 60,
  soundFile: "Glass",
};

let transport: FakeTransport;
let channel: TerminalAlertChannel;

beforeEach(() => {
  vi.useFakeTimers();
  transport = new FakeTransport();
  channel = new TerminalAlertChannel(transport, TIMINGS);
});

afterEach(() => {
  vi.useRealTimers();
});

function lastAlertId(): string {
  return transport.ofType("alert").at(-1)?.alertId ?? "";
}

function lastPromptId(): string {
  return transport.ofType("prompt").at(-1)?.promptId ?? "";
}

describe("TerminalAlertChannel", () => {
  describe("alert", () => {
    it("rings right away and stops on acknowledgement", async () => {
      const outcome = channel.alert("Start", "Focus ⏱ (25min)");

      expect(transport.sent).toEqual([
        {
          type: "alert",
          alertId: lastAlertId(),
          title: "Start",
          message: "Focus ⏱ (25min)",
          attempt: 1,
          sound: "Glass",
        },
      ]);
      expect(channel.pendingAlerts).toBe(1);

      expect(channel.handleClientMessage({ type: "ack", alertId: lastAlertId() })).toBe(true);

      await expect(outcome).resolves.toBe("acknowledged");
      expect(transport.sent.at(-1)).toEqual({ type: "alert_closed", alertId: lastAlertId(), reason: "acknowledged" });
      expect(channel.pendingAlerts).toBe(0);
    });

    it("repeats every interval until the maximum duration", async () => {
      const outcome = channel.alert("Time's up", "Focus finished! Take a break");

      await vi.advanceTimersByTimeAsync(35_000);

      await expect(outcome).resolves.toBe("timedOut");
      expect(transport.ofType("alert").map((message) => message.attempt)).toEqual([1, 2, 3, 4]);
      expect(transport.sent.at(-1)).toEqual({ type: "alert_closed", alertId: lastAlertId(), reason: "timed_out" });

      await vi.advanceTimersByTimeAsync(30_000);
      expect(transport.ofType("alert")).toHaveLength(4);
    });

    it("rejects when no client is connected", async () => {
      transport.clients = 0;

      await expect(channel.alert("Reminder", "Lunch time")).rejects.toBeInstanceOf(AlertDeliveryError);
      expect(transport.sent).toEqual([]);
    });

    it("ignores acks for unknown alerts", () => {
      void channel.alert("Reminder", "Lunch time");

      expect(channel.handleClientMessage({ type: "ack", alertId: "nope" })).toBe(true);
      expect(channel.pendingAlerts).toBe(1);
    });

    it("uses new timings for later alerts", async () => {
      channel.configure({ ...TIMINGS, maxDurationSeconds: 5, soundFile: "Ping" });

      const outcome = channel.alert("Reminder", "Stretch");
      await vi.advanceTimersByTimeAsync(5_000);

      await expect(outcome).resolves.toBe("timedOut");
      expect(transport.ofType("alert")).toHaveLength(1);
      expect(transport.ofType("alert")[0]?.sound).toBe("Ping");
    });
  });

  describe("prompts", () => {
    it("returns the chosen habits, limited to the offered options", async () => {
      const result = channel.promptMultiSelect(["Read", "Exercise"], "Habits", "Which habits did you complete today?");

      expect(transport.sent).toEqual([
        {
          type: "prompt",
          promptId: lastPromptId(),
          kind: "multi_select",
          title: "Habits",
          prompt: "Which habits did you complete today?",
          options: ["Read", "Exercise"],
        },
      ]);

      channel.handleClientMessage({ type: "prompt_response", promptId: lastPromptId(), selected: ["Read", "Sleep"] });

      await expect(result).resolves.toEqual({ status: "selected", selected: ["Read"] });
      expect(transport.sent.at(-1)).toEqual({ type: "prompt_closed", promptId: lastPromptId() });
      expect(channel.pendingPrompts).toBe(0);
    });

    it("reports a cancelled selection", async () => {
      const result = channel.promptMultiSelect(["Read"], "Habits", "Which habits did you complete today?");
      channel.handleClientMessage({ type: "prompt_response", promptId: lastPromptId(), cancelled: true });

      await expect(result).resolves.toEqual({ status: "cancelled" });
    });

    it("cancels after the prompt timeout", async () => {
      const result = channel.promptYesNo("Start the review now?", "Weekly review");

      await vi.advanceTimersByTimeAsync(60_000);

      await expect(result).resolves.toBe("cancelled");
      expect(transport.sent.at(-1)).toEqual({ type: "prompt_closed", promptId: lastPromptId() });
    });

    it("reads a yes/no answer from either field", async () => {
      const explicit = channel.promptYesNo("Start the review now?", "Weekly review");
      channel.handleClientMessage({ type: "prompt_response", promptId: lastPromptId(), answer: "no" });
      await expect(explicit).resolves.toBe("no");

      const selected = channel.promptYesNo("Start the review now?", "Weekly review");
      channel.handleClientMessage({ type: "prompt_response", promptId: lastPromptId(), selected: ["yes"] });
      await expect(selected).resolves.toBe("yes");
    });

    it("rejects when no client is connected", async () => {
      transport.clients = 0;

      await expect(channel.promptMultiSelect(["Read"], "Habits", "?")).rejects.toBeInstanceOf(AlertDeliveryError);
    });
  });

  it("leaves commands to the caller", () => {
    expect(channel.handleClientMessage({ type: "command", name: "tasks", args: [] })).toBe(false);
  });
});
