import { randomUUID } from "node:crypto";
import { AlertDeliveryError } from "../shared/index.js";
import type { ClientMessage, ClientTransport, PromptKind, ServerMessage } from "../server/index.js";
import type { AlertChannel, AlertOutcome, MultiSelectResult, YesNoAnswer } from "./types.js";

export interface AlertTimings {
  intervalSeconds: number;
  maxDurationSeconds: number;
  promptTimeoutSeconds: number;
  soundFile: string;
}

type PromptReply =
  | { status: "answered"; selected: string[]; answer?: "yes" | "no" }
  | { status: "cancelled" };

/**
 * Alerts and prompts shown by connected terminal clients. An alert rings
 * every `intervalSeconds` until a client acknowledges it or
 * `maxDurationSeconds` passes.
 */
export class TerminalAlertChannel implements AlertChannel {
  private readonly transport: ClientTransport;
  private timings: AlertTimings;
  private readonly openAlerts = new Map<string, () => void>();
  private readonly openPrompts = new Map<string, (reply: PromptReply) => void>();

  constructor(transport: ClientTransport, timings: AlertTimings) {
    this.transport = transport;
    this.timings = { ...timings };
  }

  /** New timings apply to alerts and prompts opened after the call. */
  configure(timings: AlertTimings): void {
    this.timings = { ...timings };
  }

  get pendingAlerts(): number {
    return this.openAlerts.size;
  }

  get pendingPrompts(): number {
    return this.openPrompts.size;
  }

  async alert(title: string, message: string): Promise<AlertOutcome> {
    this.requireClient();
    const alertId = randomUUID();
    const { intervalSeconds, maxDurationSeconds, soundFile } = this.timings;

    return new Promise<AlertOutcome>((resolve) => {
      let attempt = 0;
      const ring = (): void => {
        attempt++;
        this.send({ type: "alert", alertId, title, message, attempt, sound: soundFile });
      };

      const finish = (outcome: AlertOutcome): void => {
        clearInterval(repeat);
        clearTimeout(deadline);
        this.openAlerts.delete(alertId);
        this.send({
          type: "alert_closed",
          alertId,
          reason: outcome === "acknowledged" ? "acknowledged" : "timed_out",
        });
        resolve(outcome);
      };

      ring();
      const repeat = setInterval(ring, intervalSeconds * 1000);
      const deadline = setTimeout(() => finish("timedOut"), maxDurationSeconds * 1000);
      this.openAlerts.set(alertId, () => finish("acknowledged"));
    });
  }

  async promptYesNo(question: string, title: string): Promise<YesNoAnswer> {
    const reply = await this.prompt("yes_no", title, question, ["yes", "no"]);
    if (reply.status === "cancelled") return "cancelled";
    return reply.answer ?? (reply.selected.includes("yes") ? "yes" : "no");
  }

  async promptMultiSelect(options: readonly string[], title: string, prompt: string): Promise<MultiSelectResult> {
    const reply = await this.prompt("multi_select", title, prompt, [...options]);
    if (reply.status === "cancelled") return { status: "cancelled" };
    const allowed = new Set(options);
    return { status: "selected", selected: reply.selected.filter((item) => allowed.has(item)) };
  }

  /** Routes acks and prompt responses; returns false for other messages. */
  handleClientMessage(message: ClientMessage): boolean {
    if (message.type === "ack") {
      this.openAlerts.get(message.alertId)?.();
      return true;
    }

    if (message.type === "prompt_response") {
      const settle = this.openPrompts.get(message.promptId);
      if (!settle) return true;
      if (message.cancelled) {
        settle({ status: "cancelled" });
      } else {
        settle({
          status: "answered",
          selected: message.selected ?? [],
          ...(message.answer ? { answer: message.answer } : {}),
        });
      }
      return true;
    }

    return false;
  }

  private prompt(kind: PromptKind, title: string, prompt: string, options: string[]): Promise<PromptReply> {
    this.requireClient();
    const promptId = randomUUID();

    return new Promise<PromptReply>((resolve) => {
      const settle = (reply: PromptReply): void => {
        clearTimeout(timeout);
        this.openPrompts.delete(promptId);
        this.send({ type: "prompt_closed", promptId });
        resolve(reply);
      };

      const timeout = setTimeout(() => settle({ status: "cancelled" }), this.timings.promptTimeoutSeconds * 1000);
      this.openPrompts.set(promptId, settle);
      this.send({ type: "prompt", promptId, kind, title, prompt, options });
    });
  }

  private requireClient(): void {
    if (this.transport.clientCount() === 0) {
      throw new AlertDeliveryError("no terminal client connected");
    }
  }

  private send(message: ServerMessage): void {
    this.transport.broadcast(message);
  }
}
