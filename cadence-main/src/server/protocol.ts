import { isObject } from "../shared/index.js";

// ── Server → client ────────────────────────────────────────────────

export interface AlertMessage {
  type: "alert";
  alertId: string;
  title: string;
  message: string;
  attempt: number;
  sound: string;
}

export interface AlertClosedMessage {
  type: "alert_closed";
  alertId: string;
  reason: "acknowledged" | "timed_out";
}

export type PromptKind = "multi_select" | "yes_no";

export interface PromptMessage {
  type: "prompt";
  promptId: string;
  kind: PromptKind;
  title: string;
  prompt: string;
  options: string[];
}

export interface PromptClosedMessage {
  type: "prompt_closed";
  promptId: string;
}

export interface ReplyMessage {
  type: "reply";
  content: string;
}

export interface ErrorMessage {
  type: "error";
  content: string;
}

export type ServerMessage =
  | AlertMessage
  | AlertClosedMessage
  | PromptMessage
  | PromptClosedMessage
  | ReplyMessage
  | ErrorMessage;

// ── Client → server ────────────────────────────────────────────────

export interface AckMessage {
  type: "ack";
  alertId: string;
}

export interface PromptResponseMessage {
  type: "prompt_response";
  promptId: string;
  selected?: string[];
  answer?: "yes" | "no";
  cancelled?: boolean;
}

export interface CommandMessage {
  type: "command";
  name: string;
  args: string[];
}

export type ClientMessage = AckMessage | PromptResponseMessage | CommandMessage;

function stringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

export function parseClientMessage(data: unknown): ClientMessage | null {
  if (!isObject(data)) return null;

  switch (data["type"]) {
    case "ack": {
      const alertId = data["alertId"];
      return typeof alertId === "string" ? { type: "ack", alertId } : null;
    }
    case "prompt_response": {
      const promptId = data["promptId"];
      if (typeof promptId !== "string") return null;
      const answer = data["answer"];
      const selected = stringArray(data["selected"]);
      return {
        type: "prompt_response",
        promptId,
        ...(selected ? { selected } : {}),
        ...(answer === "yes" || answer === "no" ? { answer } : {}),
        ...(data["cancelled"] === true ? { cancelled: true } : {}),
      };
    }
    case "command": {
      const name = data["name"];
      if (typeof name !== "string" || name.trim().length === 0) return null;
      return { type: "command", name: name.trim(), args: stringArray(data["args"]) ?? [] };
    }
    default:
      return null;
  }
}
