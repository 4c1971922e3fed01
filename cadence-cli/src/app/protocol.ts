import type { ServerMessage } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" ? value : undefined;
}

export function parseServerMessage(data: unknown): ServerMessage | null {
  if (!isRecord(data)) return null;

  const type = data["type"];
  switch (type) {
    case "alert": {
      const alertId = str(data, "alertId");
      if (!alertId) return null;
      const attempt = data["attempt"];
      return {
        type: "alert",
        alertId,
        title: str(data, "title") ?? "",
        message: str(data, "message") ?? "",
        attempt: typeof attempt === "number" ? attempt : 1,
        sound: str(data, "sound") ?? "",
      };
    }
    case "alert_closed": {
      const alertId = str(data, "alertId");
      if (!alertId) return null;
      return { type: "alert_closed", alertId, reason: data["reason"] === "timed_out" ? "timed_out" : "acknowledged" };
    }
    case "prompt": {
      const promptId = str(data, "promptId");
      const kind = data["kind"];
      if (!promptId || (kind !== "multi_select" && kind !== "yes_no")) return null;
      const options = Array.isArray(data["options"])
        ? data["options"].filter((item): item is string => typeof item === "string")
        : [];
      return {
        type: "prompt",
        promptId,
        kind,
        title: str(data, "title") ?? "",
        prompt: str(data, "prompt") ?? "",
        options,
      };
    }
    case "prompt_closed": {
      const promptId = str(data, "promptId");
      return promptId ? { type: "prompt_closed", promptId } : null;
    }
    case "reply":
    case "error": {
      const content = str(data, "content");
      if (content === undefined) return null;
      return type === "reply" ? { type: "reply", content } : { type: "error", content };
    }
    default:
      return null;
  }
}

/** Splits "/add 5 write docs" into a command name and its arguments. */
export function parseCommandLine(input: string): { name: string; args: string[] } | null {
  const trimmed = input.trim();
  if (!trimmed.startsWith("/")) return null;
  const [name, ...args] = trimmed.slice(1).split(/\s+/);
  if (!name) return null;
  return { name: name.toLowerCase(), args };
}

/** Host and port of a daemon URL, for display. */
export function describeTarget(url: string): string {
  const match = /^wss?:\/\/([^/?#]+)/.exec(url.trim());
  return match?.[1] ?? url;
}
