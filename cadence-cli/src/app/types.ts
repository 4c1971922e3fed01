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

export interface PromptMessage {
  type: "prompt";
  promptId: string;
  kind: "multi_select" | "yes_no";
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

export interface AckRequest {
  type: "ack";
  alertId: string;
}

export interface PromptResponseRequest {
  type: "prompt_response";
  promptId: string;
  selected?: string[];
  answer?: "yes" | "no";
  cancelled?: boolean;
}

export interface CommandRequest {
  type: "command";
  name: string;
  args: string[];
}

export type ClientRequest = AckRequest | PromptResponseRequest | CommandRequest;

// ── Feed ───────────────────────────────────────────────────────────

export type FeedItem = {
  id: string;
  kind: "alert" | "reply" | "error" | "you" | "info";
  title?: string;
  content: string;
  timestamp: number;
};
