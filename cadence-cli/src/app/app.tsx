import React, { useState, useCallback, useEffect } from "react";
import { Box } from "ink";
import { Header } from "./components/header.js";
import { Feed } from "./components/feed.js";
import { CommandInput } from "./components/command-input.js";
import { StatusBar } from "./components/status-bar.js";
import type { StatusMode } from "./components/status-bar.js";
import { AlertBanner } from "./components/alert-banner.js";
import { HabitPicker } from "./components/habit-picker.js";
import { YesNoPrompt } from "./components/yes-no-prompt.js";
import { resolveServerUrl, useWebSocket } from "./hooks/use-websocket.js";
import { describeTarget, parseCommandLine } from "./protocol.js";
import type { AlertMessage, FeedItem, PromptMessage, ServerMessage } from "./types.js";

const HEADER_HEIGHT = 3;
const STATUS_HEIGHT = 1;
const INPUT_HEIGHT = 3;
const RESERVED_ROWS = HEADER_HEIGHT + STATUS_HEIGHT + INPUT_HEIGHT;
const MIN_TERMINAL_ROWS = 10;
const MIN_FEED_ROWS = 3;
const MIN_TERMINAL_COLUMNS = 20;
const BELL = "\u0007";

let nextId = 1;

function createItem(kind: FeedItem["kind"], content: string, title?: string): FeedItem {
  return {
    id: String(nextId++),
    kind,
    content,
    timestamp: Date.now(),
    ...(title ? { title } : {}),
  };
}

function overlayRows(alert: AlertMessage | undefined, prompt: PromptMessage | null): number {
  if (prompt) return prompt.options.length + 4;
  if (alert) return alert.message.split(/\r?\n/).length + 4;
  return 0;
}

export function App(): React.JSX.Element {
  const [items, setItems] = useState<FeedItem[]>([]);
  const [inputValue, setInputValue] = useState("");
  const [alerts, setAlerts] = useState<AlertMessage[]>([]);
  const [prompt, setPrompt] = useState<PromptMessage | null>(null);
  const [terminalRows, setTerminalRows] = useState(
    Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS),
  );
  const [terminalColumns, setTerminalColumns] = useState(
    Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS),
  );

  useEffect(() => {
    const handleResize = (): void => {
      setTerminalRows(Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS));
      setTerminalColumns(Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS));
    };

    process.stdout.on("resize", handleResize);
    return () => {
      process.stdout.off("resize", handleResize);
    };
  }, []);

  const pushItem = useCallback((item: FeedItem) => {
    setItems((prev) => [...prev, item]);
  }, []);

  const onMessage = useCallback(
    (msg: ServerMessage) => {
      switch (msg.type) {
        case "alert": {
          const alert = msg;
          process.stdout.write(BELL);
          if (alert.attempt === 1) pushItem(createItem("alert", alert.message, alert.title));
          setAlerts((prev) =>
            prev.some((entry) => entry.alertId === alert.alertId)
              ? prev.map((entry) => (entry.alertId === alert.alertId ? alert : entry))
              : [...prev, alert],
          );
          return;
        }
        case "alert_closed": {
          const { alertId, reason } = msg;
          setAlerts((prev) => prev.filter((entry) => entry.alertId !== alertId));
          if (reason === "timed_out") pushItem(createItem("info", "An alert timed out without being dismissed."));
          return;
        }
        case "prompt":
          process.stdout.write(BELL);
          setPrompt(msg);
          return;
        case "prompt_closed": {
          const { promptId } = msg;
          setPrompt((current) => (current?.promptId === promptId ? null : current));
          return;
        }
        case "reply":
          pushItem(createItem("reply", msg.content));
          return;
        case "error":
          pushItem(createItem("error", msg.content));
          return;
      }
    },
    [pushItem],
  );

  const [serverUrl] = useState(resolveServerUrl);
  const { send, connected } = useWebSocket({ onMessage, url: serverUrl });

  const activeAlert = alerts[0];

  const dismissAlert = useCallback(
    (alertId: string) => {
      send({ type: "ack", alertId });
      setAlerts((prev) => prev.filter((entry) => entry.alertId !== alertId));
    },
    [send],
  );

  const answerPrompt = useCallback(
    (response: { selected?: string[]; answer?: "yes" | "no"; cancelled?: boolean }) => {
      if (!prompt) return;
      send({ type: "prompt_response", promptId: prompt.promptId, ...response });
      if (response.cancelled) {
        pushItem(createItem("info", `${prompt.title}: cancelled`));
      } else if (response.selected) {
        pushItem(createItem("you", response.selected.length > 0 ? response.selected.join(", ") : "(none)", prompt.title));
      } else if (response.answer) {
        pushItem(createItem("you", response.answer, prompt.title));
      }
      setPrompt(null);
    },
    [prompt, pushItem, send],
  );

  const handleSubmit = useCallback(
    (value: string) => {
      const trimmed = value.trim();
      if (!trimmed) return;
      setInputValue("");

      const command = parseCommandLine(trimmed);
      if (!command) {
        pushItem(createItem("info", "Commands start with '/'. Try /help."));
        return;
      }
      if (command.name === "clear") {
        setItems([]);
        return;
      }
      pushItem(createItem("you", trimmed));
      if (!connected) {
        pushItem(createItem("info", "Not connected to the daemon; command not sent."));
        return;
      }
      send({ type: "command", name: command.name, args: command.args });
    },
    [pushItem, send, connected],
  );

  const mode: StatusMode = prompt ? (prompt.kind === "yes_no" ? "yes_no" : "habits") : activeAlert ? "alert" : "input";
  const feedHeight = Math.max(
    MIN_FEED_ROWS,
    terminalRows - RESERVED_ROWS - overlayRows(activeAlert, prompt),
  );

  return (
    <Box flexDirection="column" height={terminalRows}>
      <Header target={describeTarget(serverUrl)} connected={connected} />
      <Feed items={items} height={feedHeight} width={terminalColumns - 2} scrollEnabled={mode === "input"} />
      {prompt?.kind === "multi_select" ? (
        <HabitPicker
          key={prompt.promptId}
          prompt={prompt}
          onSubmit={(selected) => answerPrompt({ selected })}
          onCancel={() => answerPrompt({ cancelled: true })}
        />
      ) : null}
      {prompt?.kind === "yes_no" ? (
        <YesNoPrompt
          prompt={prompt}
          onAnswer={(answer) => answerPrompt({ answer })}
          onCancel={() => answerPrompt({ cancelled: true })}
        />
      ) : null}
      {!prompt && activeAlert ? (
        <AlertBanner alert={activeAlert} onDismiss={dismissAlert} isActive={mode === "alert"} />
      ) : null}
      <StatusBar connected={connected} mode={mode} pendingAlerts={alerts.length} />
      <CommandInput
        value={inputValue}
        onChange={setInputValue}
        onSubmit={handleSubmit}
        focus={mode === "input"}
        connected={connected}
      />
    </Box>
  );
}
