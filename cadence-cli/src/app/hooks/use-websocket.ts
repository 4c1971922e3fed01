import { useState, useEffect, useRef, useCallback } from "react";
import WebSocket from "ws";
import { parseServerMessage } from "../protocol.js";
import type { ClientRequest, ServerMessage } from "../types.js";

const DEFAULT_WS_URL = "ws://localhost:8080";
const RECONNECT_DELAY_MS = 3000;

type UseWebSocketOptions = {
  onMessage: (data: ServerMessage) => void;
  url?: string;
};

type UseWebSocketReturn = {
  send: (data: ClientRequest) => void;
  connected: boolean;
};

export function resolveServerUrl(): string {
  const fromEnv = process.env["CADENCE_URL"]?.trim();
  if (fromEnv) return fromEnv;
  const port = process.env["CADENCE_PORT"]?.trim();
  return port ? `ws://localhost:${port}` : DEFAULT_WS_URL;
}

export function useWebSocket({
  onMessage,
  url = resolveServerUrl(),
}: UseWebSocketOptions): UseWebSocketReturn {
  const [connected, setConnected] = useState(false);
  const wsRef = useRef<WebSocket | null>(null);
  const onMessageRef = useRef(onMessage);
  onMessageRef.current = onMessage;

  useEffect(() => {
    let disposed = false;
    let retryTimer: ReturnType<typeof setTimeout> | null = null;

    const connect = (): void => {
      const ws = new WebSocket(url);
      wsRef.current = ws;

      ws.on("open", () => setConnected(true));

      ws.on("message", (raw) => {
        let parsed: unknown;
        try {
          parsed = JSON.parse(raw.toString());
        } catch {
          return;
        }
        const message = parseServerMessage(parsed);
        if (message) onMessageRef.current(message);
      });

      ws.on("close", () => {
        setConnected(false);
        if (disposed) return;
        retryTimer = setTimeout(connect, RECONNECT_DELAY_MS);
      });

      // "close" follows every "error" and schedules the reconnect.
      ws.on("error", () => undefined);
    };

    connect();

    return () => {
      disposed = true;
      if (retryTimer) clearTimeout(retryTimer);
      wsRef.current?.close();
      wsRef.current = null;
    };
  }, [url]);

  const send = useCallback((data: ClientRequest) => {
    const ws = wsRef.current;
    if (ws && ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(data));
    }
  }, []);

  return { send, connected };
}
