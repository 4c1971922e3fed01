import { randomUUID } from "node:crypto";
import { WebSocketServer, WebSocket } from "ws";
import { createScopedLogger } from "../shared/index.js";
import type { ServerMessage } from "./protocol.js";

const DEFAULT_PORT = 8080;
const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 30_000;
const MAX_RETRIES = 10;

const log = createScopedLogger("server");

export interface WsServerOptions {
  port?: number;
  onMessage: (clientId: string, data: unknown) => void;
  onConnect?: (clientId: string) => void;
}

/** What alert delivery needs from a transport. */
export interface ClientTransport {
  broadcast(data: ServerMessage): number;
  clientCount(): number;
}

export class WsServer implements ClientTransport {
  private readonly port: number;
  private readonly onMessage: (clientId: string, data: unknown) => void;
  private readonly onConnect?: (clientId: string) => void;
  private wss: WebSocketServer | null = null;
  private clients = new Map<string, WebSocket>();
  private retryCount = 0;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private stopping = false;

  constructor(options: WsServerOptions) {
    this.port = options.port ?? DEFAULT_PORT;
    this.onMessage = options.onMessage;
    this.onConnect = options.onConnect;
  }

  async start(): Promise<void> {
    this.stopping = false;
    this.retryCount = 0;
    return this.bind();
  }

  private bind(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.wss = new WebSocketServer({ port: this.port });

      this.wss.on("listening", () => {
        log.info(`listening on port ${this.port}`);
        this.retryCount = 0;
        resolve();
      });

      this.wss.on("connection", (ws) => {
        const clientId = randomUUID();
        this.clients.set(clientId, ws);
        log.info(`client connected: ${clientId}`);

        ws.on("message", (raw) => {
          const text = raw.toString();
          let parsed: unknown;
          try {
            parsed = JSON.parse(text);
          } catch {
            log.warn(`invalid JSON from ${clientId}: ${text}`);
            ws.send(JSON.stringify({ type: "error", content: "Invalid JSON" }));
            return;
          }
          this.onMessage(clientId, parsed);
        });

        ws.on("close", () => {
          this.clients.delete(clientId);
          log.info(`client disconnected: ${clientId}`);
        });

        ws.on("error", (err) => {
          log.error(`client error (${clientId}):`, err.message);
        });

        this.onConnect?.(clientId);
      });

      this.wss.on("error", (err: NodeJS.ErrnoException) => {
        log.error(`server error: ${err.message}`);

        if (this.retryCount === 0) {
          this.scheduleRetry();
          reject(err);
        } else {
          this.scheduleRetry();
        }
      });
    });
  }

  private scheduleRetry(): void {
    if (this.stopping) return;

    if (this.retryCount >= MAX_RETRIES) {
      log.error(`max retries (${MAX_RETRIES}) reached, giving up`);
      return;
    }

    const backoff = Math.min(INITIAL_BACKOFF_MS * 2 ** this.retryCount, MAX_BACKOFF_MS);
    this.retryCount++;
    log.warn(`retrying in ${backoff}ms (attempt ${this.retryCount}/${MAX_RETRIES})`);

    this.retryTimer = setTimeout(() => {
      if (this.stopping) return;
      this.bind().catch((err: unknown) => {
        log.warn("rebind failed:", err instanceof Error ? err.message : String(err));
      });
    }, backoff);
  }

  send(clientId: string, data: ServerMessage): void {
    const ws = this.clients.get(clientId);
    if (!ws) {
      log.warn(`send(): unknown client ${clientId}`);
      return;
    }
    ws.send(JSON.stringify(data));
  }

  /** Sends to every open client and returns how many received it. */
  broadcast(data: ServerMessage): number {
    const payload = JSON.stringify(data);
    let delivered = 0;
    for (const ws of this.clients.values()) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      ws.send(payload);
      delivered++;
    }
    return delivered;
  }

  clientCount(): number {
    return this.clients.size;
  }

  async stop(): Promise<void> {
    this.stopping = true;

    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }

    for (const client of this.clients.values()) {
      client.close(1001, "Server shutting down");
    }
    this.clients.clear();

    return new Promise<void>((resolve) => {
      if (!this.wss) {
        resolve();
        return;
      }
      this.wss.close(() => {
        log.info("stopped");
        this.wss = null;
        resolve();
      });
    });
  }
}
