/**
 * WebSocketManager - Live log stream for the admin panel
 *
 * Protocol (JSON messages):
 *   client → { type: "auth", token }       token is a session token or the API key
 *   client → { type: "ping" }
 *   server → { event: "connected" | "authenticated" | "log" | "pong" | "error", data, timestamp }
 *
 * Authenticated sockets first receive the buffered backlog (optionally only
 * entries after `after`), then every new log entry as it is written.
 */

import { WebSocketServer, WebSocket } from "ws";
import type { IncomingMessage } from "http";
import { z } from "zod";
import { createLogger } from "./Logger";
import { logBuffer, type LogBuffer, type LogEntry } from "./LogBuffer";
import type { AdminIdentity } from "./ApiManager";

const log = createLogger("ws");

interface StreamSocket extends WebSocket {
  identity?: AdminIdentity;
  isAlive: boolean;
  authTimer?: NodeJS.Timeout;
}

const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("auth"), token: z.string().min(1), after: z.number().int().min(0).optional() }),
  z.object({ type: z.literal("ping") }),
]);

/**
 * Resolves a token to an admin identity, or null when it grants no access
 */
export type StreamAuthenticator = (token: string) => AdminIdentity | null;

export interface WebSocketManagerOptions {
  port: number;
  authenticate: StreamAuthenticator;
  buffer?: LogBuffer;
  /** Unauthenticated sockets are closed after this long */
  authTimeoutMs?: number;
}

export class WebSocketManager {
  private wss: WebSocketServer | null = null;
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly buffer: LogBuffer;
  private readonly authTimeoutMs: number;
  private static readonly MAX_BACKLOG = 500;

  constructor(private readonly options: WebSocketManagerOptions) {
    this.buffer = options.buffer ?? logBuffer;
    this.authTimeoutMs = options.authTimeoutMs ?? 10_000;
  }

  async start(): Promise<void> {
    const wss = new WebSocketServer({ port: this.options.port });
    this.wss = wss;

    wss.on("connection", (ws: WebSocket, req: IncomingMessage) => this.handleConnection(ws, req));

    this.unsubscribe = this.buffer.subscribe((entry) => this.broadcast(entry));
    this.startHeartbeat();

    await new Promise<void>((resolve, reject) => {
      wss.once("listening", () => resolve());
      wss.once("error", reject);
    });

    log.info(`Log stream listening on port ${this.options.port}`);
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;

    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    const wss = this.wss;
    if (!wss) return;

    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
    this.wss = null;
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const socket: StreamSocket = Object.assign(ws, { isAlive: true });

    socket.authTimer = setTimeout(() => {
      if (!socket.identity) {
        this.send(socket, "error", { code: "AUTH_TIMEOUT", message: "Authenticate within 10 seconds" });
        socket.close();
      }
    }, this.authTimeoutMs);

    socket.on("pong", () => {
      socket.isAlive = true;
    });
    socket.on("message", (raw) => this.handleMessage(socket, raw.toString()));
    socket.on("close", () => clearTimeout(socket.authTimer));
    socket.on("error", (err) => log.warn(`WebSocket error from ${req.socket.remoteAddress ?? "unknown"}:`, err));

    this.send(socket, "connected", { message: "Authenticate with { type: 'auth', token: '<session-token>' }" });
  }

  private handleMessage(socket: StreamSocket, raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.send(socket, "error", { code: "INVALID_JSON", message: "Invalid JSON" });
      return;
    }

    const parsed = ClientMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.send(socket, "error", { code: "INVALID_MESSAGE", message: "Unknown or malformed message" });
      return;
    }

    const message = parsed.data;
    if (message.type === "ping") {
      this.send(socket, "pong", {});
      return;
    }

    const identity = this.options.authenticate(message.token);
    if (!identity) {
      this.send(socket, "error", { code: "INVALID_TOKEN", message: "Invalid or expired token" });
      socket.close();
      return;
    }

    socket.identity = identity;
    clearTimeout(socket.authTimer);
    this.send(socket, "authenticated", { username: identity.username });

    const backlog = this.buffer.since(message.after ?? 0, Number.MAX_SAFE_INTEGER).slice(-WebSocketManager.MAX_BACKLOG);
    for (const entry of backlog) {
      this.send(socket, "log", entry);
    }
    log.debug(`Log stream opened for ${identity.username}`);
  }

  private broadcast(entry: LogEntry): void {
    if (!this.wss) return;
    for (const client of this.wss.clients) {
      const socket = client as StreamSocket;
      if (socket.identity) {
        this.send(socket, "log", entry);
      }
    }
  }

  private send(socket: WebSocket, event: string, data: unknown): void {
    if (socket.readyState !== WebSocket.OPEN) return;
    socket.send(JSON.stringify({ event, data, timestamp: Date.now() }));
  }

  private startHeartbeat(): void {
    this.heartbeatInterval = setInterval(() => {
      if (!this.wss) return;
      for (const client of this.wss.clients) {
        const socket = client as StreamSocket;
        if (!socket.isAlive) {
          socket.terminate();
          continue;
        }
        socket.isAlive = false;
        socket.ping();
      }
    }, 30_000);
  }
}
