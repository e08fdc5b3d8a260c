import { randomUUID } from "node:crypto";
import { createServer as createHttpServer, type IncomingMessage, type Server as NodeHttpServer, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";

import { WebSocketServer, WebSocket, type RawData } from "ws";

import { describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { Session } from "../sessions/session.js";
import type { SessionManager } from "../sessions/sessionManager.js";
import type { OutboundEvent } from "../sessions/protocol.js";

/** Largest inbound frame accepted from a client. */
const MAX_FRAME_BYTES = 1024 * 1024;

/** Write side of a client socket as seen by {@link ConnectionHandler}. */
export interface ClientConnection {
  send(frame: string): void;
  isOpen(): boolean;
}

/**
 * Bridges one client socket to its session: inbound frames are handed to the
 * session in arrival order and every produced event is written back as a JSON
 * frame, preserving order across messages.
 */
export class ConnectionHandler {
  private pending: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(
    private readonly session: Session,
    private readonly client: ClientConnection,
    private readonly sessions: SessionManager,
    private readonly logger?: StructuredLogger,
  ) {}

  /** Queues a frame; the returned promise settles once its events are sent. */
  receive(frame: string): Promise<void> {
    const events = this.session.handleMessage(frame);
    this.pending = this.pending.then(() => this.pump(events));
    return this.pending;
  }

  /** Closes the session after the in-flight action has finished. */
  async disconnect(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.logger?.info("client_disconnected", { session_id: this.session.id });
    await this.sessions.close(this.session.id);
  }

  private async pump(events: AsyncIterable<OutboundEvent>): Promise<void> {
    try {
      for await (const event of events) {
        this.write(event);
      }
    } catch (error) {
      this.logger?.error("outbound_stream_failed", { session_id: this.session.id, ...describeError(error) });
      this.write({ type: "error", message: "internal error", kind: "internal" });
    }
  }

  private write(event: OutboundEvent): void {
    if (!this.client.isOpen()) {
      this.logger?.debug("outbound_dropped", { session_id: this.session.id, type: event.type });
      return;
    }
    this.client.send(JSON.stringify(event));
  }
}

export interface GatewayOptions {
  host: string;
  port: number;
  sessions: SessionManager;
  logger: StructuredLogger;
  /** Extra readiness check (database). Throwing marks the gateway unhealthy. */
  healthCheck?: () => void | Promise<void>;
}

export interface StartedGateway {
  readonly port: number;
  close(): Promise<void>;
}

/** Serves `GET /healthz` and upgrades every other request to a WebSocket session. */
export async function startGateway(options: GatewayOptions): Promise<StartedGateway> {
  const { sessions, logger } = options;
  const httpServer = createHttpServer((req, res) => {
    handleHttpRequest(req, res, options).catch((error: unknown) => {
      logger.error("http_request_failed", describeError(error));
      if (!res.headersSent) {
        res.statusCode = 500;
        res.end();
      }
    });
  });
  const wss = new WebSocketServer({ server: httpServer, maxPayload: MAX_FRAME_BYTES });
  const handlers = new Map<string, ConnectionHandler>();

  wss.on("connection", (socket: WebSocket, request: IncomingMessage) => {
    const connectionId = randomUUID();
    const chatId = readChatId(request);
    const session = sessions.open(connectionId, { chatId });
    const handler = new ConnectionHandler(
      session,
      { send: (frame) => socket.send(frame), isOpen: () => socket.readyState === WebSocket.OPEN },
      sessions,
      logger.child("gateway"),
    );
    handlers.set(connectionId, handler);
    logger.info("client_connected", { session_id: connectionId, chat_id: session.chatId });

    socket.on("message", (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        socket.send(JSON.stringify({ type: "error", message: "binary frames are not supported", kind: "validation_error" }));
        return;
      }
      handler.receive(rawDataToString(data)).catch((error: unknown) => {
        logger.error("inbound_frame_failed", { session_id: connectionId, ...describeError(error) });
      });
    });
    socket.on("error", (error: Error) => {
      logger.warn("socket_error", { session_id: connectionId, message: error.message });
    });
    socket.on("close", () => {
      handlers.delete(connectionId);
      handler.disconnect().catch((error: unknown) => {
        logger.error("session_close_failed", { session_id: connectionId, ...describeError(error) });
      });
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });
  const port = extractListeningPort(httpServer);
  logger.info("gateway_listening", { host: options.host, port });

  return {
    port,
    close: async () => {
      for (const client of wss.clients) {
        client.close(1001, "server shutting down");
      }
      await Promise.all(Array.from(handlers.values(), (handler) => handler.disconnect()));
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) => httpServer.close((error) => (error ? reject(error) : resolve())));
      logger.info("gateway_closed");
    },
  };
}

async function handleHttpRequest(req: IncomingMessage, res: ServerResponse, options: GatewayOptions): Promise<void> {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  if (req.method === "GET" && url.pathname === "/healthz") {
    let databaseOk = true;
    let message: string | undefined;
    try {
      await options.healthCheck?.();
    } catch (error) {
      databaseOk = false;
      message = error instanceof Error ? error.message : String(error);
    }
    const payload = {
      ok: databaseOk,
      sessions: options.sessions.size,
      database: databaseOk ? { ok: true } : { ok: false, message },
    };
    res.statusCode = databaseOk ? 200 : 503;
    res.setHeader("Content-Type", "application/json");
    res.end(JSON.stringify(payload), "utf8");
    options.logger.debug("http_healthz", { status: res.statusCode, sessions: payload.sessions });
    return;
  }
  res.statusCode = 404;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify({ ok: false, error: "not found" }), "utf8");
}

function readChatId(request: IncomingMessage): string | undefined {
  const url = new URL(request.url ?? "/", "http://localhost");
  return url.searchParams.get("chat_id")?.trim() || undefined;
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

function extractListeningPort(server: NodeHttpServer): number {
  const address = server.address();
  if (address && typeof address === "object") {
    return (address satisfies AddressInfo).port;
  }
  return 0;
}
