// Stream Courier - WebSocket Handler and Express Server
// One WebSocket connection is one chat. Text frames carry user messages; the
// server answers with JSON replies, and delivers files as a JSON header
// followed by a single binary frame.

import express, { type Express } from "express";
import { createServer, type IncomingMessage, type Server as HttpServer } from "node:http";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { z } from "zod";
import { parseIntent } from "./command-parser.js";
import { DEFAULT_MAX_DELIVERY_BYTES } from "./config.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import { REPLIES, type SessionManager } from "./session-manager.js";
import type { DeliveryKind, Outbox } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Longest accepted chat message, matching common chat platforms. */
export const MAX_MESSAGE_LENGTH = 4096;

const USER_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

// ─── Wire protocol ──────────────────────────────────────────────────────────────

export const ClientMessageSchema = z.object({
  type: z.literal("message"),
  text: z.string().min(1).max(MAX_MESSAGE_LENGTH),
});

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type ServerMessage =
  | { type: "reply"; text: string }
  | { type: "file"; kind: DeliveryKind; fileName: string; sizeBytes: number }
  | { type: "error"; message: string };

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  sessionManager: SessionManager;
  logger?: Logger;
  /** Largest file the transport will send. Defaults to 50 MiB. */
  maxFileBytes?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Resolves once listening. */
  listen(port: number): Promise<void>;
  /** Close every connection, then the WebSocket and HTTP servers. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    sessionManager,
    logger = createLogger("Server"),
    maxFileBytes = DEFAULT_MAX_DELIVERY_BYTES,
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", sessions: sessionManager.sessionCount });
  });

  const wss = new WebSocketServer({ server: httpServer });
  const openConnections = new Map<string, number>();

  wss.on("connection", (ws: WebSocket, request: IncomingMessage) => {
    const user = resolveUser(request);
    openConnections.set(user.id, (openConnections.get(user.id) ?? 0) + 1);

    handleConnection(ws, user.id, sessionManager, maxFileBytes, logger);

    ws.on("close", () => {
      const remaining = (openConnections.get(user.id) ?? 1) - 1;
      if (remaining > 0) {
        openConnections.set(user.id, remaining);
        return;
      }
      openConnections.delete(user.id);
      // Generated ids live for one connection only: discard in any state.
      sessionManager.release(user.id, { discard: user.anonymous }).catch((err: unknown) => {
        logger.error(`Failed to release session ${user.id}: ${describeError(err)}`);
      });
    });
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

export interface ConnectionUser {
  id: string;
  /** True when the id was generated for this connection alone. */
  anonymous: boolean;
}

/** `?user=` when it is a valid id, else a fresh one per connection. */
export function resolveUser(request: Pick<IncomingMessage, "url">): ConnectionUser {
  const url = new URL(request.url ?? "/", "http://localhost");
  const requested = url.searchParams.get("user");
  if (requested !== null && USER_ID_PATTERN.test(requested)) {
    return { id: requested, anonymous: false };
  }
  return { id: uuidv4(), anonymous: true };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  userId: string,
  sessionManager: SessionManager,
  maxFileBytes: number,
  logger: Logger,
): void {
  const outbox = new SocketOutbox(ws, maxFileBytes);
  logger.info(`New WebSocket connection for user ${userId}`);

  sendMessage(ws, { type: "reply", text: REPLIES.welcome });

  ws.on("message", (data: RawData, isBinary: boolean) => {
    if (isBinary) {
      sendMessage(ws, { type: "error", message: "Binary frames are not accepted." });
      return;
    }

    const parsed = parseClientMessage(rawDataToString(data));
    if (!parsed.ok) {
      logger.warn(`Rejected frame from user ${userId}: ${parsed.message}`);
      sendMessage(ws, { type: "error", message: parsed.message });
      return;
    }

    sessionManager.handle(userId, parseIntent(parsed.message.text), outbox).catch((err: unknown) => {
      logger.error(`Unhandled error for user ${userId}: ${describeError(err)}`);
    });
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed for user ${userId}`);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for user ${userId}: ${err.message}`);
  });
}

type ParsedFrame = { ok: true; message: ClientMessage } | { ok: false; message: string };

export function parseClientMessage(text: string): ParsedFrame {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return { ok: false, message: "Malformed message: expected JSON." };
  }

  const result = ClientMessageSchema.safeParse(json);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join(".") || "message"}: ${issue.message}`);
    return { ok: false, message: `Invalid message: ${detail.join("; ")}` };
  }
  return { ok: true, message: result.data };
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

// ─── Outbox ─────────────────────────────────────────────────────────────────────

/** Outbox bound to one socket. Sends resolve once `ws` has flushed the frame. */
export class SocketOutbox implements Outbox {
  constructor(
    private readonly ws: WebSocket,
    private readonly maxFileBytes: number,
  ) {}

  reply(text: string): Promise<void> {
    return sendFrame(this.ws, JSON.stringify({ type: "reply", text } satisfies ServerMessage));
  }

  async deliverFile(path: string, kind: DeliveryKind, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      throw new Error("delivery was cancelled");
    }

    const data = await readFile(path, { signal });
    if (data.byteLength > this.maxFileBytes) {
      throw new Error(`file of ${data.byteLength} bytes exceeds the transport limit of ${this.maxFileBytes} bytes`);
    }

    const header: ServerMessage = { type: "file", kind, fileName: basename(path), sizeBytes: data.byteLength };
    await sendFrame(this.ws, JSON.stringify(header));
    if (signal.aborted) {
      throw new Error("delivery was cancelled");
    }
    await sendFrame(this.ws, data);
  }
}

function sendFrame(ws: WebSocket, payload: string | Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (ws.readyState !== WebSocket.OPEN) {
      reject(new Error("connection is closed"));
      return;
    }
    ws.send(payload, { binary: typeof payload !== "string" }, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
