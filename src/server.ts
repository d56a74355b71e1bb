// Support Session Orchestrator - HTTP Gateway and WebSocket Feed
// Thin caller-facing boundary over the SessionManager: session create/close,
// turn submission, event replay, and a per-session WebSocket that streams new
// ledger events and accepts turns.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type IncomingMessage, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { SessionManager } from "./session-manager.js";
import type { ClientMessage, ServerMessage, Session, TurnInput } from "./types.js";
import { OrchestratorError, SessionClosedError, SessionNotFoundError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Upper bound on a single turn's text, in characters. */
export const MAX_TURN_TEXT_LENGTH = 8_000;

const MAX_METADATA_ENTRIES = 32;

// ─── Request validation ─────────────────────────────────────────────────────────

export type Validated<T> = { ok: true; value: T } | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseTurnInput(body: unknown): Validated<TurnInput> {
  if (!isRecord(body)) return { ok: false, error: "Request body must be a JSON object" };
  const { text, consent, intent } = body;
  if (typeof text !== "string") return { ok: false, error: "'text' must be a string" };
  if (text.length > MAX_TURN_TEXT_LENGTH) {
    return { ok: false, error: `'text' exceeds ${MAX_TURN_TEXT_LENGTH} characters` };
  }
  if (consent !== undefined && typeof consent !== "boolean") {
    return { ok: false, error: "'consent' must be a boolean when present" };
  }
  if (intent !== undefined && intent !== "exit" && intent !== "resources") {
    return { ok: false, error: "'intent' must be \"exit\" or \"resources\" when present" };
  }
  const input: TurnInput = { text };
  if (consent !== undefined) input.consent = consent;
  if (intent !== undefined) input.intent = intent;
  return { ok: true, value: input };
}

export function parseCreateSession(body: unknown): Validated<{ locale?: string; metadata?: Record<string, string> }> {
  if (body === undefined || body === null) return { ok: true, value: {} };
  if (!isRecord(body)) return { ok: false, error: "Request body must be a JSON object" };
  const { locale, metadata } = body;
  if (locale !== undefined && typeof locale !== "string") {
    return { ok: false, error: "'locale' must be a string when present" };
  }
  let parsedMetadata: Record<string, string> | undefined;
  if (metadata !== undefined) {
    if (!isRecord(metadata)) return { ok: false, error: "'metadata' must be an object of strings" };
    const entries = Object.entries(metadata);
    if (entries.length > MAX_METADATA_ENTRIES) {
      return { ok: false, error: `'metadata' may hold at most ${MAX_METADATA_ENTRIES} entries` };
    }
    parsedMetadata = {};
    for (const [key, value] of entries) {
      if (typeof value !== "string") return { ok: false, error: `'metadata.${key}' must be a string` };
      parsedMetadata[key] = value;
    }
  }
  return { ok: true, value: { locale, metadata: parsedMetadata } };
}

export function parseClientMessage(text: string): Validated<ClientMessage> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { ok: false, error: "Message is not valid JSON" };
  }
  if (!isRecord(raw)) return { ok: false, error: "Message must be a JSON object" };

  switch (raw.type) {
    case "turn": {
      const turn = parseTurnInput(raw);
      return turn.ok ? { ok: true, value: { type: "turn", ...turn.value } } : turn;
    }
    case "replay": {
      const from = raw.fromSequence ?? 1;
      if (typeof from !== "number" || !Number.isInteger(from) || from < 1) {
        return { ok: false, error: "'fromSequence' must be a positive integer" };
      }
      return { ok: true, value: { type: "replay", fromSequence: from } };
    }
    case "close":
      return { ok: true, value: { type: "close" } };
    default:
      return { ok: false, error: `Unknown message type: ${String(raw.type)}` };
  }
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Externally provided SessionManager (for testing). Created internally if omitted. */
  sessionManager?: SessionManager;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/** Session as returned over HTTP. */
export function sessionView(session: Session): Record<string, unknown> {
  return {
    id: session.id,
    phase: session.phase,
    consentGiven: session.consentGiven,
    consentRevoked: session.consentRevoked,
    createdAt: session.createdAt.toISOString(),
    lastActivityAt: session.lastActivityAt.toISOString(),
    messageCount: session.messageCount,
    locale: session.locale,
    metadata: session.metadata,
    riskHistory: session.riskHistory,
    triageSummary: session.triageSummary,
    escalation: session.escalation,
    pendingEscalation: session.pendingEscalation
      ? { ...session.pendingEscalation, nextRetryAt: session.pendingEscalation.nextRetryAt.toISOString() }
      : null,
    closeReason: session.closeReason,
    closedAt: session.closedAt?.toISOString() ?? null,
  };
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const { logger = createConsoleLogger("Server"), sessionManager = new SessionManager() } = options;

  const app = express();
  const httpServer = createServer(app);
  app.use(express.json({ limit: "64kb" }));

  const sendError = (res: Response, err: unknown): void => {
    if (err instanceof SessionNotFoundError) {
      res.status(404).json({ error: err.message, kind: err.kind });
    } else if (err instanceof SessionClosedError) {
      res.status(409).json({ error: err.message, kind: err.kind });
    } else {
      logger.error(`Request failed: ${describeError(err)}`);
      res.status(500).json({ error: "Internal error" });
    }
  };

  // Express 4 does not await handlers
  const route =
    (handler: (req: Request, res: Response) => Promise<void>) =>
    (req: Request, res: Response): void => {
      handler(req, res).catch((err: unknown) => sendError(res, err));
    };

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/status", (_req, res) => {
    res.json(sessionManager.getStats());
  });

  app.get("/sessions", (_req, res) => {
    res.json({ sessions: sessionManager.listActiveSessions().map(sessionView) });
  });

  app.post(
    "/sessions",
    route(async (req, res) => {
      const parsed = parseCreateSession(req.body);
      if (!parsed.ok) {
        res.status(400).json({ error: parsed.error });
        return;
      }
      const session = await sessionManager.createSession(parsed.value);
      res.status(201).json({ session: sessionView(session) });
    }),
  );

  app.get(
    "/sessions/:id",
    route(async (req, res) => {
      res.json({ session: sessionView(sessionManager.getSession(req.params.id)) });
    }),
  );

  app.post(
    "/sessions/:id/turns",
    route(async (req, res) => {
      const parsed = parseTurnInput(req.body);
      if (!parsed.ok) {
        res.status(400).json({ error: parsed.error });
        return;
      }
      res.json({ result: await sessionManager.submitTurn(req.params.id, parsed.value) });
    }),
  );

  app.post(
    "/sessions/:id/consent/revoke",
    route(async (req, res) => {
      res.json({ session: sessionView(await sessionManager.revokeConsent(req.params.id)) });
    }),
  );

  app.delete(
    "/sessions/:id",
    route(async (req, res) => {
      res.json({ session: sessionView(await sessionManager.closeSession(req.params.id, "user_exit")) });
    }),
  );

  app.get(
    "/sessions/:id/events",
    route(async (req, res) => {
      const rawFrom = typeof req.query.from === "string" ? req.query.from : "1";
      const from = Number(rawFrom);
      if (!Number.isInteger(from) || from < 1) {
        res.status(400).json({ error: "'from' must be a positive integer" });
        return;
      }
      res.json({ events: await sessionManager.replay(req.params.id, from) });
    }),
  );

  app.get(
    "/sessions/:id/tokens/:token",
    route(async (req, res) => {
      const value = sessionManager.revealToken(req.params.id, req.params.token);
      if (value === null) {
        res.status(404).json({ error: "Token not found" });
        return;
      }
      res.json({ token: req.params.token, value });
    }),
  );

  app.get(
    "/sessions/:id/audit",
    route(async (req, res) => {
      res.json({ audit: await sessionManager.audit(req.params.id) });
    }),
  );

  // Malformed JSON bodies
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Request body is not valid JSON" });
      return;
    }
    next(err);
  });

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    handleConnection(ws, req, sessionManager, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        // Close all WebSocket connections
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

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

function handleConnection(
  ws: WebSocket,
  req: IncomingMessage,
  sessionManager: SessionManager,
  logger: Logger,
): void {
  const sessionId = new URL(req.url ?? "/", "http://localhost").searchParams.get("sessionId");
  if (!sessionId) {
    sendMessage(ws, { type: "error", message: "Missing sessionId query parameter", recoverable: false });
    ws.close(1008, "missing sessionId");
    return;
  }

  let unsubscribe: () => void;
  try {
    unsubscribe = sessionManager.subscribe(sessionId, (event) => {
      sendMessage(ws, { type: "event", event });
      if (event.kind === "session.closed") {
        sendMessage(ws, { type: "session_closed", sessionId });
      }
    });
  } catch (err) {
    sendMessage(ws, { type: "error", message: describeError(err), recoverable: false });
    ws.close(1008, "unknown session");
    return;
  }

  logger.info(`New WebSocket connection, session ${sessionId}`);

  // Helper to catch errors from async handlers and send them to the client
  const catchAsync = (promise: Promise<void>): void => {
    promise.catch((err: unknown) => {
      const recoverable = !(err instanceof OrchestratorError);
      if (recoverable) logger.error(`Async error for session ${sessionId}: ${describeError(err)}`);
      sendMessage(ws, { type: "error", message: describeError(err), recoverable });
    });
  };

  ws.on("message", (data: RawData) => {
    const parsed = parseClientMessage(rawDataToString(data));
    if (!parsed.ok) {
      sendMessage(ws, { type: "error", message: parsed.error, recoverable: true });
      return;
    }
    const message = parsed.value;
    switch (message.type) {
      case "turn":
        catchAsync(
          sessionManager
            .submitTurn(sessionId, { text: message.text, consent: message.consent, intent: message.intent })
            .then((result) => sendMessage(ws, { type: "turn_result", result })),
        );
        break;
      case "replay":
        catchAsync(
          sessionManager
            .replay(sessionId, message.fromSequence)
            .then((events) => sendMessage(ws, { type: "replay", events })),
        );
        break;
      case "close":
        catchAsync(sessionManager.closeSession(sessionId, "user_exit").then(() => undefined));
        break;
      default: {
        const exhaustiveCheck: never = message;
        sendMessage(ws, { type: "error", message: `Unhandled message ${String(exhaustiveCheck)}`, recoverable: true });
      }
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${sessionId}`);
    unsubscribe();
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${sessionId}: ${err.message}`);
    unsubscribe();
  });
}

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
