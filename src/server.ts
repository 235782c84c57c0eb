// Crisis Relay - WebSocket Handler and Express Server
//
// One WebSocket connection is one session. JSON frames are client messages;
// binary frames are audio chunks in the framed format of audio-frame-codec.
// The HTTP side serves the static client, a health check, and the call-bridge
// route the telephony media gateway forwards a contact's questions to.
//
// Privacy: audio is in-memory only, never written to disk.

import express, { type Express, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import path from "node:path";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { SessionManager } from "./session-manager.js";
import type { ServerMessage, SessionTransport } from "./types.js";
import type { AudioFormatMessage } from "./messages.js";
import { parseClientFrame } from "./messages.js";
import { decodeAudioChunk } from "./audio-frame-codec.js";
import { FORMAT_SPECS } from "./synthesis.js";
import { CollaboratorFailure, CollaboratorTimeout, InputError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Expected audio format for the handshake */
const EXPECTED_FORMAT = {
  channels: 1 as const,
  sampleRate: 16000 as const,
  encoding: "LINEAR16" as const,
};

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  sessionId: string;
  audioFormatValidated: boolean;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  sessionManager: SessionManager;
  /** Directory to serve static files from. Defaults to "public" relative to cwd. */
  staticDir?: string;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Ends every session, then closes the sockets and the HTTP server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does not start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    sessionManager,
    staticDir = path.resolve(process.cwd(), "public"),
    logger = createConsoleLogger("Server"),
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.static(staticDir));
  app.use(express.json({ limit: "16kb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", sessions: sessionManager.activeSessionCount });
  });

  app.post("/bridge/:bridgeId/ask", (req, res) => {
    handleBridgeAsk(req, res, sessionManager, logger).catch((err: unknown) => {
      logger.error(`Bridge request failed: ${describeError(err)}`);
      if (!res.headersSent) {
        res.status(500).json({ error: "Internal error" });
      }
    });
  });

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, sessionManager, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    async close(): Promise<void> {
      await sessionManager.shutdown();
      await new Promise<void>((resolve, reject) => {
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

/** Adapts a socket to the session's outbound channel. */
export function createWebSocketTransport(ws: WebSocket): SessionTransport {
  return {
    send: (message) => sendMessage(ws, message),
    sendAudio: (audio, profile, format) => {
      sendMessage(ws, { type: "audio_out", profile, format, byteLength: audio.length });
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(audio, { binary: true });
      }
    },
    close: () => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.close();
      }
    },
  };
}

function handleConnection(ws: WebSocket, sessionManager: SessionManager, logger: Logger): void {
  const session = sessionManager.createSession(createWebSocketTransport(ws));

  const connState: ConnectionState = {
    sessionId: session.id,
    audioFormatValidated: false,
  };

  logger.info(`New WebSocket connection, session ${session.id}`);

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        handleBinaryMessage(ws, toBuffer(data), connState, sessionManager);
      } else {
        handleTextMessage(ws, toBuffer(data).toString("utf-8"), connState, sessionManager, logger);
      }
    } catch (err) {
      const errorMessage = describeError(err);
      if (err instanceof InputError) {
        logger.warn(`Rejected message for session ${connState.sessionId}: ${errorMessage}`);
      } else {
        logger.error(`Error handling message for session ${connState.sessionId}: ${errorMessage}`);
      }
      sendMessage(ws, {
        type: "error",
        message: errorMessage,
        recoverable: true,
      });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${connState.sessionId}`);
    endOnDisconnect(connState, sessionManager, logger);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${connState.sessionId}: ${err.message}`);
    endOnDisconnect(connState, sessionManager, logger);
  });
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Binary Message Handler (Audio Chunks) ──────────────────────────────────────

function handleBinaryMessage(
  ws: WebSocket,
  data: Buffer,
  connState: ConnectionState,
  sessionManager: SessionManager,
): void {
  // Audio format must be validated before accepting audio chunks
  if (!connState.audioFormatValidated) {
    sendMessage(ws, {
      type: "audio_format_error",
      message: "Audio format handshake required before sending audio chunks.",
    });
    return;
  }

  const chunk = decodeAudioChunk(data);
  if (!chunk) {
    sendMessage(ws, {
      type: "audio_format_error",
      message: `Malformed audio frame (${data.length} bytes). Expected a framed, 16-bit aligned PCM chunk.`,
    });
    return;
  }

  sessionManager.handleMessage(connState.sessionId, { type: "audio_chunk", bytes: chunk.pcm, seq: chunk.seq });
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleTextMessage(
  ws: WebSocket,
  text: string,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: Logger,
): void {
  const message = parseClientFrame(text);
  if (message.type === "audio_format") {
    handleAudioFormat(ws, message, connState, logger);
    return;
  }
  sessionManager.handleMessage(connState.sessionId, message);
}

// ─── Audio Format Handshake ─────────────────────────────────────────────────────

function handleAudioFormat(
  ws: WebSocket,
  message: AudioFormatMessage,
  connState: ConnectionState,
  logger: Logger,
): void {
  const errors: string[] = [];

  if (message.channels !== EXPECTED_FORMAT.channels) {
    errors.push(`Expected ${EXPECTED_FORMAT.channels} channel(s), got ${message.channels}`);
  }
  if (message.sampleRate !== EXPECTED_FORMAT.sampleRate) {
    errors.push(`Expected sample rate ${EXPECTED_FORMAT.sampleRate}, got ${message.sampleRate}`);
  }
  if (message.encoding !== EXPECTED_FORMAT.encoding) {
    errors.push(`Expected encoding "${EXPECTED_FORMAT.encoding}", got "${message.encoding}"`);
  }

  if (errors.length > 0) {
    const errorMsg = `Audio format validation failed: ${errors.join("; ")}`;
    logger.warn(`${errorMsg} (session ${connState.sessionId})`);
    sendMessage(ws, { type: "audio_format_error", message: errorMsg });
    return;
  }

  connState.audioFormatValidated = true;
  logger.info(`Audio format validated for session ${connState.sessionId}`);
}

// ─── Call Bridge Route ──────────────────────────────────────────────────────────

async function handleBridgeAsk(
  req: Request,
  res: Response,
  sessionManager: SessionManager,
  logger: Logger,
): Promise<void> {
  const bridge = sessionManager.bridges.get(req.params.bridgeId);
  if (!bridge) {
    res.status(404).json({ error: "Unknown bridge" });
    return;
  }

  const body: unknown = req.body;
  const question =
    typeof body === "object" && body !== null && "question" in body && typeof body.question === "string"
      ? body.question
      : "";
  const wantsJson = req.accepts(["audio/wav", "application/json"]) === "application/json";

  try {
    const answer = await bridge.ask(question, !wantsJson);
    if (wantsJson || !answer.audio) {
      res.json({ answer: answer.text });
      return;
    }
    res.type(FORMAT_SPECS.telephony.contentType).send(answer.audio);
  } catch (err) {
    if (err instanceof InputError) {
      res.status(400).json({ error: err.message });
      return;
    }
    if (err instanceof CollaboratorTimeout || err instanceof CollaboratorFailure) {
      logger.warn(`Bridge ${bridge.id} could not answer: ${err.message}`);
      res.status(503).json({ error: "Answer unavailable, please try again" });
      return;
    }
    throw err;
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function endOnDisconnect(connState: ConnectionState, sessionManager: SessionManager, logger: Logger): void {
  sessionManager.endSession(connState.sessionId, "disconnect").catch((err: unknown) => {
    logger.error(`Failed to end session ${connState.sessionId}: ${describeError(err)}`);
  });
}

// ─── Exports for Testing ────────────────────────────────────────────────────────

export { EXPECTED_FORMAT };
export type { ConnectionState };
