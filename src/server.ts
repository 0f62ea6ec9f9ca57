// Tilt Stabilizer - WebSocket Handler and Express Server
//
// Each WebSocket connection is one capture client with its own session:
// JSON messages carry gravity samples and record/stop control, binary
// messages carry frames. Warped frames go back to the same client.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { SessionManager } from "./session-manager.js";
import { parseClientMessage } from "./client-message.js";
import { decodeFrame, encodeFrame, isFrame } from "./frame-codec.js";
import { IDENTITY_TRANSFORM } from "./transform-builder.js";
import { baselineOrientationFor, encoderRotationDegrees } from "./baseline-calibrator.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import {
  BaselineOrientation,
  SessionState,
  type ClientMessage,
  type ServerMessage,
  type StabilizedFrame,
} from "./types.js";

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  sessionId: string;
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

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const {
    logger = createConsoleLogger("Server"),
    sessionManager = new SessionManager(),
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", sessions: sessionManager.sessionCount });
  });

  app.get("/sessions", (_req, res) => {
    res.json({ sessions: sessionManager.sessionIds() });
  });

  app.get("/sessions/:id/status", (req, res) => {
    try {
      res.json(sessionManager.getStatus(req.params.id));
    } catch (err) {
      res.status(404).json({ error: err instanceof Error ? err.message : String(err) });
    }
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
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const boundPort = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${boundPort}`);
          resolve(boundPort);
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

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  sessionManager: SessionManager,
  logger: Logger,
): void {
  const session = sessionManager.createSession(
    (frame) => {
      sendFrame(ws, frame);
    },
    (header, error) => {
      sendMessage(ws, {
        type: "error",
        message: `Frame ${header.seq} not stabilized: ${error.message}`,
        recoverable: true,
      });
    },
  );
  const connState: ConnectionState = { sessionId: session.id };

  logger.info(`New WebSocket connection, session ${session.id}`);
  sendMessage(ws, { type: "state_change", state: session.stabilization.state });

  ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
    try {
      const buf = toBuffer(data);
      if (isBinary) {
        handleBinaryMessage(ws, buf, connState, sessionManager);
      } else {
        handleTextMessage(ws, buf.toString("utf-8"), connState, sessionManager, logger);
      }
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling message for session ${connState.sessionId}: ${errorMessage}`);
      sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${connState.sessionId}`);
    cleanupConnection(connState, sessionManager, logger);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${connState.sessionId}: ${err.message}`);
  });
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Binary Message Handler (Frames) ────────────────────────────────────────────

function handleBinaryMessage(
  ws: WebSocket,
  data: Buffer,
  connState: ConnectionState,
  sessionManager: SessionManager,
): void {
  if (!isFrame(data)) {
    sendMessage(ws, { type: "error", message: "Unrecognized binary message", recoverable: true });
    return;
  }

  const decoded = decodeFrame(data);
  if (!decoded) {
    sendMessage(ws, { type: "error", message: "Malformed frame", recoverable: true });
    return;
  }

  const accepted = sessionManager.feedVideoFrame(connState.sessionId, decoded.header, decoded.image);
  if (!accepted) {
    const { state } = sessionManager.getStatus(connState.sessionId);
    sendMessage(ws, {
      type: "error",
      message: `Frame ${decoded.header.seq} rejected: session is "${state}", not "${SessionState.ACTIVE}".`,
      recoverable: true,
    });
  }
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleTextMessage(
  ws: WebSocket,
  text: string,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: Logger,
): void {
  const message = parseClientMessage(text);
  if (!message) {
    sendMessage(ws, { type: "error", message: "Malformed message", recoverable: true });
    return;
  }

  switch (message.type) {
    case "gravity":
      sessionManager.ingestGravity(connState.sessionId, message);
      break;

    case "start_recording":
      handleStartRecording(ws, message, connState, sessionManager, logger);
      break;

    case "stop_recording":
      handleStopRecording(ws, connState, sessionManager, logger).catch((err) => {
        const errorMessage = err instanceof Error ? err.message : String(err);
        logger.error(`Async error for session ${connState.sessionId}: ${errorMessage}`);
        sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
      });
      break;

    case "get_transform": {
      const snapshot = sessionManager.getTransform(connState.sessionId);
      const transform = snapshot.transform ?? IDENTITY_TRANSFORM;
      sendMessage(ws, {
        type: "transform",
        rotationRadians: transform.rotationRadians,
        scale: transform.scale,
        tiltAngle: snapshot.tiltAngle,
      });
      break;
    }

    default: {
      const exhaustiveCheck: never = message;
      throw new Error(`Unhandled message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// ─── Start / Stop Recording ─────────────────────────────────────────────────────

function handleStartRecording(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "start_recording" }>,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: Logger,
): void {
  const orientation =
    message.orientation ??
    (message.deviceOrientation
      ? baselineOrientationFor(message.deviceOrientation)
      : BaselineOrientation.PORTRAIT);

  const baseline = sessionManager.startRecording(connState.sessionId, orientation, {
    width: message.width,
    height: message.height,
  });

  if (baseline === null) {
    sendMessage(ws, {
      type: "error",
      message: "Recording already in progress; stop it before starting again.",
      recoverable: true,
    });
    return;
  }

  logger.info(`Recording started for session ${connState.sessionId}`);
  sendMessage(ws, { type: "state_change", state: SessionState.ACTIVE });
  sendMessage(ws, {
    type: "recording_started",
    baselineAngle: baseline,
    orientation,
    encoderRotationDegrees: encoderRotationDegrees(orientation),
  });
}

async function handleStopRecording(
  ws: WebSocket,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: Logger,
): Promise<void> {
  const statusBefore = sessionManager.getStatus(connState.sessionId);
  await sessionManager.stopRecording(connState.sessionId);
  logger.info(`Recording stopped for session ${connState.sessionId}`);

  // Counters survive the reset; baseline and dims report the finished recording
  const status = sessionManager.getStatus(connState.sessionId);
  sendMessage(ws, { type: "state_change", state: SessionState.IDLE });
  sendMessage(ws, {
    type: "stabilization_status",
    ...status,
    orientation: statusBefore.orientation,
    baselineAngle: statusBefore.baselineAngle,
    dims: statusBefore.dims,
  });
}

// ─── Cleanup ────────────────────────────────────────────────────────────────────

function cleanupConnection(
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: Logger,
): void {
  sessionManager.removeSession(connState.sessionId).catch((err) => {
    const errorMessage = err instanceof Error ? err.message : String(err);
    logger.error(`Failed to clean up session ${connState.sessionId}: ${errorMessage}`);
  });
}

// ─── Outbound ───────────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function sendFrame(ws: WebSocket, frame: StabilizedFrame): void {
  if (ws.readyState !== WebSocket.OPEN) return;
  ws.send(encodeFrame(frame.header, frame.image), { binary: true });
}
