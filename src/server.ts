// Live Meeting Analyzer - Express server and WebSocket event channel
//
// REST exposes snapshots and session control; the WebSocket pushes pipeline
// events to every connected client and, when a PushAudioSource is configured,
// accepts binary PCM frames as the live audio feed.
//
// Session data lives in server memory only. No database, no temp files.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { SessionManager, SessionManagerHooks } from "./session-manager.js";
import type { PushAudioSource } from "./audio-source.js";
import { SessionState } from "./types.js";
import type { Outcome, OutcomeCode, ServerMessage } from "./types.js";
import { buildReportExport, renderReportMarkdown } from "./report-export.js";
import { errorMessage } from "./utils.js";

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface ServerLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const defaultLogger: ServerLogger = {
  info: (msg, ...args) => console.log(`[INFO] [Server] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[WARN] [Server] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ERROR] [Server] ${msg}`, ...args),
};

// ─── Broadcast ──────────────────────────────────────────────────────────────────

/**
 * Fans ServerMessages out to every open WebSocket client. Created before the
 * SessionManager so its hooks can be passed in at construction.
 */
export class ClientBroadcaster {
  private readonly clients = new Set<WebSocket>();

  add(ws: WebSocket): void {
    this.clients.add(ws);
  }

  remove(ws: WebSocket): void {
    this.clients.delete(ws);
  }

  get size(): number {
    return this.clients.size;
  }

  broadcast(message: ServerMessage): void {
    const payload = JSON.stringify(message);
    for (const ws of this.clients) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(payload);
      }
    }
  }

  hooks(): SessionManagerHooks {
    return {
      onStateChange: (state, sessionId) => this.broadcast({ type: "state_change", state, sessionId }),
      onSegment: (segment) => this.broadcast({ type: "transcript_segment", segment }),
      onAnalysis: (analysis) => this.broadcast({ type: "analysis", analysis }),
      onSessionEnded: (reason, message) => this.broadcast({ type: "session_ended", reason, message }),
    };
  }
}

/**
 * Sends a ServerMessage to one client as JSON text.
 * Ignored if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  sessionManager: SessionManager;
  /** Must be the broadcaster whose hooks() were given to the SessionManager. */
  broadcaster?: ClientBroadcaster;
  /** Enables audio ingest from binary WebSocket frames. */
  pushSource?: PushAudioSource;
  logger?: ServerLogger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  broadcaster: ClientBroadcaster;
  /** Resolves with the bound port once listening (useful with port 0). */
  listen(port: number): Promise<number>;
  close(): Promise<void>;
}

const OUTCOME_STATUS: Record<OutcomeCode, number> = {
  started: 200,
  completed: 200,
  no_speech: 200,
  cleared: 200,
  already_recording: 409,
  not_recording: 409,
  nothing_to_clear: 404,
  capture_failed: 503,
};

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function sendOutcome(res: Response, outcome: Outcome): void {
  res.status(OUTCOME_STATUS[outcome.code]).json(outcome);
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { sessionManager, pushSource, logger = defaultLogger } = options;
  const broadcaster = options.broadcaster ?? new ClientBroadcaster();

  const app = express();
  const httpServer = createServer(app);

  // ── REST ────────────────────────────────────────────────────────────────────

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/status", (_req, res) => {
    res.json({
      ...sessionManager.sessionState(),
      totalSessions: sessionManager.totalSessions,
      totalSessionsAnalyzed: sessionManager.totalSessionsAnalyzed,
      currentAnalysis: sessionManager.currentAnalysis(),
      lastError: sessionManager.lastAnalysisError(),
    });
  });

  app.get("/api/transcript", (_req, res) => {
    const segments = sessionManager.transcriptSegments();
    res.json({
      segments,
      fullText: sessionManager.transcriptText(),
      segmentCount: segments.length,
    });
  });

  app.get("/api/analysis", (_req, res) => {
    res.json({ analysis: sessionManager.currentAnalysis() });
  });

  app.post("/api/recording/start", (_req, res, next) => {
    sessionManager
      .start()
      .then((outcome) => sendOutcome(res, outcome))
      .catch(next);
  });

  app.post("/api/recording/stop", (_req, res, next) => {
    sessionManager
      .stop()
      .then((outcome) => sendOutcome(res, outcome))
      .catch(next);
  });

  app.post("/api/clear", (_req, res) => {
    sendOutcome(res, sessionManager.clearData());
  });

  app.get("/api/export", (_req, res) => {
    const doc = buildReportExport(sessionManager);
    if (!doc) {
      res.status(404).json({ error: "No final report available" });
      return;
    }
    res.setHeader("Content-Disposition", `attachment; filename="meeting-${doc.sessionId}.json"`);
    res.json(doc);
  });

  app.get("/api/export.md", (_req, res) => {
    const doc = buildReportExport(sessionManager);
    if (!doc) {
      res.status(404).json({ error: "No final report available" });
      return;
    }
    res.type("text/markdown").send(renderReportMarkdown(doc));
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Request failed: ${errorMessage(err)}`);
    res.status(500).json({ error: errorMessage(err) });
  });

  // ── WebSocket ───────────────────────────────────────────────────────────────

  const wss = new WebSocketServer({ server: httpServer });
  const feeders = new Set<WebSocket>();

  wss.on("connection", (ws: WebSocket) => {
    broadcaster.add(ws);
    logger.info(`WebSocket connected (${broadcaster.size} clients)`);

    const snapshot = sessionManager.sessionState();
    sendMessage(ws, { type: "state_change", state: snapshot.state, sessionId: snapshot.sessionId });

    ws.on("message", (data: RawData, isBinary: boolean) => {
      if (!isBinary) {
        sendMessage(ws, { type: "error", message: "Only binary PCM audio frames are accepted on this socket" });
        return;
      }
      if (!pushSource) {
        sendMessage(ws, { type: "error", message: "WebSocket audio ingest is not enabled" });
        return;
      }
      if (!pushSource.isCapturing) {
        return;
      }
      feeders.add(ws);
      pushSource.push(toBuffer(data));
    });

    const disconnect = () => {
      broadcaster.remove(ws);
      const wasFeeding = feeders.delete(ws);
      if (
        wasFeeding &&
        feeders.size === 0 &&
        pushSource?.isCapturing &&
        sessionManager.currentState === SessionState.RECORDING
      ) {
        logger.warn("Last audio client disconnected during recording");
        pushSource.fail("Audio client disconnected during recording");
      }
    };

    ws.on("close", () => {
      logger.info("WebSocket closed");
      disconnect();
    });

    ws.on("error", (err) => {
      logger.error(`WebSocket error: ${err.message}`);
      disconnect();
    });
  });

  return {
    app,
    httpServer,
    wss,
    broadcaster,
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
