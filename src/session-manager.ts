// Live Meeting Analyzer - Session Manager
// Owns the session lifecycle and wires one session's pipeline together:
//   AudioSource → CaptureQueue → ProcessingLoop (WindowAssembler →
//   TranscriptionWorker → TranscriptLedger) → AnalysisEngine
//
// Exactly one live session at a time. Every start builds a fresh ledger,
// engine, queue and loop, so nothing carries over between sessions. The most
// recent finished session stays readable through the snapshot accessors until
// the next start or clearData().

import { v4 as uuidv4 } from "uuid";
import { SessionState } from "./types.js";
import type {
  AnalysisResult,
  AppConfig,
  AudioChunk,
  EngineStats,
  Outcome,
  SessionEndReason,
  SessionSnapshot,
  StopOutcome,
  TranscriptSegment,
} from "./types.js";
import type { AudioSource, CaptureError } from "./audio-source.js";
import type { SpeechToText } from "./speech-to-text.js";
import type { CompletionClient } from "./completion-client.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { CaptureQueue } from "./capture-queue.js";
import { WindowAssembler } from "./window-assembler.js";
import { TranscriptionWorker } from "./transcription-worker.js";
import { TranscriptLedger } from "./transcript-ledger.js";
import { ProcessingLoop } from "./processing-loop.js";
import { AnalysisEngine } from "./analysis-engine.js";
import { delay, errorMessage } from "./utils.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerHooks {
  onStateChange?(state: SessionState, sessionId: string | null): void;
  onSegment?(segment: TranscriptSegment): void;
  onAnalysis?(analysis: AnalysisResult): void;
  onSessionEnded?(reason: SessionEndReason, message: string): void;
}

export interface SessionManagerDeps {
  /** Called once per start(); may return the same instance every time. */
  audioSourceFactory: () => AudioSource;
  speechToText: SpeechToText;
  completionClient: CompletionClient;
  config: Pick<AppConfig, "capture" | "analysis" | "stopTimeoutMs">;
  logger?: Logger;
  clock?: () => number;
  hooks?: SessionManagerHooks;
}

/**
 * Valid state transitions for the session state machine.
 *
 * IDLE → RECORDING:       start()
 * RECORDING → STOPPING:   stop()
 * RECORDING → IDLE:       capture failure (start or mid-session)
 * STOPPING → IDLE:        stop() finished (finalized, no speech, or timed out)
 */
const VALID_TRANSITIONS: ReadonlyMap<SessionState, readonly SessionState[]> = new Map([
  [SessionState.IDLE, [SessionState.RECORDING]],
  [SessionState.RECORDING, [SessionState.STOPPING, SessionState.IDLE]],
  [SessionState.STOPPING, [SessionState.IDLE]],
]);

interface Session {
  id: string;
  startedAt: number;
  stoppedAt: number | null;
  source: AudioSource;
  queue: CaptureQueue<AudioChunk>;
  ledger: TranscriptLedger;
  engine: AnalysisEngine;
  loop: ProcessingLoop;
  /** Settles when the processing loop ends; never rejects. */
  loopDone: Promise<void>;
  stopRequested: boolean;
  endReason: SessionEndReason | null;
}

export class SessionManager {
  private readonly deps: SessionManagerDeps;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private state: SessionState = SessionState.IDLE;
  private session: Session | null = null;
  private sessionsStarted = 0;
  private sessionsAnalyzed = 0;

  constructor(deps: SessionManagerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("SessionManager");
    this.clock = deps.clock ?? Date.now;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  get currentState(): SessionState {
    return this.state;
  }

  get totalSessions(): number {
    return this.sessionsStarted;
  }

  /** Sessions that ended with a final report. */
  get totalSessionsAnalyzed(): number {
    return this.sessionsAnalyzed;
  }

  async start(): Promise<Outcome> {
    if (this.state !== SessionState.IDLE) {
      return {
        success: false,
        code: "already_recording",
        message: "A recording session is already in progress",
      };
    }

    const session = this.createSession();
    this.session = session;
    this.transition(SessionState.RECORDING);

    try {
      await session.source.start({
        onChunk: (chunk) => session.queue.push(chunk),
        onError: (err) => this.handleCaptureError(session, err),
      });
    } catch (err) {
      const msg = `Failed to start audio capture: ${errorMessage(err)}`;
      this.logger.error(msg);
      // A concurrent stop() owns the transition back to IDLE.
      if (session.stopRequested) {
        session.loop.cancel();
        return { success: false, code: "capture_failed", message: msg };
      }
      this.endSession(session, "capture_failed");
      session.loop.cancel();
      this.transition(SessionState.IDLE);
      this.notify(() => this.deps.hooks?.onSessionEnded?.("capture_failed", msg));
      return { success: false, code: "capture_failed", message: msg };
    }

    // stop() arrived while the device was opening; release it now.
    if (session.stopRequested) {
      await this.stopSource(session);
    }

    this.sessionsStarted++;
    this.logger.info(`Recording started (session ${session.id})`);
    return { success: true, code: "started", message: `Recording started (session ${session.id})` };
  }

  async stop(): Promise<StopOutcome> {
    const session = this.session;
    if (!session || this.state !== SessionState.RECORDING) {
      return { success: false, code: "not_recording", message: "No recording in progress", finalReport: null };
    }

    session.stopRequested = true;
    this.transition(SessionState.STOPPING);

    await this.stopSource(session);
    session.queue.close();

    const drained = await this.waitForLoop(session);
    if (!drained) {
      this.logger.warn(
        `Transcription did not drain within ${this.deps.config.stopTimeoutMs}ms; abandoning in-flight work`,
      );
      session.loop.cancel();
    }

    let outcome: StopOutcome;
    let reason: SessionEndReason;
    if (session.ledger.segmentCount === 0) {
      reason = "no_speech";
      this.endSession(session, reason);
      outcome = {
        success: true,
        code: "no_speech",
        message: "No speech was captured; nothing to analyze",
        finalReport: null,
      };
    } else {
      const finalReport = await session.engine.finalize();
      reason = "completed";
      this.endSession(session, reason);
      this.sessionsAnalyzed++;
      outcome = {
        success: true,
        code: "completed",
        message: `Session complete: ${session.ledger.wordCount} words analyzed`,
        finalReport,
      };
    }

    if (this.currentState === SessionState.STOPPING) {
      this.transition(SessionState.IDLE);
      this.logger.info(`Session ${session.id} ended (${outcome.code})`);
      this.notify(() => this.deps.hooks?.onSessionEnded?.(reason, outcome.message));
    }
    return outcome;
  }

  /** Discard the most recent finished session. */
  clearData(): Outcome {
    if (this.state !== SessionState.IDLE) {
      return { success: false, code: "already_recording", message: "Cannot clear data while a session is active" };
    }
    if (!this.session) {
      return { success: false, code: "nothing_to_clear", message: "No session data to clear" };
    }
    this.session = null;
    this.logger.info("Session data cleared");
    return { success: true, code: "cleared", message: "Session data cleared" };
  }

  // ─── Snapshots ──────────────────────────────────────────────────────────────

  currentAnalysis(): AnalysisResult | null {
    return this.session?.engine.currentAnalysis ?? null;
  }

  finalReport(): AnalysisResult | null {
    return this.session?.engine.finalReport ?? null;
  }

  /** Most recent failed analysis pass of the live (or last) session. */
  lastAnalysisError(): string | null {
    return this.session?.engine.lastError ?? null;
  }

  transcriptText(): string {
    return this.session?.ledger.fullText() ?? "";
  }

  transcriptSegments(): readonly TranscriptSegment[] {
    return this.session?.ledger.segments ?? [];
  }

  engineStats(): EngineStats | null {
    return this.session?.engine.stats() ?? null;
  }

  sessionStartedAt(): number | null {
    return this.session?.startedAt ?? null;
  }

  sessionState(): SessionSnapshot {
    const session = this.session;
    if (!session) {
      return {
        sessionId: null,
        state: this.state,
        wordCount: 0,
        segmentCount: 0,
        durationSeconds: 0,
        wordsPerMinute: 0,
        analysisCount: 0,
        summaryCount: 0,
        hasFinalReport: false,
        endReason: null,
      };
    }

    const end = session.stoppedAt ?? this.clock();
    const durationSeconds = Math.max(0, (end - session.startedAt) / 1000);
    const wordCount = session.ledger.wordCount;

    return {
      sessionId: session.id,
      state: this.state,
      wordCount,
      segmentCount: session.ledger.segmentCount,
      durationSeconds: Math.round(durationSeconds),
      wordsPerMinute: durationSeconds > 0 ? Math.round(wordCount / (durationSeconds / 60)) : 0,
      analysisCount: session.engine.analysisCount,
      summaryCount: session.engine.rollingSummaries.length,
      hasFinalReport: session.engine.finalReport !== null,
      endReason: session.endReason,
    };
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private createSession(): Session {
    const { capture, analysis } = this.deps.config;
    const hooks = this.deps.hooks;

    const ledger = new TranscriptLedger();
    const engine = new AnalysisEngine(this.deps.completionClient, ledger, analysis, {
      logger: this.logger,
      clock: this.clock,
    });
    const queue = new CaptureQueue<AudioChunk>({
      highWaterMark: capture.queueHighWaterMark,
      onHighWater: (size) =>
        this.logger.warn(`Capture queue backlog at ${size} chunks; transcription is falling behind`),
    });
    const assembler = new WindowAssembler({
      sampleRate: capture.sampleRate,
      windowSeconds: capture.windowSeconds,
      overlapSeconds: capture.overlapSeconds,
      minFlushSeconds: capture.minFlushSeconds,
    });
    const worker = new TranscriptionWorker(this.deps.speechToText, ledger, {
      sampleRate: capture.sampleRate,
      languageHint: capture.languageHint,
      logger: this.logger,
    });
    const loop = new ProcessingLoop({
      queue,
      assembler,
      worker,
      logger: this.logger,
      onSegment: async (segment) => {
        this.notify(() => hooks?.onSegment?.(segment));
        const result = await engine.ingest(segment);
        if (result) {
          this.notify(() => hooks?.onAnalysis?.(result));
        }
      },
    });

    const loopDone = loop.run().catch((err: unknown) => {
      this.logger.error(`Processing loop failed: ${errorMessage(err)}`);
    });

    return {
      id: uuidv4(),
      startedAt: this.clock(),
      stoppedAt: null,
      source: this.deps.audioSourceFactory(),
      queue,
      ledger,
      engine,
      loop,
      loopDone,
      stopRequested: false,
      endReason: null,
    };
  }

  private handleCaptureError(session: Session, err: CaptureError): void {
    if (this.session !== session || this.state !== SessionState.RECORDING) {
      this.logger.warn(`Ignoring capture error outside an active recording: ${err.message}`);
      return;
    }

    this.logger.error(`Capture failed mid-session: ${err.message}`);
    session.loop.cancel();
    this.endSession(session, "capture_failed");
    this.transition(SessionState.IDLE);
    this.stopSource(session).catch((stopErr: unknown) => {
      this.logger.warn(`Audio source cleanup failed: ${errorMessage(stopErr)}`);
    });
    this.notify(() => this.deps.hooks?.onSessionEnded?.("capture_failed", err.message));
  }

  /** Bounded by the stop timeout so a wedged device cannot hold the session in STOPPING. */
  private async stopSource(session: Session): Promise<void> {
    const { stopTimeoutMs } = this.deps.config;
    const timeout = new AbortController();
    try {
      const stopped = await Promise.race([
        session.source.stop().then(() => true),
        delay(stopTimeoutMs, timeout.signal).then(() => false),
      ]);
      if (!stopped) {
        this.logger.warn(`Audio source did not stop within ${stopTimeoutMs}ms; continuing without it`);
      }
    } catch (err) {
      this.logger.warn(`Audio source did not stop cleanly: ${errorMessage(err)}`);
    } finally {
      timeout.abort();
    }
  }

  /** Resolves true when the loop finished, false when the stop timeout elapsed first. */
  private async waitForLoop(session: Session): Promise<boolean> {
    const timeout = new AbortController();
    const drained = await Promise.race([
      session.loopDone.then(() => true),
      delay(this.deps.config.stopTimeoutMs, timeout.signal).then(() => false),
    ]);
    timeout.abort();
    return drained;
  }

  private endSession(session: Session, reason: SessionEndReason): void {
    session.endReason = reason;
    session.stoppedAt = this.clock();
  }

  private transition(to: SessionState): void {
    const allowed = VALID_TRANSITIONS.get(this.state) ?? [];
    if (!allowed.includes(to)) {
      throw new Error(`Invalid session transition: ${this.state} → ${to}`);
    }
    this.state = to;
    const sessionId = this.session?.id ?? null;
    this.notify(() => this.deps.hooks?.onStateChange?.(to, sessionId));
  }

  private notify(fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.logger.warn(`Session hook threw: ${errorMessage(err)}`);
    }
  }
}
