// Live Meeting Analyzer - Shared TypeScript interfaces and types
// Runtime code stays out of this module; helpers live in utils.ts and utils/.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionState {
  IDLE = "idle",
  RECORDING = "recording",
  STOPPING = "stopping",
}

export type SessionEndReason = "completed" | "no_speech" | "capture_failed";

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

// ─── Audio ──────────────────────────────────────────────────────────────────────

/**
 * A fixed-size block of mono LINEAR16 (little-endian) samples as delivered by
 * an AudioSource. Sequence indices start at 0 and increase by one per chunk.
 */
export interface AudioChunk {
  readonly sequenceIndex: number;
  readonly pcm: Buffer;
}

/**
 * Contiguous span of audio handed to transcription as one unit.
 * Consecutive windows share the configured overlap tail.
 */
export interface AudioWindow {
  firstSequenceIndex: number;
  lastSequenceIndex: number;
  samples: Int16Array;
  durationSeconds: number;
  /** True when produced by an explicit flush at session stop. */
  flushed: boolean;
}

// ─── Transcript ─────────────────────────────────────────────────────────────────

export interface TranscriptSegment {
  /** Sequence index of the last audio chunk in the window this text came from. */
  sequenceIndex: number;
  text: string;
  wordCount: number;
}

export interface RollingSummary {
  text: string;
  wordCount: number;
}

// ─── Analysis ───────────────────────────────────────────────────────────────────

export interface AnalysisResult {
  /** Short overview of what is being discussed. Holds the error description for failed passes. */
  summary: string;
  issues: string[];
  recommendations: string[];
  openQuestions: string[];
  actionItems: string[];
  error: string | null;
}

export type AnalysisProfile = "general" | "technical";

export type EngineState = "idle" | "active" | "finalizing";

export interface EngineStats {
  durationMinutes: number;
  wordCount: number;
  segmentCount: number;
  summaryCount: number;
  analysisCount: number;
  issuesIdentified: number;
  recommendationsGiven: number;
}

// ─── Outcomes ───────────────────────────────────────────────────────────────────

export type OutcomeCode =
  | "started"
  | "already_recording"
  | "capture_failed"
  | "completed"
  | "no_speech"
  | "not_recording"
  | "cleared"
  | "nothing_to_clear";

export interface Outcome {
  success: boolean;
  code: OutcomeCode;
  message: string;
}

export interface StopOutcome extends Outcome {
  finalReport: AnalysisResult | null;
}

// ─── Snapshots ──────────────────────────────────────────────────────────────────

export interface SessionSnapshot {
  sessionId: string | null;
  state: SessionState;
  wordCount: number;
  segmentCount: number;
  durationSeconds: number;
  wordsPerMinute: number;
  analysisCount: number;
  summaryCount: number;
  hasFinalReport: boolean;
  endReason: SessionEndReason | null;
}

// ─── Configuration ──────────────────────────────────────────────────────────────

export type SpeechToTextBackend = "openai" | "deepgram";
export type AudioSourceKind = "websocket" | "ffmpeg";

export interface CaptureConfig {
  sampleRate: number;
  chunkSamples: number;
  windowSeconds: number;
  overlapSeconds: number;
  minFlushSeconds: number;
  queueHighWaterMark: number;
  languageHint: string;
}

export interface AnalysisConfig {
  wordsPerAnalysis: number;
  wordsPerRollingSummary: number;
  maxPriorSummaryWords: number;
  finalTranscriptWordCap: number;
  profile: AnalysisProfile;
}

export interface AppConfig {
  port: number;
  capture: CaptureConfig;
  analysis: AnalysisConfig;
  stopTimeoutMs: number;
  audioSource: AudioSourceKind;
  ffmpeg: { inputFormat: string; inputDevice: string };
  speechToText: { backend: SpeechToTextBackend; model: string; apiKey: string };
  completion: { apiKey: string; baseURL: string | null; model: string };
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

export type ServerMessage =
  | { type: "state_change"; state: SessionState; sessionId: string | null }
  | { type: "transcript_segment"; segment: TranscriptSegment }
  | { type: "analysis"; analysis: AnalysisResult }
  | { type: "session_ended"; reason: SessionEndReason; message: string }
  | { type: "error"; message: string };
