// Audio sources
// Deliver live mono LINEAR16 audio as fixed-size, sequence-numbered chunks.
//   - PushAudioSource: fed by the presentation surface (binary WebSocket frames
//     from a browser microphone).
//   - FfmpegAudioSource: reads a local input device through an ffmpeg child
//     process writing raw s16le to stdout.
// A source never restarts itself: a failure mid-session is reported through
// onError and capture stays stopped.

import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable } from "node:stream";
import type { AudioChunk } from "./types.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { BYTES_PER_SAMPLE } from "./audio-codec.js";
import { errorMessage } from "./utils.js";

export class CaptureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CaptureError";
  }
}

export interface AudioSourceHandlers {
  onChunk(chunk: AudioChunk): void;
  onError(err: CaptureError): void;
}

export interface AudioSource {
  /** @throws CaptureError when the device cannot be opened. */
  start(handlers: AudioSourceHandlers): Promise<void>;
  /** Stop capture and deliver any buffered tail. Safe to call when stopped. */
  stop(): Promise<void>;
  readonly isCapturing: boolean;
}

// ─── Chunker ────────────────────────────────────────────────────────────────────

/**
 * Slices an arbitrary byte stream into chunks of exactly `chunkSamples`
 * samples, numbered from 0.
 */
export class PcmChunker {
  private readonly chunkBytes: number;
  private readonly emit: (chunk: AudioChunk) => void;
  private pending: Buffer = Buffer.alloc(0);
  private sequence = 0;

  constructor(chunkSamples: number, emit: (chunk: AudioChunk) => void) {
    if (!Number.isInteger(chunkSamples) || chunkSamples <= 0) {
      throw new Error(`Invalid chunkSamples: ${chunkSamples}. Must be a positive integer.`);
    }
    this.chunkBytes = chunkSamples * BYTES_PER_SAMPLE;
    this.emit = emit;
  }

  get nextSequenceIndex(): number {
    return this.sequence;
  }

  get pendingBytes(): number {
    return this.pending.length;
  }

  write(data: Buffer): void {
    if (data.length === 0) return;
    this.pending = this.pending.length === 0 ? Buffer.from(data) : Buffer.concat([this.pending, data]);

    let offset = 0;
    while (this.pending.length - offset >= this.chunkBytes) {
      this.emitChunk(Buffer.from(this.pending.subarray(offset, offset + this.chunkBytes)));
      offset += this.chunkBytes;
    }
    if (offset > 0) {
      this.pending = Buffer.from(this.pending.subarray(offset));
    }
  }

  /** Emit the trailing partial chunk, dropping an odd final byte. */
  flushRemainder(): void {
    const usable = this.pending.length - (this.pending.length % BYTES_PER_SAMPLE);
    if (usable > 0) {
      this.emitChunk(Buffer.from(this.pending.subarray(0, usable)));
    }
    this.pending = Buffer.alloc(0);
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
    this.sequence = 0;
  }

  private emitChunk(pcm: Buffer): void {
    this.emit({ sequenceIndex: this.sequence++, pcm });
  }
}

// ─── Push source ────────────────────────────────────────────────────────────────

export class PushAudioSource implements AudioSource {
  private readonly chunkSamples: number;
  private readonly logger: Logger;
  private handlers: AudioSourceHandlers | null = null;
  private chunker: PcmChunker | null = null;

  constructor(chunkSamples: number, logger?: Logger) {
    this.chunkSamples = chunkSamples;
    this.logger = logger ?? createConsoleLogger("PushAudioSource");
  }

  get isCapturing(): boolean {
    return this.handlers !== null;
  }

  async start(handlers: AudioSourceHandlers): Promise<void> {
    if (this.handlers) {
      throw new CaptureError("Audio source is already capturing");
    }
    this.handlers = handlers;
    this.chunker = new PcmChunker(this.chunkSamples, (chunk) => handlers.onChunk(chunk));
  }

  async stop(): Promise<void> {
    if (!this.handlers) return;
    this.chunker?.flushRemainder();
    this.release();
  }

  /** Feed raw PCM bytes. Ignored while not capturing. */
  push(data: Buffer): void {
    if (!this.chunker) return;
    this.chunker.write(data);
  }

  /** Report an external capture failure and stop capturing. */
  fail(reason: string | Error): void {
    const handlers = this.handlers;
    if (!handlers) return;
    this.release();

    const err =
      reason instanceof CaptureError
        ? reason
        : new CaptureError(typeof reason === "string" ? reason : reason.message, { cause: reason });
    this.logger.error(`Capture failed: ${err.message}`);
    handlers.onError(err);
  }

  private release(): void {
    this.handlers = null;
    this.chunker = null;
  }
}

// ─── ffmpeg source ──────────────────────────────────────────────────────────────

/** The child-process surface FfmpegAudioSource relies on; ChildProcess satisfies it. */
export interface CaptureProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnCaptureProcess = (command: string, args: string[]) => CaptureProcess;

export interface FfmpegAudioSourceOptions {
  /** ffmpeg demuxer, e.g. "pulse", "alsa", "avfoundation", "dshow". */
  inputFormat: string;
  inputDevice: string;
  sampleRate: number;
  chunkSamples: number;
  /** ffmpeg must still be running this long after spawn for start() to succeed. Default: 300 */
  startStabilityDelayMs?: number;
  /** Time allowed after SIGINT before ffmpeg is killed with SIGKILL. Default: 2000 */
  stopGraceMs?: number;
  logger?: Logger;
  spawnProcess?: SpawnCaptureProcess;
}

const DEFAULT_START_STABILITY_DELAY_MS = 300;
const DEFAULT_STOP_GRACE_MS = 2000;

const defaultSpawn: SpawnCaptureProcess = (command, args) =>
  spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

export function describeCaptureFailure(stderr: string): string {
  const detail = stderr.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return "Microphone permission denied. Grant this process access to the audio input device.";
  }
  if (/Input\/output error|No such file|device not found|could not find|Connection refused/i.test(detail)) {
    return "Audio input device is unavailable. Verify FFMPEG_INPUT_FORMAT and FFMPEG_INPUT_DEVICE.";
  }
  if (detail) {
    return `Audio capture failed: ${detail}`;
  }
  return "Audio capture failed. Verify ffmpeg is installed and the input device is accessible.";
}

export class FfmpegAudioSource implements AudioSource {
  private readonly options: FfmpegAudioSourceOptions;
  private readonly logger: Logger;
  private readonly spawnProcess: SpawnCaptureProcess;
  private process: CaptureProcess | null = null;
  private chunker: PcmChunker | null = null;
  private stopping = false;

  constructor(options: FfmpegAudioSourceOptions) {
    this.options = options;
    this.logger = options.logger ?? createConsoleLogger("FfmpegAudioSource");
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
  }

  get isCapturing(): boolean {
    return this.process !== null;
  }

  buildArgs(): string[] {
    const { inputFormat, inputDevice, sampleRate } = this.options;
    return [
      "-hide_banner",
      "-loglevel",
      "error",
      "-f",
      inputFormat,
      "-i",
      inputDevice,
      "-ac",
      "1",
      "-ar",
      String(sampleRate),
      "-f",
      "s16le",
      "-acodec",
      "pcm_s16le",
      "pipe:1",
    ];
  }

  async start(handlers: AudioSourceHandlers): Promise<void> {
    if (this.process) {
      throw new CaptureError("Audio source is already capturing");
    }

    const chunker = new PcmChunker(this.options.chunkSamples, (chunk) => handlers.onChunk(chunk));
    let ffmpeg: CaptureProcess;
    try {
      ffmpeg = this.spawnProcess("ffmpeg", this.buildArgs());
    } catch (err) {
      throw new CaptureError(`Failed to launch ffmpeg: ${errorMessage(err)}`, { cause: err });
    }

    let stderrLog = "";
    let settled = false;
    this.stopping = false;

    ffmpeg.stderr?.on("data", (data: Buffer) => {
      stderrLog += data.toString();
    });
    ffmpeg.stdout?.on("data", (data: Buffer) => {
      chunker.write(data);
    });

    // Unexpected exit after a successful start.
    ffmpeg.on("close", (code: number | null) => {
      if (!settled || this.process !== ffmpeg) return;
      this.process = null;
      this.chunker = null;
      if (this.stopping) return;

      const err = new CaptureError(describeCaptureFailure(`${stderrLog}\nexit code=${code}`));
      this.logger.error(`ffmpeg exited mid-session: ${err.message}`);
      handlers.onError(err);
    });

    const stabilityDelay = this.options.startStabilityDelayMs ?? DEFAULT_START_STABILITY_DELAY_MS;

    await new Promise<void>((resolve, reject) => {
      // Stays attached for the life of the process: an unhandled "error" event would throw.
      ffmpeg.on("error", (err: Error) => {
        if (settled) {
          this.logger.warn(`ffmpeg process error: ${err.message}`);
          return;
        }
        settled = true;
        reject(new CaptureError(`Failed to launch ffmpeg: ${err.message}`, { cause: err }));
      });

      ffmpeg.once("spawn", () => {
        setTimeout(() => {
          if (settled) return;
          settled = true;
          if (ffmpeg.exitCode !== null) {
            reject(new CaptureError(describeCaptureFailure(stderrLog)));
            return;
          }
          this.process = ffmpeg;
          this.chunker = chunker;
          resolve();
        }, stabilityDelay);
      });

      ffmpeg.once("close", (code: number | null) => {
        if (settled) return;
        settled = true;
        reject(new CaptureError(describeCaptureFailure(`${stderrLog}\nexit code=${code}`)));
      });
    });

    this.logger.info(
      `Capture started (${this.options.inputFormat}:${this.options.inputDevice}, ${this.options.sampleRate} Hz)`,
    );
  }

  async stop(): Promise<void> {
    const current = this.process;
    if (!current) return;
    this.stopping = true;
    const chunker = this.chunker;

    const graceMs = this.options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    await new Promise<void>((resolve) => {
      const killTimer = setTimeout(() => {
        this.logger.warn(`ffmpeg did not exit ${graceMs}ms after SIGINT; sending SIGKILL`);
        current.kill("SIGKILL");
        resolve();
      }, graceMs);

      current.once("close", (code: number | null) => {
        clearTimeout(killTimer);
        // ffmpeg exits with 255 when interrupted.
        if (code !== 0 && code !== 255 && code !== null) {
          this.logger.warn(`ffmpeg exited with code ${code}`);
        }
        resolve();
      });
      current.kill("SIGINT");
    });

    if (this.process === current) {
      this.process = null;
      this.chunker = null;
    }
    chunker?.flushRemainder();
    this.logger.info("Capture stopped");
  }
}
