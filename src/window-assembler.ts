// Window Assembler
// Accumulates capture chunks into a rolling buffer and cuts transcription
// windows once enough audio has arrived. After each cut the trailing overlap is
// kept as the seed of the next window so a word spoken across the boundary is
// heard whole by at least one transcription call.
//
// Purely reactive: nothing happens without a chunk arriving, except flush().
// The buffer is owned exclusively by this class.

import type { AudioChunk, AudioWindow } from "./types.js";
import { pcmBufferToSamples } from "./audio-codec.js";

export interface WindowAssemblerConfig {
  sampleRate: number;
  /** Accumulated duration that triggers a window. Default: 3 */
  windowSeconds: number;
  /** Trailing audio carried into the next window. Must be < windowSeconds. Default: 1.5 */
  overlapSeconds: number;
  /** A flush only produces a window when the residual is longer than this. Default: 1 */
  minFlushSeconds: number;
}

export const DEFAULT_WINDOW_CONFIG: WindowAssemblerConfig = {
  sampleRate: 16000,
  windowSeconds: 3,
  overlapSeconds: 1.5,
  minFlushSeconds: 1,
};

interface BufferedPart {
  sequenceIndex: number;
  samples: Int16Array;
}

export class WindowAssembler {
  private readonly config: WindowAssemblerConfig;
  private readonly thresholdSamples: number;
  private readonly overlapSamples: number;
  private parts: BufferedPart[] = [];
  private totalSamples = 0;
  /** Samples appended since the last window was cut; zero means the buffer is pure overlap. */
  private freshSamples = 0;

  constructor(config: Partial<WindowAssemblerConfig> = {}) {
    this.config = { ...DEFAULT_WINDOW_CONFIG, ...config };
    const { sampleRate, windowSeconds, overlapSeconds, minFlushSeconds } = this.config;

    if (sampleRate <= 0) {
      throw new Error(`Invalid sampleRate: ${sampleRate}. Must be positive.`);
    }
    if (windowSeconds <= 0) {
      throw new Error(`Invalid windowSeconds: ${windowSeconds}. Must be positive.`);
    }
    if (overlapSeconds < 0 || overlapSeconds >= windowSeconds) {
      throw new Error(
        `Invalid overlapSeconds: ${overlapSeconds}. Must be >= 0 and less than windowSeconds (${windowSeconds}).`,
      );
    }
    if (minFlushSeconds < 0) {
      throw new Error(`Invalid minFlushSeconds: ${minFlushSeconds}. Must be >= 0.`);
    }

    this.thresholdSamples = Math.max(1, Math.round(windowSeconds * sampleRate));
    this.overlapSamples = Math.round(overlapSeconds * sampleRate);
  }

  /** Seconds of audio currently buffered, overlap included. */
  get bufferedSeconds(): number {
    return this.totalSamples / this.config.sampleRate;
  }

  /**
   * Append a chunk. Returns the whole buffer as a window when the threshold is
   * reached, otherwise null.
   */
  append(chunk: AudioChunk): AudioWindow | null {
    const samples = pcmBufferToSamples(chunk.pcm);
    if (samples.length === 0) {
      return null;
    }

    this.parts.push({ sequenceIndex: chunk.sequenceIndex, samples });
    this.totalSamples += samples.length;
    this.freshSamples += samples.length;

    if (this.totalSamples < this.thresholdSamples) {
      return null;
    }

    const window = this.cut(false);
    this.retainOverlap();
    return window;
  }

  /**
   * Final cut at session stop. The residual becomes a window only when it is
   * longer than `minFlushSeconds` and holds audio not already submitted;
   * otherwise it is discarded. The buffer is empty afterwards.
   */
  flush(): AudioWindow | null {
    const longEnough = this.bufferedSeconds > this.config.minFlushSeconds;
    const window = longEnough && this.freshSamples > 0 ? this.cut(true) : null;
    this.reset();
    return window;
  }

  reset(): void {
    this.parts = [];
    this.totalSamples = 0;
    this.freshSamples = 0;
  }

  private cut(flushed: boolean): AudioWindow {
    const samples = new Int16Array(this.totalSamples);
    let offset = 0;
    for (const part of this.parts) {
      samples.set(part.samples, offset);
      offset += part.samples.length;
    }

    return {
      firstSequenceIndex: this.parts[0].sequenceIndex,
      lastSequenceIndex: this.parts[this.parts.length - 1].sequenceIndex,
      samples,
      durationSeconds: this.totalSamples / this.config.sampleRate,
      flushed,
    };
  }

  /** Re-seed the buffer with the trailing overlap (whole buffer when shorter). */
  private retainOverlap(): void {
    this.freshSamples = 0;
    if (this.totalSamples <= this.overlapSamples) {
      return;
    }

    const kept: BufferedPart[] = [];
    let needed = this.overlapSamples;
    for (let i = this.parts.length - 1; i >= 0 && needed > 0; i--) {
      const part = this.parts[i];
      if (part.samples.length <= needed) {
        kept.unshift(part);
        needed -= part.samples.length;
      } else {
        kept.unshift({
          sequenceIndex: part.sequenceIndex,
          samples: part.samples.slice(part.samples.length - needed),
        });
        needed = 0;
      }
    }

    this.parts = kept;
    this.totalSamples = this.overlapSamples;
  }
}
