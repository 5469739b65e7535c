// Processing Loop
// The single processing context of a session. Chunks are taken from the
// capture queue in order and fed to the window assembler; every window is
// transcribed, and every new segment handed downstream, before the next chunk
// is taken. When the queue is closed and drained the residual audio is flushed.

import type { AudioChunk, AudioWindow, TranscriptSegment } from "./types.js";
import type { CaptureQueue } from "./capture-queue.js";
import type { WindowAssembler } from "./window-assembler.js";
import type { TranscriptionWorker } from "./transcription-worker.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { errorMessage } from "./utils.js";

export interface ProcessingLoopDeps {
  queue: CaptureQueue<AudioChunk>;
  assembler: WindowAssembler;
  worker: TranscriptionWorker;
  /** Awaited before the next chunk is taken. */
  onSegment: (segment: TranscriptSegment) => Promise<void>;
  logger?: Logger;
}

export class ProcessingLoop {
  private readonly deps: ProcessingLoopDeps;
  private readonly logger: Logger;
  private readonly abort = new AbortController();
  private loopPromise: Promise<void> | null = null;
  private windows = 0;

  constructor(deps: ProcessingLoopDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("ProcessingLoop");
  }

  get cancelled(): boolean {
    return this.abort.signal.aborted;
  }

  get windowCount(): number {
    return this.windows;
  }

  /** Start the loop (once); later calls return the same promise. */
  run(): Promise<void> {
    if (!this.loopPromise) {
      this.loopPromise = this.loop();
    }
    return this.loopPromise;
  }

  /**
   * Abandon the loop. No further chunk is taken and a transcription still in
   * flight is not committed. Closes the queue to release a pending take().
   */
  cancel(): void {
    if (this.cancelled) return;
    this.abort.abort();
    this.deps.queue.close();
    this.logger.warn("Processing loop cancelled");
  }

  private async loop(): Promise<void> {
    const { queue, assembler } = this.deps;

    for (;;) {
      const chunk = await queue.take();
      if (this.cancelled) return;
      if (chunk === null) break;

      const window = assembler.append(chunk);
      if (window) {
        await this.process(window);
        if (this.cancelled) return;
      }
    }

    const residual = assembler.flush();
    if (residual) {
      this.logger.debug(`Flushing ${residual.durationSeconds.toFixed(2)}s of residual audio`);
      await this.process(residual);
    }
  }

  private async process(window: AudioWindow): Promise<void> {
    this.windows++;
    const segment = await this.deps.worker.transcribe(window, this.abort.signal);
    if (!segment || this.cancelled) return;

    try {
      await this.deps.onSegment(segment);
    } catch (err) {
      this.logger.error(`Segment handler failed at sequence ${segment.sequenceIndex}: ${errorMessage(err)}`);
    }
  }
}
