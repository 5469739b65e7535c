// Transcription Worker
// Converts one audio window into at most one transcript segment. Failures are
// logged and the window is dropped; there is no retry.

import type { AudioWindow, TranscriptSegment } from "./types.js";
import type { SpeechToText } from "./speech-to-text.js";
import type { TranscriptLedger } from "./transcript-ledger.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { pcm16ToFloat32 } from "./audio-codec.js";
import { errorMessage } from "./utils.js";

export interface TranscriptionWorkerOptions {
  sampleRate: number;
  languageHint: string;
  logger?: Logger;
}

export class TranscriptionWorker {
  private readonly speechToText: SpeechToText;
  private readonly ledger: TranscriptLedger;
  private readonly sampleRate: number;
  private readonly languageHint: string;
  private readonly logger: Logger;
  private failures = 0;

  constructor(speechToText: SpeechToText, ledger: TranscriptLedger, options: TranscriptionWorkerOptions) {
    this.speechToText = speechToText;
    this.ledger = ledger;
    this.sampleRate = options.sampleRate;
    this.languageHint = options.languageHint;
    this.logger = options.logger ?? createConsoleLogger("TranscriptionWorker");
  }

  /** Windows dropped because the backend call failed. */
  get failureCount(): number {
    return this.failures;
  }

  /**
   * Transcribe a window and, when it yields text, append exactly one segment to
   * the ledger.
   *
   * @param signal - When aborted before the backend answers, the result is
   *   discarded and nothing is committed.
   * @returns The committed segment, or null for silence, failure or abort.
   */
  async transcribe(window: AudioWindow, signal?: AbortSignal): Promise<TranscriptSegment | null> {
    const samples = pcm16ToFloat32(window.samples);

    let text: string;
    try {
      const parts = await this.speechToText.transcribe(samples, this.sampleRate, this.languageHint);
      text = parts
        .map((p) => p.text.trim())
        .filter((t) => t.length > 0)
        .join(" ");
    } catch (err) {
      this.failures++;
      this.logger.error(
        `Transcription failed for chunks ${window.firstSequenceIndex}-${window.lastSequenceIndex}: ${errorMessage(err)}`,
      );
      return null;
    }

    if (signal?.aborted) {
      return null;
    }
    if (text.length === 0) {
      this.logger.debug(`No speech in chunks ${window.firstSequenceIndex}-${window.lastSequenceIndex}`);
      return null;
    }

    return this.ledger.append(window.lastSequenceIndex, text);
  }
}
