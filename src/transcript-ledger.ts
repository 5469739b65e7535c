// Transcript Ledger
// Append-only record of every segment emitted during one session, in capture
// order. Single source of truth for word counts and transcript context.

import type { TranscriptSegment } from "./types.js";
import { countWords, lastWords } from "./utils.js";

export class TranscriptLedger {
  private readonly entries: TranscriptSegment[] = [];
  private totalWords = 0;

  /**
   * Append a segment.
   * @throws Error if `sequenceIndex` does not advance past the previous segment.
   */
  append(sequenceIndex: number, text: string): TranscriptSegment {
    const last = this.entries[this.entries.length - 1];
    if (last && sequenceIndex <= last.sequenceIndex) {
      throw new Error(
        `Out-of-order transcript segment: sequence ${sequenceIndex} after ${last.sequenceIndex}`,
      );
    }

    const segment: TranscriptSegment = Object.freeze({
      sequenceIndex,
      text,
      wordCount: countWords(text),
    });
    this.entries.push(segment);
    this.totalWords += segment.wordCount;
    return segment;
  }

  get segments(): readonly TranscriptSegment[] {
    return this.entries.slice();
  }

  get segmentCount(): number {
    return this.entries.length;
  }

  get wordCount(): number {
    return this.totalWords;
  }

  /** The `n` most recent segments, oldest first. */
  recent(n: number): TranscriptSegment[] {
    if (n <= 0) return [];
    return this.entries.slice(-n);
  }

  fullText(): string {
    return this.entries.map((s) => s.text).join(" ");
  }

  /** The last `n` words of the full transcript. */
  lastWords(n: number): string {
    return lastWords(this.fullText(), n);
  }
}
