// Property-Based Tests for WindowAssembler: overlap continuity
// Every cut window is at least the threshold long, consecutive windows share
// exactly the overlap tail, and no stream sample is skipped or reordered.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { WindowAssembler } from "./window-assembler.js";
import type { AudioChunk, AudioWindow } from "./types.js";

const SAMPLE_RATE = 10;
const WINDOW_SAMPLES = 30;
const OVERLAP_SAMPLES = 15;
const VALUE_MODULUS = 30000;

/** Split a counting stream (0, 1, 2, ...) into chunks of the given sizes. */
function buildChunks(sizes: number[]): AudioChunk[] {
  let next = 0;
  return sizes.map((size, sequenceIndex) => {
    const pcm = Buffer.alloc(size * 2);
    for (let i = 0; i < size; i++) {
      pcm.writeInt16LE(next % VALUE_MODULUS, i * 2);
      next++;
    }
    return { sequenceIndex, pcm };
  });
}

function runAssembler(sizes: number[]): { windows: AudioWindow[]; residual: AudioWindow | null } {
  const assembler = new WindowAssembler({
    sampleRate: SAMPLE_RATE,
    windowSeconds: WINDOW_SAMPLES / SAMPLE_RATE,
    overlapSeconds: OVERLAP_SAMPLES / SAMPLE_RATE,
    minFlushSeconds: 1,
  });
  const windows: AudioWindow[] = [];
  for (const chunk of buildChunks(sizes)) {
    const window = assembler.append(chunk);
    if (window) windows.push(window);
  }
  return { windows, residual: assembler.flush() };
}

const chunkSizes = fc.array(fc.integer({ min: 1, max: 40 }), { minLength: 1, maxLength: 60 });

describe("WindowAssembler properties", () => {
  it("cut windows are never shorter than the threshold", () => {
    fc.assert(
      fc.property(chunkSizes, (sizes) => {
        const { windows } = runAssembler(sizes);
        for (const w of windows) {
          expect(w.samples.length).toBeGreaterThanOrEqual(WINDOW_SAMPLES);
          expect(w.flushed).toBe(false);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("each window starts with the previous window's overlap tail", () => {
    fc.assert(
      fc.property(chunkSizes, (sizes) => {
        const { windows, residual } = runAssembler(sizes);
        const all = residual ? [...windows, residual] : windows;
        for (let i = 1; i < all.length; i++) {
          const prevTail = Array.from(all[i - 1].samples.slice(-OVERLAP_SAMPLES));
          const nextHead = Array.from(all[i].samples.slice(0, OVERLAP_SAMPLES));
          expect(nextHead).toEqual(prevTail);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("windows are contiguous runs of the input stream", () => {
    fc.assert(
      fc.property(chunkSizes, (sizes) => {
        const { windows, residual } = runAssembler(sizes);
        const all = residual ? [...windows, residual] : windows;
        for (const w of all) {
          const start = w.samples[0];
          for (let j = 1; j < w.samples.length; j++) {
            expect(w.samples[j]).toBe((start + j) % VALUE_MODULUS);
          }
        }
        if (all.length > 0) {
          expect(all[0].samples[0]).toBe(0);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("sequence indices never move backwards", () => {
    fc.assert(
      fc.property(chunkSizes, (sizes) => {
        const { windows, residual } = runAssembler(sizes);
        const all = residual ? [...windows, residual] : windows;
        for (let i = 1; i < all.length; i++) {
          expect(all[i].lastSequenceIndex).toBeGreaterThan(all[i - 1].lastSequenceIndex);
          expect(all[i].firstSequenceIndex).toBeGreaterThanOrEqual(all[i - 1].firstSequenceIndex);
        }
      }),
      { numRuns: 200 },
    );
  });
});
