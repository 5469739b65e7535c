// Shared utilities for the Live Meeting Analyzer.
//
// Deterministic text helpers used by the ledger, the summarization engine and
// the snapshot API so that every component counts words the same way.

/** Split text on runs of whitespace, ignoring leading/trailing blanks. */
export function splitWords(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) return [];
  return trimmed.split(/\s+/);
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

/** The last `n` words of `text`, joined by single spaces. */
export function lastWords(text: string, n: number): string {
  const words = splitWords(text);
  if (words.length <= n) return words.join(" ");
  return words.slice(words.length - n).join(" ");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Resolve after `ms` milliseconds. The timer is cleared if `signal` aborts first. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true },
    );
  });
}
