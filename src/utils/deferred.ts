// Typed deferred, kept out of the type barrel (src/types.ts) since it is runtime code.
// Used by CaptureQueue waiters.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
