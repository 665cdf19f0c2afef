// Pose Relay - One-shot exit signal
// Each loop resolves its deferred on the way out; join() races it against a
// timeout. Resolving twice (stop() before start(), then a late finally) is a no-op.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let settle: (value: T) => void = () => {};
  let settled = false;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return {
    promise,
    resolve(value: T): void {
      if (settled) return;
      settled = true;
      settle(value);
    },
  };
}
