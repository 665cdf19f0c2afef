// Shared utilities for Pose Relay.
//
// Small deterministic helpers used across the pipeline components: clocks,
// clamping, cooperative sleeping and bounded joins.

// ─── Clock ──────────────────────────────────────────────────────────────────────

/** Millisecond clock used for timestamps and rate limiting. */
export type Clock = () => number;

/** Monotonic integer milliseconds since process start. */
export const monotonicMs: Clock = () => Math.floor(performance.now());

// ─── Numbers ────────────────────────────────────────────────────────────────────

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/** Round a value to the specified number of decimal places. */
export function roundTo(value: number, precision: number = 3): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

// ─── Timing ─────────────────────────────────────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Sleep up to `ms`, waking every `stepMs` to check `keepGoing`. Returns early
 * as soon as `keepGoing()` is false.
 */
export async function cooperativeSleep(
  ms: number,
  keepGoing: () => boolean,
  stepMs: number = 20,
): Promise<void> {
  const end = performance.now() + Math.max(0, ms);
  while (keepGoing()) {
    const remaining = end - performance.now();
    if (remaining <= 0) return;
    await sleep(Math.min(stepMs, remaining));
  }
}

/**
 * Wait for `promise` for at most `timeoutMs`. Resolves true if it settled in
 * time, false otherwise. Rejections count as settled.
 */
export async function settlesWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let expire: (value: false) => void = () => {};
  const timeout = new Promise<false>((resolve) => {
    expire = resolve;
  });
  const timer = setTimeout(() => expire(false), Math.max(0, timeoutMs));
  const settled = promise.then(
    () => true as const,
    () => true as const,
  );
  try {
    return await Promise.race([settled, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
