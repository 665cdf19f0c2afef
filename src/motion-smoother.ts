/**
 * MotionSmoother: per-channel exponential smoothing plus the gate that
 * decides whether (and how slowly) the actuator should move.
 *
 * Smoothing and gating work in each channel's input units (degrees for the
 * angles, 0–100 for height, 50–130 for the ears). Conversion to actuator
 * units happens afterwards through CHANNEL_MAP.
 */

import type { ChannelKey, ChannelValues, EmitDecision } from "./types.js";
import { CHANNEL_KEYS } from "./types.js";
import { clamp, degreesToRadians, monotonicMs, type Clock } from "./utils.js";

// ─── Channel mapping table ──────────────────────────────────────────────────────

export interface ChannelMapping {
  /** What the channel carries. */
  source: string;
  /** Clamp applied to the smoothed value, input units. */
  min: number;
  max: number;
  /** Clamped input units → actuator units. */
  toActuator: (value: number) => number;
}

export const CHANNEL_MAP: Readonly<Record<ChannelKey, ChannelMapping>> = {
  x: { source: "pitch (degrees)", min: -30, max: 30, toActuator: degreesToRadians },
  y: { source: "roll (degrees)", min: -30, max: 30, toActuator: degreesToRadians },
  z: { source: "yaw (degrees)", min: -30, max: 30, toActuator: degreesToRadians },
  h: { source: "height (0-100)", min: 0, max: 100, toActuator: (v) => v },
  e: { source: "ears (50-130)", min: 50, max: 130, toActuator: (v) => v },
};

/** Gaze ratio (0..1) → ear position in the e channel's input range. */
export function gazeRatioToEars(ratio: number): number {
  const { min, max } = CHANNEL_MAP.e;
  return min + clamp(ratio, 0, 1) * (max - min);
}

export const DEFAULT_ALPHA: Readonly<ChannelValues> = { x: 0.3, y: 0.2, z: 0.1, h: 0.3, e: 0.2 };

/** Rest pose: head level, body mid-height, ears mid-range. */
export const NEUTRAL_POSE: Readonly<ChannelValues> = { x: 0, y: 0, z: 0, h: 50, e: 70 };

export interface MotionSmootherOptions {
  alpha?: Partial<ChannelValues>;
  /** Maximum emit rate. Default: 10 Hz */
  rateHz?: number;
  /** Minimum change (input units) on any requested channel before emitting. Default: 2.0 */
  threshold?: number;
  minDurationMs?: number;
  maxDurationMs?: number;
  seed?: Partial<ChannelValues>;
  clock?: Clock;
}

function assertChannel(channel: string): asserts channel is ChannelKey {
  if (!(CHANNEL_KEYS as readonly string[]).includes(channel)) {
    throw new Error(`Invalid channel key: "${channel}". Expected one of ${CHANNEL_KEYS.join(", ")}`);
  }
}

// ─── MotionSmoother ─────────────────────────────────────────────────────────────

export class MotionSmoother {
  private readonly alpha: ChannelValues;
  private readonly seed: ChannelValues;
  private readonly minIntervalMs: number;
  private readonly threshold: number;
  private readonly minDurationMs: number;
  private readonly maxDurationMs: number;
  private readonly clock: Clock;

  private smoothed: ChannelValues;
  private lastEmitted: ChannelValues;
  private lastEmitAt: number;

  constructor(options: MotionSmootherOptions = {}) {
    this.alpha = { ...DEFAULT_ALPHA, ...options.alpha };
    for (const key of CHANNEL_KEYS) {
      const a = this.alpha[key];
      if (!(a > 0 && a <= 1)) {
        throw new Error(`alpha for channel "${key}" must be in (0, 1], got ${a}`);
      }
    }
    const rateHz = options.rateHz ?? 10;
    if (!(rateHz > 0)) {
      throw new Error(`rateHz must be positive, got ${rateHz}`);
    }
    this.minIntervalMs = 1000 / rateHz;
    this.threshold = options.threshold ?? 2.0;
    this.minDurationMs = options.minDurationMs ?? 100;
    this.maxDurationMs = options.maxDurationMs ?? 400;
    this.clock = options.clock ?? monotonicMs;

    this.seed = { ...NEUTRAL_POSE, ...options.seed };
    this.smoothed = { ...this.seed };
    this.lastEmitted = { ...this.seed };
    // First call is always eligible.
    this.lastEmitAt = -Infinity;
  }

  /**
   * Fold one raw reading into the channel's running average.
   * Returns the new smoothed value, or null (state untouched) when `value`
   * is missing or not a finite number.
   * @throws Error on an unknown channel
   */
  smooth(channel: ChannelKey, value: number | null | undefined): number | null {
    assertChannel(channel);
    if (value === null || value === undefined || !Number.isFinite(value)) {
      return null;
    }
    const a = this.alpha[channel];
    const next = a * value + (1 - a) * this.smoothed[channel];
    this.smoothed[channel] = next;
    return next;
  }

  /**
   * Decide whether to emit now. Within the minimum interval: never. After it:
   * only if some requested channel moved more than the threshold since the
   * last emit; the transition time grows with that change.
   */
  shouldEmit(channels: readonly ChannelKey[]): EmitDecision {
    for (const channel of channels) assertChannel(channel);

    const now = this.clock();
    if (now - this.lastEmitAt < this.minIntervalMs) {
      return { shouldEmit: false, transitionDurationMs: null };
    }

    let maxChange = 0;
    for (const channel of channels) {
      maxChange = Math.max(maxChange, Math.abs(this.smoothed[channel] - this.lastEmitted[channel]));
    }
    if (!(maxChange > this.threshold)) {
      return { shouldEmit: false, transitionDurationMs: null };
    }

    this.lastEmitAt = now;
    for (const channel of channels) {
      this.lastEmitted[channel] = this.smoothed[channel];
    }
    const seconds = clamp(maxChange / 100, this.minDurationMs / 1000, this.maxDurationMs / 1000);
    return { shouldEmit: true, transitionDurationMs: Math.round(seconds * 1000) };
  }

  /** Current smoothed value in input units. */
  value(channel: ChannelKey): number {
    assertChannel(channel);
    return this.smoothed[channel];
  }

  /** Current smoothed value clamped and converted to actuator units. */
  toActuator(channel: ChannelKey): number {
    assertChannel(channel);
    const mapping = CHANNEL_MAP[channel];
    return mapping.toActuator(clamp(this.smoothed[channel], mapping.min, mapping.max));
  }

  snapshot(): ChannelValues {
    return { ...this.smoothed };
  }

  /** Reseed every channel with the neutral pose and make the next emit eligible. */
  reset(): void {
    this.smoothed = { ...this.seed };
    this.lastEmitted = { ...this.seed };
    this.lastEmitAt = -Infinity;
  }
}
