/**
 * CorrelationBuffer: fuses independently arriving face and pose results into
 * FusedPoseSamples and keeps a bounded ring of the most recent ones.
 *
 * Every method is synchronous, so each call runs to completion on the event
 * loop without interleaving: the buffer's state is never observed half-updated.
 * In production `add` has a single caller, the `consume` loop draining the
 * per-kind result channels.
 *
 * Pairing policies (one per instance):
 *  - independent-latest: each result is merged with the other kind's latest
 *    reading as long as their validity windows overlap.
 *  - strict-pairing: results wait in a pending map until the other kind shows
 *    up for the same timestamp (± tolerance); unmatched entries expire.
 */

import type {
  DetectionKind,
  DetectionResult,
  FaceReadings,
  FusedPoseSample,
  LandmarkReader,
  PairingPolicy,
  PoseReadings,
} from "./types.js";
import { RingBuffer } from "./ring-buffer.js";
import type { BoundedQueue } from "./bounded-queue.js";
import { silentLogger, scopedLogger, type PipelineLogger } from "./logger.js";
import { errorMessage, monotonicMs, type Clock } from "./utils.js";

// ─── Config ─────────────────────────────────────────────────────────────────────

export interface CorrelationBufferOptions {
  reader: LandmarkReader;
  policy?: PairingPolicy;
  /** Ring capacity for fused samples. Default: 30 */
  capacity?: number;
  /** Validity window per kind for independent-latest. Default: 200 ms each */
  timeoutMs?: Partial<Record<DetectionKind, number>>;
  /** independent-latest: carry a stale kind's fields from the previous sample instead of skipping. */
  allowPartial?: boolean;
  /** strict-pairing: max |Δt| between a face and a pose result. Default: 0 */
  toleranceMs?: number;
  /** strict-pairing: pending entries older than this are evicted. Default: 200 */
  maxDelayMs?: number;
  /** strict-pairing: hard cap on pending entries. Default: 64 */
  maxPending?: number;
  clock?: Clock;
  logger?: PipelineLogger;
}

/** Rest pose used when allowPartial has nothing better to carry forward. */
export const NEUTRAL_SAMPLE: Omit<FusedPoseSample, "timestamp"> = {
  pitch: 0,
  roll: 0,
  yaw: 0,
  height: 50,
  gaze: { label: "center", ratio: 0.5 },
};

interface LatestReading<T> {
  readings: T;
  timestamp: number;
  validUntil: number;
}

interface PendingEntry {
  face?: FaceReadings;
  pose?: PoseReadings;
  receivedAt: number;
}

export interface CorrelationStats {
  fused: number;
  discarded: number;
  staleSkipped: number;
  pendingEvicted: number;
  timestampsBumped: number;
  /** Results older than one already held for the same kind (or already published). */
  outOfOrder: number;
}

// ─── CorrelationBuffer ──────────────────────────────────────────────────────────

export class CorrelationBuffer {
  private readonly reader: LandmarkReader;
  private readonly policy: PairingPolicy;
  private readonly timeoutMs: Record<DetectionKind, number>;
  private readonly allowPartial: boolean;
  private readonly toleranceMs: number;
  private readonly maxDelayMs: number;
  private readonly maxPending: number;
  private readonly clock: Clock;
  private readonly logger: PipelineLogger;

  private readonly ring: RingBuffer<FusedPoseSample>;
  private latestFace: LatestReading<FaceReadings> | null = null;
  private latestPose: LatestReading<PoseReadings> | null = null;
  private readonly pending = new Map<number, PendingEntry>();
  private lastPublishedAt: number | null = null;

  private stats: CorrelationStats = {
    fused: 0,
    discarded: 0,
    staleSkipped: 0,
    pendingEvicted: 0,
    timestampsBumped: 0,
    outOfOrder: 0,
  };

  constructor(options: CorrelationBufferOptions) {
    this.reader = options.reader;
    this.policy = options.policy ?? "independent-latest";
    this.timeoutMs = {
      face: options.timeoutMs?.face ?? 200,
      pose: options.timeoutMs?.pose ?? 200,
    };
    this.allowPartial = options.allowPartial ?? false;
    this.toleranceMs = options.toleranceMs ?? 0;
    this.maxDelayMs = options.maxDelayMs ?? 200;
    this.maxPending = options.maxPending ?? 64;
    this.clock = options.clock ?? monotonicMs;
    this.logger = scopedLogger(options.logger ?? silentLogger, "CorrelationBuffer");
    this.ring = new RingBuffer<FusedPoseSample>(options.capacity ?? 30);
  }

  // ─── Writes ─────────────────────────────────────────────────────────────────

  /**
   * Record a detector result. May publish a fused sample, depending on policy.
   * Returns the sample published by this call, if any.
   * @throws Error on an unknown kind
   */
  add(kind: DetectionKind, result: DetectionResult, timestamp: number): FusedPoseSample | null {
    if (kind !== "face" && kind !== "pose") {
      throw new Error(`Invalid detection kind: ${String(kind)}`);
    }

    if (kind === "face") {
      const readings = this.reader.readFace(result.landmarks);
      if (readings === null) return this.discard(kind, timestamp);
      return this.policy === "strict-pairing"
        ? this.addPending(timestamp, { face: readings })
        : this.addFace(readings, timestamp);
    }

    const readings = this.reader.readPose(result.landmarks);
    if (readings === null) return this.discard(kind, timestamp);
    return this.policy === "strict-pairing"
      ? this.addPending(timestamp, { pose: readings })
      : this.addPose(readings, timestamp);
  }

  /**
   * Single-writer loop: drain both result channels into add() until the
   * signal aborts or both channels close.
   */
  async consume(
    channels: Record<DetectionKind, BoundedQueue<DetectionResult>>,
    signal: AbortSignal,
    pollIntervalMs: number = 50,
  ): Promise<void> {
    while (!signal.aborted) {
      let moved = 0;
      for (const kind of ["face", "pose"] as const) {
        let result = channels[kind].poll();
        while (result !== undefined) {
          moved++;
          try {
            this.add(kind, result, result.timestamp);
          } catch (err) {
            this.logger.log(`Dropping ${kind} result: ${errorMessage(err)}`, "error");
          }
          result = channels[kind].poll();
        }
      }
      if (moved > 0) continue;
      if (channels.face.isClosed && channels.pose.isClosed) break;

      await Promise.race([
        channels.face.waitForItem(pollIntervalMs),
        channels.pose.waitForItem(pollIntervalMs),
      ]);
    }
  }

  // ─── Reads ──────────────────────────────────────────────────────────────────

  /** Most recent fused sample, or null if nothing has been fused yet. */
  latest(): { sample: FusedPoseSample; timestamp: number } | null {
    if (this.policy === "strict-pairing") this.evictStale();
    const sample = this.ring.peekLast();
    if (sample === undefined) return null;
    return { sample: { ...sample, gaze: { ...sample.gaze } }, timestamp: sample.timestamp };
  }

  /** True iff a fused sample was published within the last `maxAgeMs`. */
  isFresh(maxAgeMs: number): boolean {
    return this.lastPublishedAt !== null && this.clock() - this.lastPublishedAt < maxAgeMs;
  }

  /** Oldest-first copy of the ring. */
  snapshot(): FusedPoseSample[] {
    return this.ring.toArray().map((s) => ({ ...s, gaze: { ...s.gaze } }));
  }

  get size(): number {
    return this.ring.size;
  }

  get capacity(): number {
    return this.ring.capacity;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  getStats(): CorrelationStats {
    return { ...this.stats };
  }

  clear(): void {
    this.ring.clear();
    this.pending.clear();
    this.latestFace = null;
    this.latestPose = null;
    this.lastPublishedAt = null;
  }

  // ─── independent-latest ─────────────────────────────────────────────────────

  private addFace(readings: FaceReadings, timestamp: number): FusedPoseSample | null {
    if (this.latestFace !== null && timestamp < this.latestFace.timestamp) {
      return this.outOfOrder("face", timestamp, this.latestFace.timestamp);
    }
    this.latestFace = { readings, timestamp, validUntil: timestamp + this.timeoutMs.face };
    const pose = this.latestPose;
    if (pose !== null && this.overlaps(pose, timestamp, this.timeoutMs.face)) {
      return this.publish(readings, pose.readings, Math.max(timestamp, pose.timestamp));
    }
    return this.partial("pose", timestamp);
  }

  private addPose(readings: PoseReadings, timestamp: number): FusedPoseSample | null {
    if (this.latestPose !== null && timestamp < this.latestPose.timestamp) {
      return this.outOfOrder("pose", timestamp, this.latestPose.timestamp);
    }
    this.latestPose = { readings, timestamp, validUntil: timestamp + this.timeoutMs.pose };
    const face = this.latestFace;
    if (face !== null && this.overlaps(face, timestamp, this.timeoutMs.pose)) {
      return this.publish(face.readings, readings, Math.max(timestamp, face.timestamp));
    }
    return this.partial("face", timestamp);
  }

  /** Windows [t, t + timeout] of the stored reading and the incoming one intersect. */
  private overlaps<T>(other: LatestReading<T>, timestamp: number, incomingTimeoutMs: number): boolean {
    return other.validUntil >= timestamp && timestamp + incomingTimeoutMs >= other.timestamp;
  }

  /** The other kind is missing or stale: skip, or carry its fields forward if allowed. */
  private partial(missing: DetectionKind, timestamp: number): FusedPoseSample | null {
    this.stats.staleSkipped++;
    if (!this.allowPartial) {
      this.logger.log(`No fresh ${missing} reading to fuse with at ${timestamp}`, "debug");
      return null;
    }

    const previous = this.ring.peekLast() ?? { ...NEUTRAL_SAMPLE, timestamp };
    if (missing === "pose" && this.latestFace !== null) {
      return this.publish(this.latestFace.readings, { height: previous.height }, timestamp);
    }
    if (missing === "face" && this.latestPose !== null) {
      const face: FaceReadings = {
        pitch: previous.pitch,
        roll: previous.roll,
        yaw: previous.yaw,
        gaze: { ...previous.gaze },
      };
      return this.publish(face, this.latestPose.readings, timestamp);
    }
    return null;
  }

  // ─── strict-pairing ─────────────────────────────────────────────────────────

  private addPending(timestamp: number, part: { face?: FaceReadings; pose?: PoseReadings }): FusedPoseSample | null {
    this.evictStale();

    const matchKey = this.findMatch(timestamp, part.face !== undefined ? "pose" : "face");
    if (matchKey !== null) {
      const entry = this.pending.get(matchKey);
      this.pending.delete(matchKey);
      const face = part.face ?? entry?.face;
      const pose = part.pose ?? entry?.pose;
      if (face !== undefined && pose !== undefined) {
        const paired = Math.max(timestamp, matchKey);
        const last = this.ring.peekLast();
        if (last !== undefined && paired < last.timestamp) {
          return this.outOfOrder(part.face !== undefined ? "face" : "pose", paired, last.timestamp);
        }
        return this.publish(face, pose, paired);
      }
    }

    const existing = this.pending.get(timestamp);
    if (existing !== undefined) {
      // Same kind twice for one timestamp: newest wins.
      if (part.face !== undefined) existing.face = part.face;
      if (part.pose !== undefined) existing.pose = part.pose;
      return null;
    }

    if (this.pending.size >= this.maxPending) {
      const oldest = this.pending.keys().next();
      if (!oldest.done) {
        this.pending.delete(oldest.value);
        this.stats.pendingEvicted++;
      }
    }
    this.pending.set(timestamp, { ...part, receivedAt: this.clock() });
    return null;
  }

  private findMatch(timestamp: number, wanted: DetectionKind): number | null {
    const exact = this.pending.get(timestamp);
    if (exact !== undefined && exact[wanted] !== undefined) return timestamp;
    if (this.toleranceMs <= 0) return null;

    let best: number | null = null;
    for (const [key, entry] of this.pending) {
      if (entry[wanted] === undefined) continue;
      const delta = Math.abs(key - timestamp);
      if (delta <= this.toleranceMs && (best === null || delta < Math.abs(best - timestamp))) {
        best = key;
      }
    }
    return best;
  }

  private evictStale(): void {
    const now = this.clock();
    for (const [key, entry] of this.pending) {
      if (now - entry.receivedAt > this.maxDelayMs) {
        this.pending.delete(key);
        this.stats.pendingEvicted++;
      }
    }
  }

  // ─── Shared ─────────────────────────────────────────────────────────────────

  private publish(face: FaceReadings, pose: PoseReadings, timestamp: number): FusedPoseSample {
    const last = this.ring.peekLast();
    let stamped = timestamp;
    if (last !== undefined && stamped <= last.timestamp) {
      stamped = last.timestamp + 1;
      this.stats.timestampsBumped++;
    }

    const sample: FusedPoseSample = {
      pitch: face.pitch,
      roll: face.roll,
      yaw: face.yaw,
      height: pose.height,
      gaze: { ...face.gaze },
      timestamp: stamped,
    };
    this.ring.push(sample);
    this.lastPublishedAt = this.clock();
    this.stats.fused++;
    return { ...sample, gaze: { ...sample.gaze } };
  }

  private outOfOrder(kind: DetectionKind, timestamp: number, newer: number): null {
    this.stats.outOfOrder++;
    this.logger.log(`Late ${kind} result at ${timestamp} (already have ${newer}), ignoring`, "debug");
    return null;
  }

  private discard(kind: DetectionKind, timestamp: number): null {
    this.stats.discarded++;
    this.logger.log(`Unreadable ${kind} landmarks at ${timestamp}, discarding`, "debug");
    return null;
  }
}
