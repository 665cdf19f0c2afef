/**
 * DetectionDispatch: fans frames out to the face and pose detectors.
 *
 * submit() stamps each frame with a strictly increasing timestamp and offers
 * it to a small intake queue; a full queue means the frame is dropped, never
 * that the caller waits. A pump loop hands queued frames to both detectors.
 * Detector callbacks only push into a per-kind result channel, which the
 * CorrelationBuffer drains from its own loop.
 */

import type { DetectionKind, DetectionResult, Frame, Stoppable } from "./types.js";
import { DETECTION_KINDS } from "./types.js";
import type { Detector } from "./detectors.js";
import { BoundedQueue } from "./bounded-queue.js";
import { silentLogger, scopedLogger, type PipelineLogger } from "./logger.js";
import { createDeferred } from "./utils/deferred.js";
import { errorMessage, monotonicMs, settlesWithin, type Clock } from "./utils.js";

export interface DetectionDispatchOptions {
  logger?: PipelineLogger;
  clock?: Clock;
  /** Frames waiting for the pump. Default: 8 */
  intakeCapacity?: number;
  /** Frames a single detector may hold without answering. Default: 4 */
  maxInFlight?: number;
  /** Results buffered per kind before the oldest is evicted. Default: 16 */
  resultCapacity?: number;
  /** A detector that has not answered after this long gets its slot back. Default: 1000 */
  inFlightTimeoutMs?: number;
  /** Pump wake-up interval while idle; bounds stop() latency. Default: 100 */
  pollIntervalMs?: number;
}

interface StampedFrame {
  frame: Frame;
  timestamp: number;
}

export interface DetectionDispatchStats {
  submitted: number;
  droppedAtIntake: number;
  skippedBusy: Record<DetectionKind, number>;
  delivered: Record<DetectionKind, number>;
  duplicateCallbacks: number;
  expired: number;
  resultsEvicted: number;
}

export class DetectionDispatch implements Stoppable {
  private readonly detectors: Record<DetectionKind, Detector>;
  private readonly logger: PipelineLogger;
  private readonly clock: Clock;
  private readonly maxInFlight: number;
  private readonly inFlightTimeoutMs: number;
  private readonly pollIntervalMs: number;

  private readonly intake: BoundedQueue<StampedFrame>;
  private readonly channels: Record<DetectionKind, BoundedQueue<DetectionResult>>;
  private readonly inFlight: Record<DetectionKind, number> = { face: 0, pose: 0 };
  private readonly expiryTimers = new Set<ReturnType<typeof setTimeout>>();

  private lastTimestamp = -1;
  private running = false;
  private started = false;
  private stopped = false;
  private readonly exited = createDeferred<void>();

  private stats: DetectionDispatchStats = {
    submitted: 0,
    droppedAtIntake: 0,
    skippedBusy: { face: 0, pose: 0 },
    delivered: { face: 0, pose: 0 },
    duplicateCallbacks: 0,
    expired: 0,
    resultsEvicted: 0,
  };

  constructor(detectors: Record<DetectionKind, Detector>, options: DetectionDispatchOptions = {}) {
    for (const kind of DETECTION_KINDS) {
      if (detectors[kind].kind !== kind) {
        throw new Error(`Detector registered as "${kind}" reports kind "${detectors[kind].kind}"`);
      }
    }
    this.detectors = detectors;
    this.logger = scopedLogger(options.logger ?? silentLogger, "DetectionDispatch");
    this.clock = options.clock ?? monotonicMs;
    this.maxInFlight = options.maxInFlight ?? 4;
    this.inFlightTimeoutMs = options.inFlightTimeoutMs ?? 1000;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;

    this.intake = new BoundedQueue<StampedFrame>(options.intakeCapacity ?? 8);
    const resultCapacity = options.resultCapacity ?? 16;
    this.channels = {
      face: new BoundedQueue<DetectionResult>(resultCapacity),
      pose: new BoundedQueue<DetectionResult>(resultCapacity),
    };
  }

  // ─── Public API ─────────────────────────────────────────────────────────────

  /**
   * Stamp and queue a frame for detection. Returns false (frame dropped) when
   * the intake queue is full or the dispatcher is stopped. Never blocks.
   */
  submit(frame: Frame): boolean {
    if (this.stopped) return false;

    let timestamp = this.clock();
    if (timestamp <= this.lastTimestamp) {
      timestamp = this.lastTimestamp + 1;
    }

    if (!this.intake.offer({ frame, timestamp })) {
      this.stats.droppedAtIntake++;
      this.logger.log("Detection queue full, dropping frame", "debug");
      return false;
    }

    this.lastTimestamp = timestamp;
    this.stats.submitted++;
    return true;
  }

  /** Start the pump loop. */
  start(): void {
    if (this.started || this.stopped) {
      this.logger.log("start() ignored: already started or stopped", "warning");
      return;
    }
    this.started = true;
    this.running = true;
    void this.pumpLoop();
  }

  /** Result channel for one detector kind; drained by the CorrelationBuffer. */
  results(kind: DetectionKind): BoundedQueue<DetectionResult> {
    return this.channels[kind];
  }

  /** Idempotent. Closes the intake and result channels and closes both detectors. */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.running = false;
    this.intake.close();
    for (const kind of DETECTION_KINDS) {
      this.channels[kind].close();
    }
    for (const timer of this.expiryTimers) clearTimeout(timer);
    this.expiryTimers.clear();

    for (const kind of DETECTION_KINDS) {
      const detector = this.detectors[kind];
      if (!detector.close) continue;
      try {
        const closing = detector.close();
        if (closing instanceof Promise) {
          closing.catch((err: unknown) => {
            this.logger.log(`Closing ${kind} detector failed: ${errorMessage(err)}`, "error");
          });
        }
      } catch (err) {
        this.logger.log(`Closing ${kind} detector failed: ${errorMessage(err)}`, "error");
      }
    }

    if (!this.started) this.exited.resolve();
    this.logger.log("Stopped", "info");
  }

  join(timeoutMs: number): Promise<boolean> {
    return settlesWithin(this.exited.promise, timeoutMs);
  }

  getStats(): DetectionDispatchStats {
    return {
      ...this.stats,
      skippedBusy: { ...this.stats.skippedBusy },
      delivered: { ...this.stats.delivered },
    };
  }

  get queuedFrames(): number {
    return this.intake.size;
  }

  // ─── Internal ───────────────────────────────────────────────────────────────

  private async pumpLoop(): Promise<void> {
    this.logger.log("Pump started", "info");
    try {
      while (this.running) {
        const item = await this.intake.take(this.pollIntervalMs);
        if (item === undefined || !this.running) continue;
        for (const kind of DETECTION_KINDS) {
          this.dispatchTo(kind, item);
        }
      }
    } catch (err) {
      this.logger.log(`Pump crashed: ${errorMessage(err)}`, "critical");
    } finally {
      this.running = false;
      this.logger.log("Pump exited", "info");
      this.exited.resolve();
    }
  }

  private dispatchTo(kind: DetectionKind, item: StampedFrame): void {
    if (this.inFlight[kind] >= this.maxInFlight) {
      this.stats.skippedBusy[kind]++;
      this.logger.log(`${kind} detector busy, skipping frame ${item.timestamp}`, "debug");
      return;
    }

    this.inFlight[kind]++;
    let slotHeld = true;
    let answered = false;

    const releaseSlot = () => {
      if (!slotHeld) return;
      slotHeld = false;
      this.inFlight[kind]--;
      clearTimeout(timer);
      this.expiryTimers.delete(timer);
    };

    const timer = setTimeout(() => {
      if (slotHeld) {
        this.stats.expired++;
        this.logger.log(`${kind} detector never answered frame ${item.timestamp}`, "debug");
      }
      releaseSlot();
    }, this.inFlightTimeoutMs);
    this.expiryTimers.add(timer);

    const callback = (result: DetectionResult) => {
      if (answered) {
        this.stats.duplicateCallbacks++;
        this.logger.log(`${kind} detector answered frame ${item.timestamp} twice, ignoring`, "warning");
        return;
      }
      answered = true;
      releaseSlot();

      if (result.kind !== kind) {
        this.logger.log(`${kind} detector delivered a "${result.kind}" result, ignoring`, "error");
        return;
      }
      if (this.stopped) return;

      this.stats.delivered[kind]++;
      if (this.channels[kind].push(result) !== undefined) {
        this.stats.resultsEvicted++;
      }
    };

    try {
      this.detectors[kind].detect(item.frame, item.timestamp, callback);
    } catch (err) {
      releaseSlot();
      this.logger.log(`${kind} detector threw on frame ${item.timestamp}: ${errorMessage(err)}`, "error");
    }
  }
}
