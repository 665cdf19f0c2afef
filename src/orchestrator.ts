// Pose Relay - Orchestrator
// Owns the pipeline lifecycle: waits for the camera, calibrates the neutral
// head pose, runs the fixed-period control loop, and shuts every unit down in
// order with a bounded wait for each.
//
// State machine:
//   idle → initializing → idle (initialized)
//   idle ↔ calibrating
//   idle → running
//   any of the above → stopping → stopped
//
// Calibrating while running does not leave `running`: the loop keeps going and
// the new offset replaces the old one when the window closes.

import { v4 as uuidv4 } from "uuid";
import { OrchestratorState } from "./types.js";
import type {
  ActuatorPayload,
  AngleOffset,
  ChannelKey,
  Frame,
  FusedPoseSample,
  PoseTelemetry,
} from "./types.js";
import type { FrameSource } from "./frame-source.js";
import type { DetectionDispatch, DetectionDispatchStats } from "./detection-dispatch.js";
import type { CorrelationBuffer, CorrelationStats } from "./correlation-buffer.js";
import type { OutputSlots, SlotStatus } from "./output-slots.js";
import { MotionSmoother, gazeRatioToEars, type MotionSmootherOptions } from "./motion-smoother.js";
import { silentLogger, scopedLogger, type PipelineLogger } from "./logger.js";
import { createDeferred } from "./utils/deferred.js";
import {
  clamp,
  cooperativeSleep,
  errorMessage,
  monotonicMs,
  roundTo,
  settlesWithin,
  sleep,
  type Clock,
} from "./utils.js";

// ─── Valid state transitions ────────────────────────────────────────────────────

const VALID_TRANSITIONS: ReadonlyMap<OrchestratorState, readonly OrchestratorState[]> = new Map([
  [OrchestratorState.IDLE, [OrchestratorState.INITIALIZING, OrchestratorState.CALIBRATING, OrchestratorState.RUNNING, OrchestratorState.STOPPING]],
  [OrchestratorState.INITIALIZING, [OrchestratorState.IDLE, OrchestratorState.STOPPING]],
  [OrchestratorState.CALIBRATING, [OrchestratorState.IDLE, OrchestratorState.STOPPING]],
  [OrchestratorState.RUNNING, [OrchestratorState.STOPPING]],
  [OrchestratorState.STOPPING, [OrchestratorState.STOPPED]],
  [OrchestratorState.STOPPED, []],
]);

/** Channels whose change can trigger a send. The ears follow along. */
const EMIT_CHANNELS: readonly ChannelKey[] = ["x", "y", "z", "h"];

const ZERO_OFFSET: AngleOffset = { pitch: 0, roll: 0, yaw: 0 };

// ─── Dependencies & options ─────────────────────────────────────────────────────

export interface OrchestratorDeps {
  frameSource: FrameSource;
  detection: DetectionDispatch;
  correlation: CorrelationBuffer;
  slots: OutputSlots;
  logger?: PipelineLogger;
  clock?: Clock;
}

export interface OrchestratorOptions {
  targetFps: number;
  /** Frame size handed to the detectors. */
  detectionWidth: number;
  detectionHeight: number;
  mirror: boolean;
  firstFrameTimeoutMs: number;
  firstFramePollMs: number;
  calibrationDurationMs: number;
  calibrationMaxSamples: number;
  /** Calibrated pitch/roll/yaw are clamped to ±this, degrees. */
  angleLimitDegrees: number;
  /** duration_ms for payloads built without an emit decision. */
  defaultDurationMs: number;
  /** Sleep when no fused sample exists yet. */
  idleSleepMs: number;
  stopTimeoutMs: number;
  /** A fused sample older than this counts as stale in getStatus(). */
  freshnessMs: number;
  smoothing: Omit<MotionSmootherOptions, "clock">;
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  targetFps: 30,
  detectionWidth: 320,
  detectionHeight: 180,
  mirror: true,
  firstFrameTimeoutMs: 5000,
  firstFramePollMs: 10,
  calibrationDurationMs: 2000,
  calibrationMaxSamples: 10,
  angleLimitDegrees: 30,
  defaultDurationMs: 500,
  idleSleepMs: 10,
  stopTimeoutMs: 1000,
  freshnessMs: 500,
  smoothing: {},
};

export type TelemetryListener = (telemetry: PoseTelemetry) => void;
export type StateListener = (state: OrchestratorState) => void;

export interface OrchestratorStatus {
  state: OrchestratorState;
  sessionId: string;
  initialized: boolean;
  calibrated: boolean;
  calibrating: boolean;
  offset: AngleOffset;
  fresh: boolean;
  iterations: number;
  samplesProcessed: number;
  emits: number;
  frames: { framesCaptured: number; framesOverwritten: number; readErrors: number };
  detection: DetectionDispatchStats;
  correlation: CorrelationStats;
  slots: SlotStatus[];
}

// ─── Orchestrator ───────────────────────────────────────────────────────────────

export class Orchestrator {
  readonly sessionId: string = uuidv4();

  private readonly deps: OrchestratorDeps;
  private readonly options: OrchestratorOptions;
  private readonly logger: PipelineLogger;
  private readonly clock: Clock;
  private readonly smoother: MotionSmoother;

  private state: OrchestratorState = OrchestratorState.IDLE;
  private initialized = false;
  private calibrated = false;
  private calibrating = false;
  private lastSubmittedFrameAt = -Infinity;
  private offset: AngleOffset = { ...ZERO_OFFSET };

  private running = false;
  private cancelled = false;
  private readonly loopExited = createDeferred<void>();
  private readonly consumerAbort = new AbortController();
  private consumer: Promise<void> | null = null;
  private stopPromise: Promise<boolean> | null = null;

  private readonly telemetryListeners = new Set<TelemetryListener>();
  private readonly stateListeners = new Set<StateListener>();

  private iterations = 0;
  private samplesProcessed = 0;
  private emits = 0;

  constructor(deps: OrchestratorDeps, options: Partial<OrchestratorOptions> = {}) {
    this.deps = deps;
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...options };
    if (!(this.options.targetFps > 0)) {
      throw new Error(`targetFps must be positive, got ${this.options.targetFps}`);
    }
    this.logger = scopedLogger(deps.logger ?? silentLogger, "Orchestrator");
    this.clock = deps.clock ?? monotonicMs;
    this.smoother = new MotionSmoother({ ...this.options.smoothing, clock: this.clock });
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * Start capture, wait for the first frame, then start detection and the
   * correlation consumer.
   * @throws Error if no frame arrives within firstFrameTimeoutMs
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      throw new Error("Orchestrator is already initialized");
    }
    this.assertTransition(OrchestratorState.INITIALIZING, "initialize");
    this.transition(OrchestratorState.INITIALIZING);

    const { frameSource, detection, correlation } = this.deps;
    if (!frameSource.isRunning) frameSource.start();

    const deadline = this.clock() + this.options.firstFrameTimeoutMs;
    let frame = frameSource.latest();
    while (frame === null && !this.cancelled && this.clock() < deadline) {
      await sleep(this.options.firstFramePollMs);
      frame = frameSource.latest();
    }

    if (frame === null || this.cancelled) {
      const reason = this.cancelled
        ? "Initialization cancelled by stop()"
        : `No frame received from camera within ${this.options.firstFrameTimeoutMs}ms`;
      this.logger.log(reason, "error");
      if (this.state === OrchestratorState.INITIALIZING) {
        this.transition(OrchestratorState.IDLE);
      }
      throw new Error(reason);
    }

    this.logger.log(`Camera ready: ${frame.width}x${frame.height}`, "info");

    detection.start();
    this.consumer = correlation
      .consume({ face: detection.results("face"), pose: detection.results("pose") }, this.consumerAbort.signal)
      .catch((err: unknown) => {
        this.logger.log(`Correlation consumer crashed: ${errorMessage(err)}`, "critical");
      });

    this.initialized = true;
    if (this.state === OrchestratorState.INITIALIZING) {
      this.transition(OrchestratorState.IDLE);
    }
  }

  /**
   * Average the head angles over a short window and use the mean as the
   * neutral offset for the running loop. Allowed while idle or running.
   * @throws Error if not initialized, if a calibration is already in progress,
   * or if no fused sample arrived
   */
  async calibrate(
    durationMs: number = this.options.calibrationDurationMs,
    maxSamples: number = this.options.calibrationMaxSamples,
  ): Promise<AngleOffset> {
    if (!this.initialized) {
      throw new Error("Cannot calibrate before initialize()");
    }
    if (this.calibrating) {
      throw new Error("Calibration already in progress");
    }
    const whileRunning = this.state === OrchestratorState.RUNNING;
    if (!whileRunning) {
      this.assertTransition(OrchestratorState.CALIBRATING, "calibrate");
      this.transition(OrchestratorState.CALIBRATING);
    }
    this.calibrating = true;
    this.logger.log(`Calibrating for ${durationMs}ms (max ${maxSamples} samples)`, "info");

    const samples: AngleOffset[] = [];
    try {
      let lastTimestamp = this.deps.correlation.latest()?.timestamp ?? -Infinity;
      const deadline = this.clock() + durationMs;

      while (!this.cancelled && this.clock() < deadline && samples.length < maxSamples) {
        // While running, the control loop feeds the detectors.
        if (!this.running) this.submitNewFrame();

        const latest = this.deps.correlation.latest();
        if (latest !== null && latest.timestamp > lastTimestamp) {
          lastTimestamp = latest.timestamp;
          const { pitch, roll, yaw } = latest.sample;
          samples.push({ pitch, roll, yaw });
        }
        await sleep(this.frameIntervalMs);
      }
    } finally {
      this.calibrating = false;
      if (!whileRunning && this.state === OrchestratorState.CALIBRATING) {
        this.transition(OrchestratorState.IDLE);
      }
    }

    if (samples.length === 0) {
      const reason = "Calibration failed: no pose detected";
      this.logger.log(reason, "error");
      throw new Error(reason);
    }

    const n = samples.length;
    this.offset = {
      pitch: samples.reduce((sum, s) => sum + s.pitch, 0) / n,
      roll: samples.reduce((sum, s) => sum + s.roll, 0) / n,
      yaw: samples.reduce((sum, s) => sum + s.yaw, 0) / n,
    };
    this.calibrated = true;
    this.logger.log(
      `Calibration offsets (${n} samples) -> Pitch: ${this.offset.pitch.toFixed(2)}, ` +
        `Roll: ${this.offset.roll.toFixed(2)}, Yaw: ${this.offset.yaw.toFixed(2)}`,
      "info",
    );
    return { ...this.offset };
  }

  /** Spawn the control loop. */
  start(): void {
    if (!this.initialized) {
      throw new Error("Cannot start before initialize()");
    }
    this.assertTransition(OrchestratorState.RUNNING, "start");
    if (!this.calibrated) {
      this.logger.log("Starting without calibration, using zero offset", "warning");
    }
    this.transition(OrchestratorState.RUNNING);
    this.smoother.reset();
    this.running = true;
    void this.runLoop();
  }

  /**
   * Idempotent. Stops the loop, then FrameSource, DetectionDispatch, the
   * correlation consumer and the output slots, each with its own bounded wait.
   * Resolves true if every unit exited in time.
   */
  stop(timeoutMs: number = this.options.stopTimeoutMs): Promise<boolean> {
    if (this.stopPromise !== null) return this.stopPromise;
    this.stopPromise = this.shutdown(timeoutMs);
    return this.stopPromise;
  }

  // ─── Observers ──────────────────────────────────────────────────────────────

  /** Subscribe to per-iteration telemetry. Returns an unsubscribe function. */
  onTelemetry(listener: TelemetryListener): () => void {
    this.telemetryListeners.add(listener);
    return () => this.telemetryListeners.delete(listener);
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getStatus(): OrchestratorStatus {
    return {
      state: this.state,
      sessionId: this.sessionId,
      initialized: this.initialized,
      calibrated: this.calibrated,
      calibrating: this.calibrating,
      offset: { ...this.offset },
      fresh: this.deps.correlation.isFresh(this.options.freshnessMs),
      iterations: this.iterations,
      samplesProcessed: this.samplesProcessed,
      emits: this.emits,
      frames: this.deps.frameSource.getStats(),
      detection: this.deps.detection.getStats(),
      correlation: this.deps.correlation.getStats(),
      slots: this.deps.slots.status(),
    };
  }

  // ─── Control loop ───────────────────────────────────────────────────────────

  private get frameIntervalMs(): number {
    return 1000 / this.options.targetFps;
  }

  private nextDetectionFrame(): Frame | null {
    return this.deps.frameSource.latest({
      width: this.options.detectionWidth,
      height: this.options.detectionHeight,
      mirror: this.options.mirror,
    });
  }

  /** Submit the newest frame, unless it was already submitted. Returns true if one went out. */
  private submitNewFrame(): boolean {
    const frame = this.nextDetectionFrame();
    if (frame === null || frame.timestamp <= this.lastSubmittedFrameAt) return false;
    this.lastSubmittedFrameAt = frame.timestamp;
    this.deps.detection.submit(frame);
    return true;
  }

  private async runLoop(): Promise<void> {
    this.logger.log(`Control loop started (${this.options.targetFps} fps)`, "info");
    let lastSampleTimestamp = -Infinity;
    let lastIterationAt: number | null = null;

    try {
      while (this.running) {
        const startedAt = this.clock();
        const fps = lastIterationAt === null ? 0 : roundTo(1000 / Math.max(1, startedAt - lastIterationAt), 1);
        lastIterationAt = startedAt;
        this.iterations++;

        const submitted = this.submitNewFrame();
        const latest = this.deps.correlation.latest();
        if (latest !== null && latest.timestamp > lastSampleTimestamp) {
          lastSampleTimestamp = latest.timestamp;
          this.processSample(latest.sample, fps);
        } else if (!submitted) {
          // Camera stalled or results pending: nothing new to do.
          await cooperativeSleep(this.options.idleSleepMs, () => this.running);
          continue;
        }

        const remaining = this.frameIntervalMs - (this.clock() - startedAt);
        if (remaining > 0) {
          await cooperativeSleep(remaining, () => this.running);
        }
      }
    } catch (err) {
      this.logger.log(`Control loop crashed: ${errorMessage(err)}`, "critical");
    } finally {
      this.running = false;
      this.logger.log("Control loop exited", "info");
      this.loopExited.resolve();
    }
  }

  private processSample(sample: FusedPoseSample, fps: number): void {
    this.samplesProcessed++;
    const limit = this.options.angleLimitDegrees;
    const axis: AngleOffset = {
      pitch: clamp(sample.pitch - this.offset.pitch, -limit, limit),
      roll: clamp(sample.roll - this.offset.roll, -limit, limit),
      yaw: clamp(sample.yaw - this.offset.yaw, -limit, limit),
    };

    const smoother = this.smoother;
    smoother.smooth("x", axis.pitch);
    smoother.smooth("y", axis.roll);
    smoother.smooth("z", axis.yaw);
    smoother.smooth("h", sample.height);
    smoother.smooth("e", gazeRatioToEars(sample.gaze.ratio));

    const decision = smoother.shouldEmit(EMIT_CHANNELS);
    const payload: ActuatorPayload = {
      x: smoother.toActuator("x"),
      y: smoother.toActuator("y"),
      z: smoother.toActuator("z"),
      h: smoother.toActuator("h"),
      ears: smoother.toActuator("e"),
      ax: 0,
      ay: 0,
      az: -1,
      duration_ms: decision.transitionDurationMs ?? this.options.defaultDurationMs,
    };

    let dataSent = false;
    if (decision.shouldEmit) {
      this.emits++;
      dataSent = this.deps.slots.broadcast(payload).length > 0;
    }

    this.publish({
      sessionId: this.sessionId,
      timestamp: sample.timestamp,
      dataSent,
      axis,
      actuator: { x: payload.x, y: payload.y, z: payload.z, h: payload.h, e: payload.ears },
      height: sample.height,
      gaze: { ...sample.gaze },
      fps,
    });
  }

  private publish(telemetry: PoseTelemetry): void {
    for (const listener of this.telemetryListeners) {
      try {
        listener(telemetry);
      } catch (err) {
        this.logger.log(`Telemetry listener threw: ${errorMessage(err)}`, "error");
      }
    }
  }

  // ─── Shutdown ───────────────────────────────────────────────────────────────

  private async shutdown(timeoutMs: number): Promise<boolean> {
    if (this.state !== OrchestratorState.STOPPING) {
      this.transition(OrchestratorState.STOPPING);
    }
    this.cancelled = true;
    const wasRunning = this.running;
    this.running = false;
    let clean = true;

    const bounded = async (name: string, wait: Promise<boolean>): Promise<void> => {
      if (!(await wait)) {
        clean = false;
        this.logger.log(`${name} did not stop within ${timeoutMs}ms`, "error");
      }
    };

    if (wasRunning) {
      await bounded("Control loop", settlesWithin(this.loopExited.promise, timeoutMs));
    }

    const { frameSource, detection, slots } = this.deps;
    frameSource.stop();
    await bounded("FrameSource", frameSource.join(timeoutMs));

    detection.stop();
    await bounded("DetectionDispatch", detection.join(timeoutMs));

    this.consumerAbort.abort();
    if (this.consumer !== null) {
      await bounded("Correlation consumer", settlesWithin(this.consumer, timeoutMs));
    }

    await bounded("Output slots", slots.stopAll(timeoutMs));

    this.transition(OrchestratorState.STOPPED);
    this.logger.log(clean ? "Stopped cleanly" : "Stopped with stragglers", clean ? "info" : "warning");
    return clean;
  }

  // ─── State machine ──────────────────────────────────────────────────────────

  private assertTransition(target: OrchestratorState, methodName: string): void {
    const allowed = VALID_TRANSITIONS.get(this.state) ?? [];
    if (!allowed.includes(target)) {
      throw new Error(
        `Invalid state transition: cannot call ${methodName}() in "${this.state}" state ` +
          `(${this.state} → ${target} is not allowed)`,
      );
    }
  }

  private transition(target: OrchestratorState): void {
    this.assertTransition(target, `transition to ${target}`);
    const from = this.state;
    this.state = target;
    this.logger.log(`State: ${from} → ${target}`, "debug");
    for (const listener of this.stateListeners) {
      try {
        listener(target);
      } catch (err) {
        this.logger.log(`State listener threw: ${errorMessage(err)}`, "error");
      }
    }
  }
}
