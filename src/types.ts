// Pose Relay - Shared TypeScript interfaces and types
//
// Everything that crosses a component boundary lives here: frames, detector
// results, fused samples, smoother channels and actuator payloads.

// ─── Orchestrator State Machine ─────────────────────────────────────────────────

export enum OrchestratorState {
  IDLE = "idle",
  INITIALIZING = "initializing",
  CALIBRATING = "calibrating",
  RUNNING = "running",
  STOPPING = "stopping",
  STOPPED = "stopped",
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

// ─── Frames ─────────────────────────────────────────────────────────────────────

/** Packed raster (RGB24 unless `channels` says otherwise) plus capture time. */
export interface Frame {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  /** Monotonic capture timestamp in integer milliseconds. */
  readonly timestamp: number;
}

export interface FrameOptions {
  width?: number;
  height?: number;
  mirror?: boolean;
}

// ─── Detection ──────────────────────────────────────────────────────────────────

export type DetectionKind = "face" | "pose";

export const DETECTION_KINDS: readonly DetectionKind[] = ["face", "pose"];

export type DetectionResult =
  | { kind: "face"; timestamp: number; landmarks: unknown }
  | { kind: "pose"; timestamp: number; landmarks: unknown };

export type DetectionCallback = (result: DetectionResult) => void;

export type GazeLabel = "left" | "center" | "right";

export interface GazeReading {
  label: GazeLabel;
  /** Horizontal iris position, 0 = far left, 1 = far right. */
  ratio: number;
}

export interface FaceReadings {
  pitch: number;
  roll: number;
  yaw: number;
  gaze: GazeReading;
}

export interface PoseReadings {
  height: number;
}

/**
 * Accessor over opaque detector landmarks. Returns null when the landmarks
 * carry nothing usable (no face in view, partial body, malformed payload).
 */
export interface LandmarkReader {
  readFace(landmarks: unknown): FaceReadings | null;
  readPose(landmarks: unknown): PoseReadings | null;
}

// ─── Fusion ─────────────────────────────────────────────────────────────────────

export interface FusedPoseSample {
  pitch: number;
  roll: number;
  yaw: number;
  height: number;
  gaze: GazeReading;
  timestamp: number;
}

export type PairingPolicy = "independent-latest" | "strict-pairing";

// ─── Smoothing ──────────────────────────────────────────────────────────────────

/** x = pitch, y = roll, z = yaw, h = height, e = ears (gaze proxy). */
export type ChannelKey = "x" | "y" | "z" | "h" | "e";

export const CHANNEL_KEYS: readonly ChannelKey[] = ["x", "y", "z", "h", "e"];

export type ChannelValues = Record<ChannelKey, number>;

export interface EmitDecision {
  shouldEmit: boolean;
  /** Transition time for the actuator; null when nothing is emitted. */
  transitionDurationMs: number | null;
}

// ─── Actuator ───────────────────────────────────────────────────────────────────

/** JSON body posted to the actuator's /position endpoint. */
export interface ActuatorPayload {
  x: number;
  y: number;
  z: number;
  h: number;
  ears: number;
  ax: number;
  ay: number;
  az: number;
  duration_ms: number;
}

export type SlotName = "primary" | "secondary";

export const SLOT_NAMES: readonly SlotName[] = ["primary", "secondary"];

// ─── Calibration / Telemetry ────────────────────────────────────────────────────

export interface AngleOffset {
  pitch: number;
  roll: number;
  yaw: number;
}

export interface PoseTelemetry {
  sessionId: string;
  timestamp: number;
  dataSent: boolean;
  axis: AngleOffset;
  actuator: ChannelValues;
  height: number;
  gaze: GazeReading;
  fps: number;
}

/** Something with a cooperative shutdown: idempotent stop, bounded join. */
export interface Stoppable {
  stop(): void;
  /** Resolves true once the unit's loop has exited, false on timeout. */
  join(timeoutMs: number): Promise<boolean>;
}
