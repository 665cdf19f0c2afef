// Pose Relay - Configuration
// Defaults for every tunable, plus parsing from environment variables.
// The entry point imports "dotenv/config" first, so a local .env file is
// already merged into process.env by the time loadConfig() runs.

import { isLogLevel, type LogLevel } from "./logger.js";
import type { ChannelKey, PairingPolicy } from "./types.js";

// ─── Shapes ─────────────────────────────────────────────────────────────────────

export interface ActuatorEndpoint {
  host: string;
  port: number;
}

export interface CameraConfig {
  device: string;
  width: number;
  height: number;
  fps: number;
}

export interface PipelineConfig {
  primaryActuator: ActuatorEndpoint;
  secondaryActuator: ActuatorEndpoint | null;
  telemetryPort: number;
  faceDetectorUrl: string | null;
  poseDetectorUrl: string | null;
  camera: CameraConfig;
  mirrorVideo: boolean;
  /** Control loop rate. */
  targetFps: number;
  /** Size handed to the detectors (clamped to the camera size). */
  detectionWidth: number;
  detectionHeight: number;
  firstFrameTimeoutMs: number;
  calibrationDurationMs: number;
  calibrationMaxSamples: number;
  /** Absolute clamp applied to calibrated pitch/roll/yaw, degrees. */
  angleLimitDegrees: number;
  smoothing: {
    alpha: Record<ChannelKey, number>;
    rateHz: number;
    threshold: number;
    minDurationMs: number;
    maxDurationMs: number;
  };
  /** duration_ms used when a payload goes out without a fresh emit decision. */
  defaultDurationMs: number;
  fusion: {
    policy: PairingPolicy;
    capacity: number;
    faceTimeoutMs: number;
    poseTimeoutMs: number;
    allowPartial: boolean;
    toleranceMs: number;
    maxDelayMs: number;
  };
  detection: {
    intakeCapacity: number;
    maxInFlight: number;
    resultCapacity: number;
  };
  dispatch: {
    queueCapacity: number;
    minIntervalMs: number;
    requestTimeoutMs: number;
    pollIntervalMs: number;
  };
  gazeThresholds: { left: number; right: number };
  stopTimeoutMs: number;
  logLevel: LogLevel;
  poseLogDir: string | null;
}

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  primaryActuator: { host: "localhost", port: 8000 },
  secondaryActuator: null,
  telemetryPort: 3000,
  faceDetectorUrl: null,
  poseDetectorUrl: null,
  camera: { device: "/dev/video0", width: 640, height: 480, fps: 30 },
  mirrorVideo: true,
  targetFps: 30,
  detectionWidth: 320,
  detectionHeight: 180,
  firstFrameTimeoutMs: 5000,
  calibrationDurationMs: 2000,
  calibrationMaxSamples: 10,
  angleLimitDegrees: 30,
  smoothing: {
    alpha: { x: 0.3, y: 0.2, z: 0.1, h: 0.3, e: 0.2 },
    rateHz: 10,
    threshold: 2.0,
    minDurationMs: 100,
    maxDurationMs: 400,
  },
  defaultDurationMs: 500,
  fusion: {
    policy: "independent-latest",
    capacity: 30,
    faceTimeoutMs: 200,
    poseTimeoutMs: 200,
    allowPartial: false,
    toleranceMs: 0,
    maxDelayMs: 200,
  },
  detection: {
    intakeCapacity: 8,
    maxInFlight: 4,
    resultCapacity: 16,
  },
  dispatch: {
    queueCapacity: 32,
    minIntervalMs: 100,
    requestTimeoutMs: 1000,
    pollIntervalMs: 100,
  },
  gazeThresholds: { left: 0.45, right: 0.55 },
  stopTimeoutMs: 1000,
  logLevel: "info",
  poseLogDir: null,
};

// ─── Env parsing ────────────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | null {
  const raw = env[key];
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readNumber(env: Env, key: string, fallback: number, opts: { min?: number; integer?: boolean } = {}): number {
  const raw = readString(env, key);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new Error(`${key} must be an integer, got "${raw}"`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new Error(`${key} must be >= ${opts.min}, got ${value}`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key);
  if (raw === null) return fallback;
  switch (raw.toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      throw new Error(`${key} must be a boolean, got "${raw}"`);
  }
}

function readPort(env: Env, key: string, fallback: number): number {
  const port = readNumber(env, key, fallback, { min: 0, integer: true });
  if (port > 65535) {
    throw new Error(`${key} must be a valid port, got ${port}`);
  }
  return port;
}

/**
 * Build a PipelineConfig from environment variables, falling back to
 * DEFAULT_PIPELINE_CONFIG for anything unset.
 * @throws Error on malformed values
 */
export function loadConfig(env: Env = process.env): PipelineConfig {
  const defaults = DEFAULT_PIPELINE_CONFIG;

  const secondaryHost = readString(env, "SECONDARY_ACTUATOR_HOST");
  const secondaryActuator: ActuatorEndpoint | null =
    secondaryHost !== null
      ? { host: secondaryHost, port: readPort(env, "SECONDARY_ACTUATOR_PORT", defaults.primaryActuator.port) }
      : null;

  const logLevel = readString(env, "LOG_LEVEL") ?? defaults.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warning, error, critical, got "${logLevel}"`);
  }

  const policy = readString(env, "FUSION_POLICY") ?? defaults.fusion.policy;
  if (policy !== "independent-latest" && policy !== "strict-pairing") {
    throw new Error(`FUSION_POLICY must be "independent-latest" or "strict-pairing", got "${policy}"`);
  }

  const targetFps = readNumber(env, "TARGET_FPS", defaults.targetFps, { min: 1 });

  return {
    ...defaults,
    primaryActuator: {
      host: readString(env, "ACTUATOR_HOST") ?? defaults.primaryActuator.host,
      port: readPort(env, "ACTUATOR_PORT", defaults.primaryActuator.port),
    },
    secondaryActuator,
    telemetryPort: readPort(env, "TELEMETRY_PORT", defaults.telemetryPort),
    faceDetectorUrl: readString(env, "FACE_DETECTOR_URL"),
    poseDetectorUrl: readString(env, "POSE_DETECTOR_URL"),
    camera: {
      device: readString(env, "CAMERA_DEVICE") ?? defaults.camera.device,
      width: readNumber(env, "CAMERA_WIDTH", defaults.camera.width, { min: 1, integer: true }),
      height: readNumber(env, "CAMERA_HEIGHT", defaults.camera.height, { min: 1, integer: true }),
      fps: targetFps,
    },
    mirrorVideo: readBoolean(env, "MIRROR_VIDEO", defaults.mirrorVideo),
    targetFps,
    smoothing: {
      ...defaults.smoothing,
      rateHz: readNumber(env, "SEND_RATE_HZ", defaults.smoothing.rateHz, { min: 0.1 }),
      threshold: readNumber(env, "SEND_THRESHOLD", defaults.smoothing.threshold, { min: 0 }),
    },
    fusion: { ...defaults.fusion, policy },
    gazeThresholds: {
      left: readNumber(env, "GAZE_LEFT_THRESHOLD", defaults.gazeThresholds.left, { min: 0 }),
      right: readNumber(env, "GAZE_RIGHT_THRESHOLD", defaults.gazeThresholds.right, { min: 0 }),
    },
    logLevel,
    poseLogDir: readString(env, "POSE_LOG_DIR"),
  };
}
