// Pose Relay - Detector adapters
// The landmark models themselves run elsewhere. This module defines the
// contract DetectionDispatch talks to, an HTTP adapter for a remote inference
// service, and a LandmarkReader for the JSON that service returns.

import type {
  DetectionCallback,
  DetectionKind,
  FaceReadings,
  Frame,
  GazeLabel,
  GazeReading,
  LandmarkReader,
  PoseReadings,
} from "./types.js";
import { silentLogger, scopedLogger, type PipelineLogger } from "./logger.js";
import { errorMessage, isFiniteNumber } from "./utils.js";

// ─── Detector contract ──────────────────────────────────────────────────────────

/**
 * Asynchronous landmark detector. `detect` returns immediately; the callback
 * fires at most once per frame, from whatever context the detector likes, or
 * never if the detector dropped the frame.
 */
export interface Detector {
  readonly kind: DetectionKind;
  detect(frame: Frame, timestamp: number, callback: DetectionCallback): void;
  close?(): void | Promise<void>;
}

// ─── HttpDetector ───────────────────────────────────────────────────────────────

export interface HttpDetectorOptions {
  kind: DetectionKind;
  url: string;
  timeoutMs?: number;
  logger?: PipelineLogger;
}

/**
 * Posts the raw frame to an inference endpoint. A 200 response carries the
 * landmarks as JSON; 204 means "nothing detected" and produces no callback.
 */
export class HttpDetector implements Detector {
  readonly kind: DetectionKind;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly logger: PipelineLogger;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(options: HttpDetectorOptions) {
    this.kind = options.kind;
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 500;
    this.logger = scopedLogger(options.logger ?? silentLogger, `HttpDetector:${options.kind}`);
  }

  detect(frame: Frame, timestamp: number, callback: DetectionCallback): void {
    if (this.closed) return;
    void this.request(frame, timestamp, callback);
  }

  close(): void {
    this.closed = true;
    for (const controller of this.inFlight) controller.abort();
    this.inFlight.clear();
  }

  private async request(frame: Frame, timestamp: number, callback: DetectionCallback): Promise<void> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    this.inFlight.add(controller);

    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/octet-stream",
          "x-frame-width": String(frame.width),
          "x-frame-height": String(frame.height),
          "x-frame-channels": String(frame.channels),
          "x-frame-timestamp": String(timestamp),
        },
        body: new Uint8Array(frame.data),
        signal: controller.signal,
      });

      if (response.status === 204) {
        this.logger.log(`No ${this.kind} landmarks for frame ${timestamp}`, "debug");
        return;
      }
      if (!response.ok) {
        this.logger.log(`Detector returned HTTP ${response.status} for frame ${timestamp}`, "warning");
        return;
      }

      const landmarks: unknown = await response.json();
      if (this.closed) return;

      if (this.kind === "face") {
        callback({ kind: "face", timestamp, landmarks });
      } else {
        callback({ kind: "pose", timestamp, landmarks });
      }
    } catch (err) {
      if (!this.closed) {
        this.logger.log(`Request for frame ${timestamp} failed: ${errorMessage(err)}`, "warning");
      }
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }
}

// ─── JsonLandmarkReader ─────────────────────────────────────────────────────────

export interface GazeThresholds {
  left: number;
  right: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isGazeLabel(value: unknown): value is GazeLabel {
  return value === "left" || value === "center" || value === "right";
}

/** Label a horizontal iris ratio against left/right thresholds. */
export function classifyGaze(ratio: number, thresholds: GazeThresholds): GazeLabel {
  if (ratio < thresholds.left) return "left";
  if (ratio > thresholds.right) return "right";
  return "center";
}

/**
 * Reads `{ pitch, roll, yaw, gaze }` face payloads and `{ height }` pose
 * payloads. `gaze` may be `{ label, ratio }` or a bare ratio, in which case
 * the label comes from the thresholds. A missing gaze reads as centered.
 */
export class JsonLandmarkReader implements LandmarkReader {
  private readonly thresholds: GazeThresholds;

  constructor(thresholds: GazeThresholds = { left: 0.45, right: 0.55 }) {
    this.thresholds = thresholds;
  }

  readFace(landmarks: unknown): FaceReadings | null {
    if (!isRecord(landmarks)) return null;
    const { pitch, roll, yaw } = landmarks;
    if (!isFiniteNumber(pitch) || !isFiniteNumber(roll) || !isFiniteNumber(yaw)) {
      return null;
    }
    const gaze = this.readGaze(landmarks.gaze);
    if (gaze === null) return null;
    return { pitch, roll, yaw, gaze };
  }

  readPose(landmarks: unknown): PoseReadings | null {
    if (!isRecord(landmarks)) return null;
    const { height } = landmarks;
    if (!isFiniteNumber(height)) return null;
    return { height };
  }

  private readGaze(raw: unknown): GazeReading | null {
    if (raw === undefined || raw === null) {
      return { label: "center", ratio: 0.5 };
    }
    if (isFiniteNumber(raw)) {
      return { label: classifyGaze(raw, this.thresholds), ratio: raw };
    }
    if (!isRecord(raw) || !isFiniteNumber(raw.ratio)) return null;
    const label = isGazeLabel(raw.label) ? raw.label : classifyGaze(raw.ratio, this.thresholds);
    return { label, ratio: raw.ratio };
  }
}
