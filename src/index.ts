// Pose Relay - Entry point
// Wires the pipeline from configuration, starts the telemetry server and runs
// until SIGINT/SIGTERM.

import "dotenv/config";
import { pathToFileURL } from "node:url";
import { loadConfig, type PipelineConfig } from "./config.js";
import { createConsoleLogger, type PipelineLogger } from "./logger.js";
import type { DetectionKind } from "./types.js";
import { FrameSource, type FrameGrabber } from "./frame-source.js";
import { FfmpegFrameGrabber } from "./ffmpeg-grabber.js";
import { HttpDetector, JsonLandmarkReader, type Detector } from "./detectors.js";
import { DetectionDispatch } from "./detection-dispatch.js";
import { CorrelationBuffer } from "./correlation-buffer.js";
import { Dispatcher, HttpActuatorTransport, type ActuatorTransport } from "./dispatcher.js";
import { OutputSlots } from "./output-slots.js";
import { Orchestrator } from "./orchestrator.js";
import { createTelemetryServer } from "./telemetry-server.js";
import { createDummyActuator } from "./dummy-actuator.js";
import { PoseLog } from "./pose-log.js";
import { errorMessage } from "./utils.js";

export const APP_NAME = "Pose Relay";
export const APP_VERSION = "0.1.0";

// ─── Pipeline wiring ────────────────────────────────────────────────────────────

export interface PipelineOverrides {
  grabber?: FrameGrabber;
  detectors?: Record<DetectionKind, Detector>;
  /** Replaces the HTTP transport for both slots. */
  transport?: (slot: "primary" | "secondary") => ActuatorTransport;
}

export interface Pipeline {
  frameSource: FrameSource;
  detection: DetectionDispatch;
  correlation: CorrelationBuffer;
  slots: OutputSlots;
  orchestrator: Orchestrator;
}

/**
 * Build every pipeline unit from `config`. Nothing is started.
 * @throws Error if a detector URL is missing and no detector override is given
 */
export function buildPipeline(
  config: PipelineConfig,
  logger: PipelineLogger,
  overrides: PipelineOverrides = {},
): Pipeline {
  const grabber =
    overrides.grabber ??
    new FfmpegFrameGrabber({
      device: config.camera.device,
      width: config.camera.width,
      height: config.camera.height,
      fps: config.camera.fps,
      logger,
    });
  const frameSource = new FrameSource(grabber, { logger });

  const detectors = overrides.detectors ?? httpDetectors(config, logger);
  const detection = new DetectionDispatch(detectors, { logger, ...config.detection });

  const correlation = new CorrelationBuffer({
    reader: new JsonLandmarkReader(config.gazeThresholds),
    policy: config.fusion.policy,
    capacity: config.fusion.capacity,
    timeoutMs: { face: config.fusion.faceTimeoutMs, pose: config.fusion.poseTimeoutMs },
    allowPartial: config.fusion.allowPartial,
    toleranceMs: config.fusion.toleranceMs,
    maxDelayMs: config.fusion.maxDelayMs,
    logger,
  });

  const slots = new OutputSlots({ logger, joinTimeoutMs: config.stopTimeoutMs });
  const endpoints = { primary: config.primaryActuator, secondary: config.secondaryActuator };
  for (const name of ["primary", "secondary"] as const) {
    const endpoint = endpoints[name];
    if (endpoint === null && overrides.transport === undefined) continue;
    slots.attach(name, () => {
      const transport =
        overrides.transport?.(name) ??
        new HttpActuatorTransport({
          host: endpoint?.host ?? "localhost",
          port: endpoint?.port ?? config.primaryActuator.port,
          timeoutMs: config.dispatch.requestTimeoutMs,
        });
      return new Dispatcher(transport, {
        name,
        logger,
        queueCapacity: config.dispatch.queueCapacity,
        minIntervalMs: config.dispatch.minIntervalMs,
        pollIntervalMs: config.dispatch.pollIntervalMs,
      });
    });
  }

  const orchestrator = new Orchestrator(
    { frameSource, detection, correlation, slots, logger },
    {
      targetFps: config.targetFps,
      detectionWidth: Math.min(config.detectionWidth, config.camera.width),
      detectionHeight: Math.min(config.detectionHeight, config.camera.height),
      mirror: config.mirrorVideo,
      firstFrameTimeoutMs: config.firstFrameTimeoutMs,
      calibrationDurationMs: config.calibrationDurationMs,
      calibrationMaxSamples: config.calibrationMaxSamples,
      angleLimitDegrees: config.angleLimitDegrees,
      defaultDurationMs: config.defaultDurationMs,
      stopTimeoutMs: config.stopTimeoutMs,
      smoothing: config.smoothing,
    },
  );

  return { frameSource, detection, correlation, slots, orchestrator };
}

function httpDetectors(config: PipelineConfig, logger: PipelineLogger): Record<DetectionKind, Detector> {
  if (config.faceDetectorUrl === null || config.poseDetectorUrl === null) {
    throw new Error("FACE_DETECTOR_URL and POSE_DETECTOR_URL must both be set");
  }
  return {
    face: new HttpDetector({ kind: "face", url: config.faceDetectorUrl, logger }),
    pose: new HttpDetector({ kind: "pose", url: config.poseDetectorUrl, logger }),
  };
}

// ─── Main ───────────────────────────────────────────────────────────────────────

async function runDummyActuator(config: PipelineConfig, logger: PipelineLogger): Promise<void> {
  const actuator = createDummyActuator({ logger });
  await actuator.listen(config.primaryActuator.port);
  const shutdown = () => {
    actuator.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.log(`Shutdown failed: ${errorMessage(err)}`, "critical");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createConsoleLogger(config.logLevel);

  if (process.argv.includes("--dummy-actuator")) {
    await runDummyActuator(config, logger);
    return;
  }

  logger.log(`${APP_NAME} v${APP_VERSION} starting`, "info");
  const pipeline = buildPipeline(config, logger);
  const { orchestrator, slots } = pipeline;

  const poseLog = config.poseLogDir !== null ? new PoseLog(config.poseLogDir, orchestrator.sessionId, { logger }) : null;
  if (poseLog !== null) {
    orchestrator.onTelemetry((telemetry) => poseLog.record(telemetry));
  }

  const server = createTelemetryServer({ orchestrator, slots, logger });
  await server.listen(config.telemetryPort);

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.log(`${signal} received, shutting down`, "info");
    orchestrator
      .stop()
      .then(async (clean) => {
        await poseLog?.close();
        await server.close();
        process.exit(clean ? 0 : 1);
      })
      .catch((err: unknown) => {
        logger.log(`Shutdown failed: ${errorMessage(err)}`, "critical");
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await orchestrator.initialize();
  try {
    await orchestrator.calibrate();
  } catch (err) {
    logger.log(`${errorMessage(err)}; POST /calibrate to retry`, "warning");
  }
  slots.enable("primary");
  orchestrator.start();
  logger.log("Pipeline: camera → face/pose detectors → fusion → smoothing → actuator", "info");
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    console.error(`[CRITICAL] [${new Date().toISOString()}] ${errorMessage(err)}`);
    process.exit(1);
  });
}
