import { describe, it, expect, vi, afterEach } from "vitest";
import { APP_NAME, APP_VERSION, buildPipeline, type Pipeline } from "./index.js";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "./config.js";
import type { FrameGrabber, RawFrame } from "./frame-source.js";
import type { Detector } from "./detectors.js";
import type { ActuatorTransport } from "./dispatcher.js";
import type { ActuatorPayload } from "./types.js";

class IdleGrabber implements FrameGrabber {
  private wake: (() => void) | null = null;

  read(): Promise<RawFrame | null> {
    return new Promise((resolve) => {
      this.wake = () => resolve(null);
    });
  }

  release(): void {
    this.wake?.();
  }
}

function makeDetectors(): Record<"face" | "pose", Detector> {
  return {
    face: { kind: "face", detect: () => {} },
    pose: { kind: "pose", detect: () => {} },
  };
}

class NullTransport implements ActuatorTransport {
  constructor(readonly target: string) {}
  async post(_payload: ActuatorPayload): Promise<void> {}
}

const built: Pipeline[] = [];

afterEach(async () => {
  for (const pipeline of built.splice(0)) await pipeline.orchestrator.stop(500);
});

function build(config: PipelineConfig, overrides: Parameters<typeof buildPipeline>[2] = {}): Pipeline {
  const pipeline = buildPipeline(config, { log: vi.fn() }, overrides);
  built.push(pipeline);
  return pipeline;
}

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("Pose Relay");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });
});

describe("buildPipeline", () => {
  it("requires both detector URLs when no detectors are given", () => {
    expect(() =>
      buildPipeline(
        { ...DEFAULT_PIPELINE_CONFIG, faceDetectorUrl: "http://127.0.0.1:7001/face" },
        { log: vi.fn() },
        { grabber: new IdleGrabber() },
      ),
    ).toThrow("FACE_DETECTOR_URL and POSE_DETECTOR_URL must both be set");
  });

  it("builds an idle pipeline with only the primary slot attached by default", () => {
    const { orchestrator, slots } = build(
      {
        ...DEFAULT_PIPELINE_CONFIG,
        faceDetectorUrl: "http://127.0.0.1:7001/face",
        poseDetectorUrl: "http://127.0.0.1:7001/pose",
      },
      { grabber: new IdleGrabber() },
    );

    expect(orchestrator.getState()).toBe("idle");
    expect(slots.status().map((s) => [s.name, s.attached, s.enabled])).toEqual([
      ["primary", true, false],
      ["secondary", false, false],
    ]);
  });

  it("targets the configured actuator hosts", () => {
    const { slots } = build(
      {
        ...DEFAULT_PIPELINE_CONFIG,
        primaryActuator: { host: "robot.local", port: 9000 },
        secondaryActuator: { host: "mirror.local", port: 9001 },
      },
      { grabber: new IdleGrabber(), detectors: makeDetectors() },
    );

    slots.enable("primary");
    slots.enable("secondary");
    expect(slots.status().map((s) => s.target)).toEqual([
      "http://robot.local:9000/position",
      "http://mirror.local:9001/position",
    ]);
  });

  it("attaches both slots to a transport override", () => {
    const { slots } = build(DEFAULT_PIPELINE_CONFIG, {
      grabber: new IdleGrabber(),
      detectors: makeDetectors(),
      transport: (slot) => new NullTransport(`memory://${slot}`),
    });

    slots.enable("secondary");
    expect(slots.status()[1]).toMatchObject({ attached: true, enabled: true, target: "memory://secondary" });
  });
});
