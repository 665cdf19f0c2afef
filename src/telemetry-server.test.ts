// Pose Relay - Telemetry server tests
// The server runs in process on an OS-assigned port. Most tests drive a fake
// orchestrator that pushes telemetry and state changes by hand; the last block
// runs a real pipeline over in-memory camera and detectors.

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import WebSocket from "ws";
import { createTelemetryServer, type TelemetryServer, type TelemetrySource } from "./telemetry-server.js";
import type { OrchestratorStatus, StateListener, TelemetryListener } from "./orchestrator.js";
import { OutputSlots } from "./output-slots.js";
import { Dispatcher, type ActuatorTransport } from "./dispatcher.js";
import { OrchestratorState } from "./types.js";
import type { ActuatorPayload, AngleOffset, DetectionCallback, DetectionKind, Frame, PoseTelemetry } from "./types.js";
import { buildPipeline } from "./index.js";
import { DEFAULT_PIPELINE_CONFIG } from "./config.js";
import type { FrameGrabber, RawFrame } from "./frame-source.js";
import type { Detector } from "./detectors.js";
import { silentLogger } from "./logger.js";
import { sleep } from "./utils.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

const STATUS: OrchestratorStatus = {
  state: OrchestratorState.IDLE,
  sessionId: "session-1",
  initialized: true,
  calibrated: false,
  calibrating: false,
  offset: { pitch: 0, roll: 0, yaw: 0 },
  fresh: false,
  iterations: 0,
  samplesProcessed: 0,
  emits: 0,
  frames: { framesCaptured: 12, framesOverwritten: 3, readErrors: 0 },
  detection: {
    submitted: 0,
    droppedAtIntake: 0,
    skippedBusy: { face: 0, pose: 0 },
    delivered: { face: 0, pose: 0 },
    duplicateCallbacks: 0,
    expired: 0,
    resultsEvicted: 0,
  },
  correlation: { fused: 0, discarded: 0, staleSkipped: 0, pendingEvicted: 0, timestampsBumped: 0, outOfOrder: 0 },
  slots: [],
};

const TELEMETRY: PoseTelemetry = {
  sessionId: "session-1",
  timestamp: 1500,
  dataSent: true,
  axis: { pitch: 1, roll: 2, yaw: 3 },
  actuator: { x: 0.1, y: 0.2, z: 0.3, h: 55, e: 90 },
  height: 60,
  gaze: { label: "right", ratio: 0.8 },
  fps: 29.7,
};

class FakeOrchestrator implements TelemetrySource {
  state: OrchestratorState = OrchestratorState.IDLE;
  calibration: AngleOffset | Error = { pitch: 1.5, roll: -0.5, yaw: 2 };
  readonly telemetryListeners = new Set<TelemetryListener>();
  readonly stateListeners = new Set<StateListener>();

  getState(): OrchestratorState {
    return this.state;
  }

  getStatus(): OrchestratorStatus {
    return { ...STATUS, state: this.state };
  }

  async calibrate(): Promise<AngleOffset> {
    if (this.calibration instanceof Error) throw this.calibration;
    return this.calibration;
  }

  onTelemetry(listener: TelemetryListener): () => void {
    this.telemetryListeners.add(listener);
    return () => this.telemetryListeners.delete(listener);
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  pushTelemetry(telemetry: PoseTelemetry): void {
    for (const listener of this.telemetryListeners) listener(telemetry);
  }

  pushState(state: OrchestratorState): void {
    this.state = state;
    for (const listener of this.stateListeners) listener(state);
  }
}

class NullTransport implements ActuatorTransport {
  readonly target = "memory://primary";
  async post(_payload: ActuatorPayload): Promise<void> {}
}

/** Collects every JSON message the server sends. */
class TestClient {
  readonly ws: WebSocket;
  readonly messages: unknown[] = [];

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on("message", (data: WebSocket.RawData) => {
      const text = Buffer.isBuffer(data) ? data.toString("utf-8") : String(data);
      const parsed: unknown = JSON.parse(text);
      this.messages.push(parsed);
    });
  }

  waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.ws.once("open", () => resolve());
      this.ws.once("error", reject);
    });
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("createTelemetryServer", () => {
  let orchestrator: FakeOrchestrator;
  let slots: OutputSlots;
  let server: TelemetryServer;
  let baseUrl: string;
  let clients: TestClient[];

  beforeEach(async () => {
    orchestrator = new FakeOrchestrator();
    slots = new OutputSlots();
    slots.attach("primary", () => new Dispatcher(new NullTransport(), { pollIntervalMs: 10 }));
    server = createTelemetryServer({ orchestrator, slots });
    const port = await server.listen(0);
    baseUrl = `127.0.0.1:${port}`;
    clients = [];
  });

  afterEach(async () => {
    for (const client of clients) client.close();
    await slots.stopAll(1000);
    await server.close();
  });

  async function connect(): Promise<TestClient> {
    const client = new TestClient(`ws://${baseUrl}`);
    clients.push(client);
    await client.waitForOpen();
    return client;
  }

  // ─── HTTP ─────────────────────────────────────────────────────────────────

  describe("GET /health", () => {
    it("answers ok", async () => {
      const response = await fetch(`http://${baseUrl}/health`);
      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: "ok" });
    });
  });

  describe("GET /status", () => {
    it("returns the orchestrator status", async () => {
      orchestrator.state = OrchestratorState.RUNNING;
      const response = await fetch(`http://${baseUrl}/status`);
      expect(await response.json()).toEqual({ ...STATUS, state: "running" });
    });
  });

  describe("POST /calibrate", () => {
    it("returns the new offset", async () => {
      const response = await fetch(`http://${baseUrl}/calibrate`, { method: "POST" });
      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ offset: { pitch: 1.5, roll: -0.5, yaw: 2 } });
    });

    it("answers 409 when calibration fails", async () => {
      orchestrator.calibration = new Error("Calibration failed: no pose detected");
      const response = await fetch(`http://${baseUrl}/calibrate`, { method: "POST" });
      expect(response.status).toBe(409);
      expect(await response.json()).toEqual({ error: "Calibration failed: no pose detected" });
    });
  });

  describe("slot control", () => {
    it("enables and disables a slot", async () => {
      const enabled = await fetch(`http://${baseUrl}/slots/primary/enable`, { method: "POST" });
      expect(await enabled.json()).toEqual({ slot: "primary", enabled: true });
      expect(slots.isEnabled("primary")).toBe(true);

      const disabled = await fetch(`http://${baseUrl}/slots/primary/disable`, { method: "POST" });
      expect(await disabled.json()).toEqual({ slot: "primary", enabled: false, joined: true });
      expect(slots.isEnabled("primary")).toBe(false);
    });

    it("answers 409 for a slot with nothing attached", async () => {
      const response = await fetch(`http://${baseUrl}/slots/secondary/enable`, { method: "POST" });
      expect(response.status).toBe(409);
      expect(await response.json()).toEqual({ error: 'No dispatcher attached to slot "secondary"' });
    });

    it("answers 404 for an unknown slot", async () => {
      const response = await fetch(`http://${baseUrl}/slots/tertiary/enable`, { method: "POST" });
      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Unknown slot "tertiary"' });
    });
  });

  // ─── WebSocket feed ───────────────────────────────────────────────────────

  describe("WebSocket feed", () => {
    it("sends the current state on connect", async () => {
      orchestrator.state = OrchestratorState.RUNNING;
      const client = await connect();
      await vi.waitFor(() => {
        expect(client.messages).toEqual([{ type: "state_change", state: "running" }]);
      });
    });

    it("forwards telemetry and state changes to every viewer", async () => {
      const first = await connect();
      const second = await connect();
      await vi.waitFor(() => {
        expect(first.messages).toHaveLength(1);
        expect(second.messages).toHaveLength(1);
      });

      orchestrator.pushTelemetry(TELEMETRY);
      orchestrator.pushState(OrchestratorState.STOPPING);

      const expected = [
        { type: "state_change", state: "idle" },
        { type: "telemetry", data: TELEMETRY },
        { type: "state_change", state: "stopping" },
      ];
      await vi.waitFor(() => {
        expect(first.messages).toEqual(expected);
        expect(second.messages).toEqual(expected);
      });
    });
  });

  it("unsubscribes from the orchestrator on close", async () => {
    expect(orchestrator.telemetryListeners.size).toBe(1);
    expect(orchestrator.stateListeners.size).toBe(1);

    const extra = createTelemetryServer({ orchestrator, slots });
    expect(orchestrator.telemetryListeners.size).toBe(2);
    await extra.listen(0);
    await extra.close();
    expect(orchestrator.telemetryListeners.size).toBe(1);
    expect(orchestrator.stateListeners.size).toBe(1);
  });
});

// ─── Against a running pipeline ─────────────────────────────────────────────────

class SteadyGrabber implements FrameGrabber {
  private released = false;

  async read(): Promise<RawFrame | null> {
    await sleep(5);
    if (this.released) return null;
    return { data: Buffer.alloc(4 * 2 * 3, 64), width: 4, height: 2, channels: 3 };
  }

  release(): void {
    this.released = true;
  }
}

class EchoDetector implements Detector {
  constructor(
    readonly kind: DetectionKind,
    private readonly landmarks: unknown,
  ) {}

  detect(_frame: Frame, timestamp: number, callback: DetectionCallback): void {
    setImmediate(() => {
      if (this.kind === "face") callback({ kind: "face", timestamp, landmarks: this.landmarks });
      else callback({ kind: "pose", timestamp, landmarks: this.landmarks });
    });
  }
}

describe("createTelemetryServer with a running pipeline", () => {
  it("recalibrates on POST /calibrate while the control loop runs", async () => {
    const { orchestrator, slots } = buildPipeline(
      {
        ...DEFAULT_PIPELINE_CONFIG,
        camera: { ...DEFAULT_PIPELINE_CONFIG.camera, width: 4, height: 2 },
        calibrationDurationMs: 1000,
        calibrationMaxSamples: 3,
      },
      silentLogger,
      {
        grabber: new SteadyGrabber(),
        detectors: {
          face: new EchoDetector("face", { pitch: 4, roll: 2, yaw: -8 }),
          pose: new EchoDetector("pose", { height: 55 }),
        },
        transport: () => new NullTransport(),
      },
    );
    const server = createTelemetryServer({ orchestrator, slots });
    const port = await server.listen(0);

    try {
      await orchestrator.initialize();
      orchestrator.start();

      const response = await fetch(`http://127.0.0.1:${port}/calibrate`, { method: "POST" });
      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ offset: { pitch: 4, roll: 2, yaw: -8 } });
      expect(orchestrator.getStatus()).toMatchObject({
        state: OrchestratorState.RUNNING,
        calibrated: true,
        calibrating: false,
      });
    } finally {
      await orchestrator.stop(500);
      await server.close();
    }
  });
});
