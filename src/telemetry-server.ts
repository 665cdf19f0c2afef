// Pose Relay - Telemetry and control server
// Small express API for status and control plus a WebSocket feed that pushes
// every PoseTelemetry snapshot and state change to connected viewers.

import express, { type Express, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import type { OrchestratorState, PoseTelemetry, SlotName } from "./types.js";
import type { Orchestrator } from "./orchestrator.js";
import type { OutputSlots } from "./output-slots.js";
import { isSlotName } from "./output-slots.js";
import { silentLogger, scopedLogger, type PipelineLogger } from "./logger.js";
import { errorMessage } from "./utils.js";

// ─── Messages ───────────────────────────────────────────────────────────────────

export type TelemetryMessage =
  | { type: "telemetry"; data: PoseTelemetry }
  | { type: "state_change"; state: OrchestratorState };

// ─── Server Factory ─────────────────────────────────────────────────────────────

/** The parts of the Orchestrator the server talks to. */
export type TelemetrySource = Pick<Orchestrator, "getState" | "getStatus" | "calibrate" | "onTelemetry" | "onStateChange">;

export type SlotControl = Pick<OutputSlots, "enable" | "disable" | "status">;

export interface TelemetryServerOptions {
  orchestrator: TelemetrySource;
  slots: SlotControl;
  logger?: PipelineLogger;
}

export interface TelemetryServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening. Resolves with the bound port (useful with port 0). */
  listen(port: number): Promise<number>;
  close(): Promise<void>;
}

/**
 * Creates the express app, HTTP server and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createTelemetryServer(options: TelemetryServerOptions): TelemetryServer {
  const { orchestrator, slots } = options;
  const logger = scopedLogger(options.logger ?? silentLogger, "TelemetryServer");

  const app = express();
  const httpServer = createServer(app);
  const wss = new WebSocketServer({ server: httpServer });

  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/status", (_req, res) => {
    res.json(orchestrator.getStatus());
  });

  app.post("/calibrate", (_req, res) => {
    orchestrator.calibrate().then(
      (offset) => {
        res.json({ offset });
      },
      (err: unknown) => {
        logger.log(`Calibration request failed: ${errorMessage(err)}`, "warning");
        res.status(409).json({ error: errorMessage(err) });
      },
    );
  });

  app.post("/slots/:name/enable", (req, res) => {
    const name = slotParam(req.params.name, res);
    if (name === null) return;
    try {
      slots.enable(name);
      res.json({ slot: name, enabled: true });
    } catch (err) {
      res.status(409).json({ error: errorMessage(err) });
    }
  });

  app.post("/slots/:name/disable", (req, res) => {
    const name = slotParam(req.params.name, res);
    if (name === null) return;
    slots.disable(name).then(
      (joined) => {
        res.json({ slot: name, enabled: false, joined });
      },
      (err: unknown) => {
        res.status(500).json({ error: errorMessage(err) });
      },
    );
  });

  // ─── WebSocket feed ───────────────────────────────────────────────────────

  wss.on("connection", (ws: WebSocket) => {
    logger.log(`Viewer connected (${wss.clients.size} total)`, "info");
    sendMessage(ws, { type: "state_change", state: orchestrator.getState() });
    ws.on("close", () => {
      logger.log(`Viewer disconnected (${wss.clients.size} remaining)`, "info");
    });
  });

  const broadcast = (message: TelemetryMessage): void => {
    const text = JSON.stringify(message);
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) client.send(text);
    }
  };

  const unsubscribeTelemetry = orchestrator.onTelemetry((data) => broadcast({ type: "telemetry", data }));
  const unsubscribeState = orchestrator.onStateChange((state) => broadcast({ type: "state_change", state }));

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.log(`Listening on port ${bound}`, "info");
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      unsubscribeTelemetry();
      unsubscribeState();
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function slotParam(raw: string, res: Response): SlotName | null {
  if (!isSlotName(raw)) {
    res.status(404).json({ error: `Unknown slot "${raw}"` });
    return null;
  }
  return raw;
}

function sendMessage(ws: WebSocket, message: TelemetryMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
