// Pose Relay - Dummy actuator
// Stand-in for the robot controller's HTTP endpoint. Accepts
// POST /position, answers { status: "ok" } and keeps what it received.
// Used for local development and as the in-process target in tests.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { silentLogger, scopedLogger, type PipelineLogger } from "./logger.js";

export interface DummyActuatorOptions {
  logger?: PipelineLogger;
  /** Oldest payloads are forgotten past this many. Default: 1000 */
  maxRecorded?: number;
}

export interface DummyActuator {
  app: Express;
  httpServer: HttpServer;
  /** Request bodies in arrival order. */
  readonly received: unknown[];
  /** Answer every following request with this status (200 restores normal behaviour). */
  respondWith(status: number): void;
  listen(port: number): Promise<number>;
  close(): Promise<void>;
}

export function createDummyActuator(options: DummyActuatorOptions = {}): DummyActuator {
  const logger = scopedLogger(options.logger ?? silentLogger, "DummyActuator");
  const maxRecorded = options.maxRecorded ?? 1000;
  const received: unknown[] = [];
  let status = 200;

  const app = express();
  app.use(express.json());

  app.post("/position", (req, res) => {
    const body: unknown = req.body;
    received.push(body);
    if (received.length > maxRecorded) received.shift();
    logger.log(`Received payload: ${JSON.stringify(body)}`, "info");

    if (status !== 200) {
      res.status(status).json({ status: "error" });
      return;
    }
    res.json({ status: "ok" });
  });

  const httpServer = createServer(app);

  return {
    app,
    httpServer,
    received,
    respondWith(next: number): void {
      status = next;
    },
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.log(`Server running at http://localhost:${bound}`, "info");
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.closeAllConnections();
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}
