// Pose Relay - Pose log
// Optional on-disk record of the telemetry stream, one JSON object per line.
// Written by the surrounding application (it subscribes to
// Orchestrator.onTelemetry); the pipeline itself never touches the disk.

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { PoseTelemetry } from "./types.js";
import { silentLogger, scopedLogger, type PipelineLogger } from "./logger.js";
import { errorMessage } from "./utils.js";

/**
 * Formats a date as `YYYYmmdd_HHMMSS` in local time.
 */
export function formatLogStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** One log line: the telemetry plus wall-clock time of writing. */
export function formatPoseLine(telemetry: PoseTelemetry, loggedAt: Date): string {
  return JSON.stringify({ loggedAt: loggedAt.toISOString(), ...telemetry }) + "\n";
}

export interface PoseLogOptions {
  logger?: PipelineLogger;
  now?: () => Date;
}

export class PoseLog {
  readonly path: string;
  private readonly dir: string;
  private readonly logger: PipelineLogger;
  private readonly now: () => Date;
  /** Appends run one after another in record() order. */
  private chain: Promise<void>;
  private closed = false;
  private written = 0;
  private failures = 0;

  constructor(dir: string, sessionId: string, options: PoseLogOptions = {}) {
    this.dir = dir;
    this.logger = scopedLogger(options.logger ?? silentLogger, "PoseLog");
    this.now = options.now ?? (() => new Date());
    this.path = join(dir, `pose_${formatLogStamp(this.now())}_${sessionId.slice(0, 8)}.jsonl`);
    this.chain = mkdir(dir, { recursive: true }).then(
      () => {
        this.logger.log(`Writing pose log to ${this.path}`, "info");
      },
      (err: unknown) => {
        this.failures++;
        this.logger.log(`Cannot create ${this.dir}: ${errorMessage(err)}`, "error");
      },
    );
  }

  /** Queue one line. Returns immediately; write errors are logged and counted. */
  record(telemetry: PoseTelemetry): void {
    if (this.closed) return;
    const line = formatPoseLine(telemetry, this.now());
    this.chain = this.chain.then(() =>
      appendFile(this.path, line, "utf-8").then(
        () => {
          this.written++;
        },
        (err: unknown) => {
          this.failures++;
          this.logger.log(`Write failed: ${errorMessage(err)}`, "error");
        },
      ),
    );
  }

  /** Resolves once every queued line has been written (or has failed). */
  flush(): Promise<void> {
    return this.chain;
  }

  /** Stop accepting lines and wait for the queued ones. */
  async close(): Promise<void> {
    this.closed = true;
    await this.chain;
  }

  getStats(): { written: number; failures: number } {
    return { written: this.written, failures: this.failures };
  }
}
