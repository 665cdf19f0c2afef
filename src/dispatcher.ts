/**
 * Dispatcher: bounded, rate-limited delivery of ActuatorPayloads.
 *
 * send() never waits: a full queue drops the new payload and counts it. A
 * background worker pops one payload at a time, waits out the minimum send
 * interval in short steps (so stop() is noticed quickly), and posts it. Failed
 * sends are logged and forgotten; by the time a retry landed the pose would be
 * out of date.
 */

import type { ActuatorPayload, Stoppable } from "./types.js";
import { BoundedQueue } from "./bounded-queue.js";
import { silentLogger, scopedLogger, type PipelineLogger } from "./logger.js";
import { createDeferred } from "./utils/deferred.js";
import { cooperativeSleep, errorMessage, isFiniteNumber, settlesWithin } from "./utils.js";

// ─── Transport ──────────────────────────────────────────────────────────────────

export interface ActuatorTransport {
  /** Deliver one payload. Rejects on network failure or a non-2xx status. */
  post(payload: ActuatorPayload): Promise<void>;
  readonly target: string;
}

export interface HttpActuatorTransportOptions {
  host: string;
  port: number;
  path?: string;
  timeoutMs?: number;
}

/** JSON POST to http://host:port/position with a short timeout. */
export class HttpActuatorTransport implements ActuatorTransport {
  readonly target: string;
  private readonly timeoutMs: number;

  constructor(options: HttpActuatorTransportOptions) {
    const path = options.path ?? "/position";
    this.target = `http://${options.host}:${options.port}${path.startsWith("/") ? path : `/${path}`}`;
    this.timeoutMs = options.timeoutMs ?? 1000;
  }

  async post(payload: ActuatorPayload): Promise<void> {
    const response = await fetch(this.target, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    // Drain so the socket can be reused; the body itself is not interpreted.
    await response.arrayBuffer();
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
  }
}

// ─── Validation ─────────────────────────────────────────────────────────────────

const PAYLOAD_FIELDS: readonly (keyof ActuatorPayload)[] = ["x", "y", "z", "h", "ears", "ax", "ay", "az", "duration_ms"];

/**
 * A payload with a missing or non-finite field is a bug in the caller.
 * @throws Error naming the first bad field
 */
export function assertValidPayload(payload: ActuatorPayload): void {
  for (const field of PAYLOAD_FIELDS) {
    if (!isFiniteNumber(payload[field])) {
      throw new Error(`Malformed actuator payload: "${field}" is ${String(payload[field])}`);
    }
  }
  if (payload.duration_ms < 0) {
    throw new Error(`Malformed actuator payload: negative duration_ms ${payload.duration_ms}`);
  }
}

// ─── Dispatcher ─────────────────────────────────────────────────────────────────

export interface DispatcherOptions {
  name?: string;
  logger?: PipelineLogger;
  /** Default: 32 */
  queueCapacity?: number;
  /** Minimum time between successful sends. Default: 100 */
  minIntervalMs?: number;
  /** Worker queue-wait granularity. Default: 100 */
  pollIntervalMs?: number;
  /** Rate-limit sleep granularity. Default: 20 */
  sleepStepMs?: number;
}

export interface DispatcherStats {
  sent: number;
  failed: number;
  dropped: number;
  queued: number;
}

export class Dispatcher implements Stoppable {
  private readonly transport: ActuatorTransport;
  private readonly logger: PipelineLogger;
  private readonly queue: BoundedQueue<ActuatorPayload>;
  private readonly minIntervalMs: number;
  private readonly pollIntervalMs: number;
  private readonly sleepStepMs: number;

  private running = false;
  private started = false;
  private stopped = false;
  private lastSendAt = -Infinity;
  private readonly exited = createDeferred<void>();

  private sent = 0;
  private failed = 0;
  private dropped = 0;

  constructor(transport: ActuatorTransport, options: DispatcherOptions = {}) {
    this.transport = transport;
    this.logger = scopedLogger(options.logger ?? silentLogger, `Dispatcher:${options.name ?? transport.target}`);
    this.queue = new BoundedQueue<ActuatorPayload>(options.queueCapacity ?? 32);
    this.minIntervalMs = options.minIntervalMs ?? 100;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.sleepStepMs = options.sleepStepMs ?? 20;
  }

  // ─── Public API ─────────────────────────────────────────────────────────────

  /**
   * Queue a payload without waiting. Returns false if it was dropped because
   * the queue is full or the dispatcher is stopped.
   * @throws Error if the payload is malformed
   */
  send(payload: ActuatorPayload): boolean {
    assertValidPayload(payload);
    if (this.stopped) {
      this.dropped++;
      return false;
    }
    if (!this.queue.offer({ ...payload })) {
      this.dropped++;
      this.logger.log(`Queue full (${this.queue.capacity}), dropping pose`, "warning");
      return false;
    }
    return true;
  }

  start(): void {
    if (this.started || this.stopped) {
      this.logger.log("start() ignored: already started or stopped", "warning");
      return;
    }
    this.started = true;
    this.running = true;
    void this.workerLoop();
  }

  /** Idempotent. Safe before start(). Queued payloads are discarded. */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.running = false;
    this.queue.close();
    if (!this.started) this.exited.resolve();
    this.logger.log("Stopped", "info");
  }

  join(timeoutMs: number): Promise<boolean> {
    return settlesWithin(this.exited.promise, timeoutMs);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get target(): string {
    return this.transport.target;
  }

  get queueSize(): number {
    return this.queue.size;
  }

  get queueCapacity(): number {
    return this.queue.capacity;
  }

  getStats(): DispatcherStats {
    return { sent: this.sent, failed: this.failed, dropped: this.dropped, queued: this.queue.size };
  }

  // ─── Worker ─────────────────────────────────────────────────────────────────

  private async workerLoop(): Promise<void> {
    this.logger.log(`Worker started → ${this.transport.target}`, "info");
    try {
      while (this.running) {
        const payload = await this.queue.take(this.pollIntervalMs);
        if (payload === undefined) continue;

        const wait = this.minIntervalMs - (performance.now() - this.lastSendAt);
        if (wait > 0) {
          await cooperativeSleep(wait, () => this.running, this.sleepStepMs);
        }
        if (!this.running) break;

        try {
          await this.transport.post(payload);
          this.lastSendAt = performance.now();
          this.sent++;
          this.logger.log(
            `Sent -> Pitch: ${payload.x.toFixed(3)}, Roll: ${payload.y.toFixed(3)}, Yaw: ${payload.z.toFixed(3)}, ` +
              `Height: ${payload.h.toFixed(3)}, Duration: ${(payload.duration_ms / 1000).toFixed(2)}s`,
            "debug",
          );
        } catch (err) {
          this.failed++;
          this.logger.log(`Error sending: ${errorMessage(err)}`, "error");
        }
      }
    } catch (err) {
      this.logger.log(`Worker crashed: ${errorMessage(err)}`, "critical");
    } finally {
      this.running = false;
      this.logger.log("Worker exited", "info");
      this.exited.resolve();
    }
  }
}
