/**
 * FrameSource: latest-wins camera frame slot.
 * A capture loop pulls frames from a FrameGrabber and overwrites a single
 * slot. Readers get an independent copy of whatever is newest; a frame that is
 * overwritten before anyone reads it is simply gone.
 */

import type { Frame, FrameOptions, Stoppable } from "./types.js";
import { silentLogger, scopedLogger, type PipelineLogger } from "./logger.js";
import { createDeferred } from "./utils/deferred.js";
import { errorMessage, monotonicMs, settlesWithin, sleep, type Clock } from "./utils.js";

// ─── Grabber contract ───────────────────────────────────────────────────────────

export interface RawFrame {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
}

/** Device side of the capture loop (camera, ffmpeg pipe, test fake). */
export interface FrameGrabber {
  /** Next frame from the device. Resolves null once the device is closed or exhausted. */
  read(): Promise<RawFrame | null>;
  /** Release the device. Called exactly once by FrameSource. */
  release(): void;
}

export interface FrameSourceOptions {
  logger?: PipelineLogger;
  clock?: Clock;
  /** Pause after a failed read before trying again. */
  retryDelayMs?: number;
}

// ─── Raster helpers ─────────────────────────────────────────────────────────────

/** Nearest-neighbour resize of a packed raster. */
export function resizeNearest(frame: Frame, width: number, height: number): Frame {
  if (width === frame.width && height === frame.height) {
    return { ...frame, data: Buffer.from(frame.data) };
  }
  const { channels } = frame;
  const out = Buffer.alloc(width * height * channels);
  for (let y = 0; y < height; y++) {
    const srcY = Math.min(frame.height - 1, Math.floor((y * frame.height) / height));
    for (let x = 0; x < width; x++) {
      const srcX = Math.min(frame.width - 1, Math.floor((x * frame.width) / width));
      const src = (srcY * frame.width + srcX) * channels;
      const dst = (y * width + x) * channels;
      frame.data.copy(out, dst, src, src + channels);
    }
  }
  return { ...frame, data: out, width, height };
}

/** Horizontal flip of a packed raster. */
export function mirrorHorizontal(frame: Frame): Frame {
  const { width, height, channels } = frame;
  const out = Buffer.alloc(frame.data.length);
  const rowBytes = width * channels;
  for (let y = 0; y < height; y++) {
    const row = y * rowBytes;
    for (let x = 0; x < width; x++) {
      const src = row + x * channels;
      const dst = row + (width - 1 - x) * channels;
      frame.data.copy(out, dst, src, src + channels);
    }
  }
  return { ...frame, data: out };
}

// ─── FrameSource ────────────────────────────────────────────────────────────────

export class FrameSource implements Stoppable {
  private readonly grabber: FrameGrabber;
  private readonly logger: PipelineLogger;
  private readonly clock: Clock;
  private readonly retryDelayMs: number;

  private latestFrame: Frame | null = null;
  private latestRead = true;
  private running = false;
  private stopped = false;
  private released = false;
  private readonly exited = createDeferred<void>();
  private loopStarted = false;

  private framesCaptured = 0;
  private framesOverwritten = 0;
  private readErrors = 0;

  constructor(grabber: FrameGrabber, options: FrameSourceOptions = {}) {
    this.grabber = grabber;
    this.logger = scopedLogger(options.logger ?? silentLogger, "FrameSource");
    this.clock = options.clock ?? monotonicMs;
    this.retryDelayMs = options.retryDelayMs ?? 10;
  }

  /** Start the capture loop. Calling it again, or after stop(), does nothing. */
  start(): void {
    if (this.loopStarted || this.stopped) {
      this.logger.log("start() ignored: already started or stopped", "warning");
      return;
    }
    this.loopStarted = true;
    this.running = true;
    void this.captureLoop();
  }

  /**
   * Newest frame as an independent copy, optionally resized and mirrored.
   * Returns null until the first frame has been captured.
   */
  latest(opts: FrameOptions = {}): Frame | null {
    const current = this.latestFrame;
    if (current === null) return null;
    this.latestRead = true;

    let frame: Frame =
      opts.width && opts.height
        ? resizeNearest(current, opts.width, opts.height)
        : { ...current, data: Buffer.from(current.data) };
    if (opts.mirror) {
      frame = mirrorHorizontal(frame);
    }
    return frame;
  }

  /** Idempotent. Stops the loop and releases the device once. */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.running = false;
    this.release();
    if (!this.loopStarted) {
      this.exited.resolve();
    }
    this.logger.log("Stopped", "info");
  }

  join(timeoutMs: number): Promise<boolean> {
    return settlesWithin(this.exited.promise, timeoutMs);
  }

  get isRunning(): boolean {
    return this.running;
  }

  getStats(): { framesCaptured: number; framesOverwritten: number; readErrors: number } {
    return {
      framesCaptured: this.framesCaptured,
      framesOverwritten: this.framesOverwritten,
      readErrors: this.readErrors,
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────────────

  private async captureLoop(): Promise<void> {
    this.logger.log("Capture loop started", "info");
    try {
      while (this.running) {
        let raw: RawFrame | null;
        try {
          raw = await this.grabber.read();
        } catch (err) {
          this.readErrors++;
          this.logger.log(`Read failed: ${errorMessage(err)}`, "error");
          await sleep(this.retryDelayMs);
          continue;
        }

        if (!this.running) break;
        if (raw === null) {
          this.logger.log("Device closed, capture loop ending", "warning");
          break;
        }

        if (!this.latestRead) this.framesOverwritten++;
        // Strictly increasing, so consumers can tell a new frame from a re-read one.
        const previous = this.latestFrame?.timestamp ?? -Infinity;
        const now = this.clock();
        this.latestFrame = {
          data: raw.data,
          width: raw.width,
          height: raw.height,
          channels: raw.channels,
          timestamp: now > previous ? now : previous + 1,
        };
        this.latestRead = false;
        this.framesCaptured++;
      }
    } finally {
      this.running = false;
      this.release();
      this.logger.log("Capture loop exited", "info");
      this.exited.resolve();
    }
  }

  private release(): void {
    if (this.released) return;
    this.released = true;
    try {
      this.grabber.release();
    } catch (err) {
      this.logger.log(`Release failed: ${errorMessage(err)}`, "error");
    }
  }
}
