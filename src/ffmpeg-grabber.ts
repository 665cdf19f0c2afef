// Pose Relay - ffmpeg-backed FrameGrabber
// Spawns ffmpeg to read the camera and decode to raw RGB24 on stdout, then
// slices the byte stream into fixed-size frames. Only the newest complete
// frame is kept between reads.

import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import type { FrameGrabber, RawFrame } from "./frame-source.js";
import { silentLogger, scopedLogger, type PipelineLogger } from "./logger.js";

export interface FfmpegGrabberOptions {
  device: string;
  width: number;
  height: number;
  fps: number;
  /** ffmpeg input format. Default: "v4l2" (Linux webcams). */
  inputFormat?: string;
  /** ffmpeg binary. Default: "ffmpeg" from PATH. */
  ffmpegPath?: string;
  logger?: PipelineLogger;
}

const CHANNELS = 3;

export function buildFfmpegArgs(options: FfmpegGrabberOptions): string[] {
  return [
    "-hide_banner",
    "-loglevel", "error",
    "-f", options.inputFormat ?? "v4l2",
    "-framerate", String(options.fps),
    "-video_size", `${options.width}x${options.height}`,
    "-i", options.device,
    "-f", "rawvideo",
    "-pix_fmt", "rgb24",
    "pipe:1",
  ];
}

export class FfmpegFrameGrabber implements FrameGrabber {
  private readonly options: FfmpegGrabberOptions;
  private readonly logger: PipelineLogger;
  private readonly frameBytes: number;
  private child: ChildProcessWithoutNullStreams | null = null;

  private partial: Buffer[] = [];
  private partialBytes = 0;
  private pending: RawFrame | null = null;
  private waiter: ((frame: RawFrame | null) => void) | null = null;
  private closed = false;

  constructor(options: FfmpegGrabberOptions) {
    this.options = options;
    this.logger = scopedLogger(options.logger ?? silentLogger, "FfmpegGrabber");
    this.frameBytes = options.width * options.height * CHANNELS;
  }

  read(): Promise<RawFrame | null> {
    if (this.closed) return Promise.resolve(null);
    this.ensureStarted();

    if (this.pending !== null) {
      const frame = this.pending;
      this.pending = null;
      return Promise.resolve(frame);
    }
    if (this.waiter !== null) {
      return Promise.reject(new Error("read() already pending"));
    }
    return new Promise<RawFrame | null>((resolve) => {
      this.waiter = resolve;
    });
  }

  release(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.child !== null) {
      this.child.stdout.removeAllListeners("data");
      this.child.kill("SIGTERM");
      this.child = null;
    }
    this.partial = [];
    this.partialBytes = 0;
    this.pending = null;
    this.deliver(null);
  }

  // ─── Internal ───────────────────────────────────────────────────────────────

  private ensureStarted(): void {
    if (this.child !== null) return;
    const args = buildFfmpegArgs(this.options);
    this.logger.log(`Spawning ${this.options.ffmpegPath ?? "ffmpeg"} ${args.join(" ")}`, "debug");

    const child = spawn(this.options.ffmpegPath ?? "ffmpeg", args);
    this.child = child;

    child.stdout.on("data", (chunk: Buffer) => this.onData(chunk));
    child.stderr.on("data", (chunk: Buffer) => {
      this.logger.log(chunk.toString("utf-8").trim(), "warning");
    });
    child.on("error", (err) => {
      this.logger.log(`ffmpeg failed to start: ${err.message}`, "error");
      this.release();
    });
    child.on("exit", (code, signal) => {
      if (!this.closed) {
        this.logger.log(`ffmpeg exited (code=${code}, signal=${signal})`, "warning");
        this.release();
      }
    });
  }

  private onData(chunk: Buffer): void {
    let offset = 0;
    while (offset < chunk.length) {
      const take = Math.min(this.frameBytes - this.partialBytes, chunk.length - offset);
      this.partial.push(chunk.subarray(offset, offset + take));
      this.partialBytes += take;
      offset += take;

      if (this.partialBytes === this.frameBytes) {
        const frame: RawFrame = {
          data: Buffer.concat(this.partial, this.frameBytes),
          width: this.options.width,
          height: this.options.height,
          channels: CHANNELS,
        };
        this.partial = [];
        this.partialBytes = 0;
        if (!this.deliver(frame)) {
          this.pending = frame; // latest wins
        }
      }
    }
  }

  private deliver(frame: RawFrame | null): boolean {
    const waiter = this.waiter;
    if (waiter === null) return false;
    this.waiter = null;
    waiter(frame);
    return true;
  }
}
