// Pose Relay - Logging
// Every component takes an injected PipelineLogger; nothing in the pipeline
// writes to files or stdout on its own.

export type LogLevel = "debug" | "info" | "warning" | "error" | "critical";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warning", "error", "critical"];

export interface PipelineLogger {
  log(message: string, level?: LogLevel): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
  critical: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

const ts = () => new Date().toISOString();

/**
 * Console-backed logger. Messages below `minLevel` are dropped; warnings go to
 * stderr via console.warn, errors and criticals via console.error.
 */
export function createConsoleLogger(minLevel: LogLevel = "info"): PipelineLogger {
  const threshold = LEVEL_RANK[minLevel];
  return {
    log(message: string, level: LogLevel = "info"): void {
      if (LEVEL_RANK[level] < threshold) return;
      const line = `[${level.toUpperCase()}] [${ts()}] ${message}`;
      if (level === "error" || level === "critical") {
        console.error(line);
      } else if (level === "warning") {
        console.warn(line);
      } else {
        console.log(line);
      }
    },
  };
}

export const silentLogger: PipelineLogger = {
  log: () => {},
};

/** Prefixes every message with `[component]`. */
export function scopedLogger(logger: PipelineLogger, component: string): PipelineLogger {
  return {
    log: (message, level) => logger.log(`[${component}] ${message}`, level),
  };
}
