/**
 * Structured logger.
 *
 * The terminal owns stdout while the browser runs, so entries go to a sink
 * (normally a log file) rather than the console. Modules take a child logger
 * with their own name.
 */

import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

export interface LogEntry {
  timestamp: string;
  level: keyof typeof LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(line: string): void;
  close?(): Promise<void>;
}

export interface LoggerConfig {
  level: LogLevel;
  json: boolean;
  sink: LogSink;
}

const nullSink: LogSink = { write() {} };

let globalConfig: LoggerConfig = {
  level: LogLevel.INFO,
  json: false,
  sink: nullSink,
};

export function parseLogLevel(name: LogLevelName): LogLevel {
  switch (name) {
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    case "silent":
      return LogLevel.SILENT;
  }
}

export function formatEntry(entry: LogEntry, json: boolean): string {
  if (json) return JSON.stringify(entry);

  const parts = [`[${entry.timestamp}]`, `[${entry.level}]`, `[${entry.module}]`, entry.message];
  if (entry.data && Object.keys(entry.data).length > 0) {
    parts.push(JSON.stringify(entry.data, (_key, value: unknown) =>
      typeof value === "bigint" ? value.toString() : value,
    ));
  }
  return parts.join(" ");
}

export class Logger {
  constructor(
    private readonly module: string,
    private readonly config?: Partial<LoggerConfig>,
  ) {}

  private log(
    level: LogLevel,
    levelName: keyof typeof LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    const cfg = { ...globalConfig, ...this.config };
    if (level < cfg.level) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: levelName,
      module: this.module,
      message,
      data,
    };
    cfg.sink.write(formatEntry(entry, cfg.json) + "\n");
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, "DEBUG", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, "INFO", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, "WARN", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, "ERROR", message, data);
  }

  /** Runs `fn` and logs how long it took at debug level. */
  async timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.debug(`${label} completed`, { durationMs: Math.round(performance.now() - start) });
    }
  }

  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.config);
  }
}

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/** Flush and close the current sink; later entries are dropped. */
export async function closeLogger(): Promise<void> {
  const { sink } = globalConfig;
  globalConfig = { ...globalConfig, sink: nullSink };
  await sink.close?.();
}

export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(module, config);
}

/** Appends log lines to `path`, creating its directory first. */
export function fileSink(path: string): LogSink {
  mkdirSync(dirname(path), { recursive: true });
  const stream: WriteStream = createWriteStream(path, { flags: "a" });
  return {
    write(line) {
      stream.write(line);
    },
    close() {
      return new Promise<void>((resolve) => stream.end(resolve));
    },
  };
}

/** Collects lines in memory. */
export function memorySink(lines: string[] = []): LogSink & { lines: string[] } {
  return {
    lines,
    write(line) {
      lines.push(line);
    },
  };
}

export const rootLogger = createLogger("tablewalk");
