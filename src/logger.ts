// src/logger.ts — Line logger
// One handle is created at startup and passed down through the rotation context.

import dayjs from "dayjs";
import type { Dayjs } from "dayjs";

const LEVELS = { trace: 0, debug: 1, info: 2, warn: 3, error: 4 } as const;
export type LogLevel = keyof typeof LEVELS;

const LEVEL_LABELS: Record<LogLevel, string> = {
  trace: "TRACE",
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
};

export type Verbosity = 0 | 1 | 2 | 3;

const VERBOSITY_LEVELS: Record<Verbosity, LogLevel> = {
  0: "warn",
  1: "info",
  2: "debug",
  3: "trace",
};

export type LogSink = (line: string) => void;

export interface Logger {
  trace(msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  /** Logs `msg`; when `err` is an Error its stack follows on the next lines. */
  error(msg: string, err?: unknown): void;
  /** Same threshold and sink, different module column. */
  child(module: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  module?: string;
  sink?: LogSink;
  clock?: () => Dayjs;
}

export function verbosityToLevel(verbosity: Verbosity): LogLevel {
  return VERBOSITY_LEVELS[verbosity];
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line + "\n");
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVELS[options.level ?? "info"];
  const module = options.module ?? "tier-rotate";
  const sink = options.sink ?? stdoutSink;
  const clock = options.clock ?? (() => dayjs());

  const write = (level: LogLevel, msg: string, err?: unknown) => {
    if (LEVELS[level] < threshold) return;
    const ts = clock().format("YYYY-MM-DD HH:mm:ss,SSS");
    let line = `${ts}|${LEVEL_LABELS[level]}|${module}| ${msg}`;
    if (err instanceof Error && err.stack) line += "\n" + err.stack;
    sink(line);
  };

  return {
    trace: (msg) => write("trace", msg),
    debug: (msg) => write("debug", msg),
    info: (msg) => write("info", msg),
    warn: (msg) => write("warn", msg),
    error: (msg, err) => write("error", msg, err),
    child: (name) => createLogger({ ...options, module: name }),
  };
}
