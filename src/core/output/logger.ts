import pc from "picocolors";
import type { LogLevel } from "../config/schema.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = {
  write(chunk: string): unknown;
  isTTY?: boolean;
};

export type LoggerOptions = {
  level?: LogLevel;
  /** Defaults to whether the sink is a terminal. */
  color?: boolean;
  sink?: LogSink;
  now?: () => Date;
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const sink: LogSink = options.sink ?? process.stderr;
  const now = options.now ?? (() => new Date());
  const colors = pc.createColors(options.color ?? Boolean(sink.isTTY));

  const paint: Record<LogLevel, (text: string) => string> = {
    debug: colors.gray,
    info: colors.gray,
    warn: colors.yellow,
    error: colors.red,
  };

  const emit = (entryLevel: LogLevel, message: string): void => {
    if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) {
      return;
    }
    const line = `${formatClock(now())} ${LEVEL_LABELS[entryLevel].padEnd(7)} ${message}`;
    sink.write(`${paint[entryLevel](line)}\n`);
  };

  return {
    level,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

export function formatClock(date: Date): string {
  const pad = (value: number, width = 2): string => String(value).padStart(width, "0");
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}:${pad(date.getMilliseconds(), 3)}`;
}
