import { inspect } from "node:util";
import { ENV_DISABLE_LOG_ECHO } from "./constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown> | null;
}

export interface Logger {
  child(scope: string): Logger;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type Sink = (entry: LogEntry) => void;
type EchoWriter = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: Sink;
  echo?: {
    minLevel: LogLevel;
    writer?: EchoWriter;
  };
  clock?: () => number;
  minLevel?: LogLevel;
}

const defaultClock = () => Date.now();

function isEchoSuppressed(): boolean {
  const raw = process.env[ENV_DISABLE_LOG_ECHO];
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return false;
  return normalized !== "0" && normalized !== "false";
}

const defaultEchoWriter: EchoWriter = (entry) => {
  if (isEchoSuppressed()) return;
  const { level, scope, message, meta } = entry;
  const prefix =
    level === "error"
      ? "error:"
      : level === "warn"
        ? "warning:"
        : level === "info"
          ? "info:"
          : "debug:";
  const scopeText = scope ? `[${scope}] ` : "";
  if (meta && Object.keys(meta).length) {
    console.error(`${prefix} ${scopeText}${message}`, serializeMeta(meta));
  } else {
    console.error(`${prefix} ${scopeText}${message}`);
  }
};

function serializeMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

function atOrAbove(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export class StructuredLogger implements Logger {
  private readonly sink: Sink;
  private readonly echoMinLevel?: LogLevel;
  private readonly echoWriter: EchoWriter;
  private readonly clock: () => number;
  private readonly scope?: string;
  private readonly minLevel: LogLevel;

  constructor({ scope, sink, echo, clock, minLevel }: LoggerOptions = {}) {
    this.scope = scope;
    this.sink = sink ?? (() => {});
    this.echoMinLevel = echo?.minLevel;
    this.echoWriter = echo?.writer ?? defaultEchoWriter;
    this.clock = clock ?? defaultClock;
    this.minLevel = minLevel ?? "debug";
  }

  child(scope: string): Logger {
    const childScope = this.scope ? `${this.scope}.${scope}` : scope;
    return new StructuredLogger({
      scope: childScope,
      sink: this.sink,
      echo: this.echoMinLevel
        ? { minLevel: this.echoMinLevel, writer: this.echoWriter }
        : undefined,
      clock: this.clock,
      minLevel: this.minLevel,
    });
  }

  private emit(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
  ): void {
    if (!this.isLevelEnabled(level)) return;
    const entry: LogEntry = {
      ts: this.clock(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.sink(entry);
    if (this.echoMinLevel && atOrAbove(level, this.echoMinLevel)) {
      this.echoWriter(entry);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.emit("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return atOrAbove(level, this.minLevel);
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({ echo: { minLevel }, minLevel });
  }
}

/** Collects entries in memory; handy for surfacing conflicts to a caller's UI. */
export function memorySink(): { sink: Sink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { sink: (entry) => entries.push(entry), entries };
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as string[]).includes(value);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export function loggerFromLevel(level?: string): ConsoleLogger {
  return new ConsoleLogger(parseLogLevel(level));
}
