/**
 * Levelled logger for the server and transports.
 *
 * Writes to stderr: stdout carries protocol traffic in stdio mode.
 *   EDITOR_RPC_LOG_LEVEL   error | warn | info | debug   (default info)
 *   EDITOR_RPC_LOG_JSON    1 → one JSON record per line
 *
 * The decoder itself never logs; failures are values handed to the caller.
 */

import type { Writable } from "stream";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn:  1,
  info:  2,
  debug: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  msg: string;
  /** Connection id when the record concerns one client. */
  correlationId: string | null;
  extra: Record<string, unknown> | null;
}

class LoggerClass {
  private level: LogLevel;
  private json: boolean;
  private out: Writable;
  private memory: LogRecord[] | null = null;

  constructor(env: NodeJS.ProcessEnv = process.env, out: Writable = process.stderr) {
    const envLevel = env.EDITOR_RPC_LOG_LEVEL ?? "info";
    this.level = isLogLevel(envLevel) ? envLevel : "info";
    this.json = env.EDITOR_RPC_LOG_JSON === "1";
    this.out = out;
  }

  /** Also collect records in memory, for tests. Clears anything collected. */
  enableMemoryHook(): void {
    this.memory = [];
  }

  disableMemoryHook(): void {
    this.memory = null;
  }

  getMemory(): LogRecord[] {
    return this.memory ? [...this.memory] : [];
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] <= LEVELS[this.level];
  }

  private record(level: LogLevel, msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null): void {
    if (!this.shouldLog(level)) return;
    const rec: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      msg,
      correlationId: correlationId ?? null,
      extra: extra ?? null,
    };
    if (this.memory) this.memory.push(rec);
    this.out.write(this.format(rec) + "\n");
  }

  format(rec: LogRecord): string {
    if (this.json) return JSON.stringify(rec);
    const cid   = rec.correlationId ? ` cid=${rec.correlationId}` : "";
    const extra = rec.extra ? " " + JSON.stringify(rec.extra) : "";
    return `[${rec.timestamp}] ${rec.level.toUpperCase()}: ${rec.msg}${cid}${extra}`;
  }

  error(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null): void {
    this.record("error", msg, correlationId, extra);
  }

  warn(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null): void {
    this.record("warn", msg, correlationId, extra);
  }

  info(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null): void {
    this.record("info", msg, correlationId, extra);
  }

  debug(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null): void {
    this.record("debug", msg, correlationId, extra);
  }
}

export type Logger = LoggerClass;

export function createLogger(env?: NodeJS.ProcessEnv, out?: Writable): Logger {
  return new LoggerClass(env, out);
}

const logger = new LoggerClass();

export default logger;
