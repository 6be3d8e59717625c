/**
 * Command-line and environment configuration.
 *
 * Usage:
 *   editor-core-rpc                              # serve over stdio (default)
 *   editor-core-rpc start                        # WebSocket on port 3284 + QR code
 *   editor-core-rpc start --port 4000 --no-tls
 *   editor-core-rpc --transport ws --port 4000
 *   editor-core-rpc check session.jsonl          # decode a recorded session
 *   editor-core-rpc bench session.jsonl --iterations 500
 *
 * Common flags: --strategy borrowed|owned|tagged, --debug
 */

import { isDecodeStrategy, type DecodeStrategy } from "./decode.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export type Subcommand = "serve" | "start" | "check" | "bench";

export interface ServerConfig {
  subcommand: Subcommand;
  transport: "stdio" | "ws";
  port: number;
  tls: boolean;
  showQr: boolean;
  strategy: DecodeStrategy;
  /** Passes over the input file per strategy, for `bench`. */
  iterations: number;
  /** Input file for `check` and `bench`. */
  file?: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_PORT = 3284;
export const DEFAULT_ITERATIONS = 100;

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const args = argv.slice(2);
  const envLevel = env.EDITOR_RPC_LOG_LEVEL ?? "info";
  const config: ServerConfig = {
    subcommand: "serve",
    transport: "stdio",
    port: DEFAULT_PORT,
    tls: true,
    showQr: false,
    strategy: "tagged",
    iterations: DEFAULT_ITERATIONS,
    logLevel: isLogLevel(envLevel) ? envLevel : "info",
  };

  // Subcommand as first token
  const first = args[0];
  if (first === "start") {
    config.subcommand = "start";
    config.transport = "ws";
    config.showQr = true;
    args.shift();
  } else if (first === "check" || first === "bench") {
    config.subcommand = first;
    args.shift();
    const file = args.shift();
    if (!file || file.startsWith("--")) throw new ConfigError(`${first}: missing input file`);
    config.file = file;
  } else if (first === "serve") {
    args.shift();
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--transport") {
      const t = requireValue(args, ++i, arg);
      if (t === "ws" || t === "websocket") config.transport = "ws";
      else if (t === "stdio") config.transport = "stdio";
      else throw new ConfigError(`unknown transport '${t}'`);
    } else if (arg === "--port") {
      config.port = parsePositiveInt(requireValue(args, ++i, arg), arg);
    } else if (arg === "--strategy") {
      const s = requireValue(args, ++i, arg);
      if (!isDecodeStrategy(s)) throw new ConfigError(`unknown decode strategy '${s}'`);
      config.strategy = s;
    } else if (arg === "--iterations") {
      config.iterations = parsePositiveInt(requireValue(args, ++i, arg), arg);
    } else if (arg === "--no-tls") {
      config.tls = false;
    } else if (arg === "--debug") {
      config.logLevel = "debug";
    } else {
      throw new ConfigError(`unknown argument '${arg}'`);
    }
  }

  return config;
}

function requireValue(args: string[], i: number, flag: string): string {
  const v = args[i];
  if (v === undefined) throw new ConfigError(`${flag} requires a value`);
  return v;
}

function parsePositiveInt(raw: string, flag: string): number {
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n <= 0) throw new ConfigError(`${flag} must be a positive integer, got '${raw}'`);
  return n;
}
