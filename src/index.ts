#!/usr/bin/env node
/**
 * editor-core-rpc entry point
 *
 * Decodes the front-end → core protocol and hands typed commands to the
 * inspector engine. See config.ts for the command line.
 */

import { randomBytes } from "crypto";
import { readFileSync } from "fs";
import { networkInterfaces } from "os";
import * as qr from "qrcode-terminal";
import { benchmark, formatTiming } from "./bench.js";
import { ConfigError, parseArgs, type ServerConfig } from "./config.js";
import { DECODERS, type DecodeOutcome } from "./decode.js";
import { InspectorEngine } from "./engine.js";
import logger from "./logger.js";
import { CoreServer } from "./server.js";
import { startStdio, startWebSocket } from "./transport.js";

// ─── Network helpers ──────────────────────────────────────────────────────────

function getLanIp(): string | null {
  const nets = networkInterfaces();
  for (const ifaces of Object.values(nets)) {
    if (!ifaces) continue;
    for (const iface of ifaces) {
      if (iface.family === "IPv4" && !iface.internal) {
        return iface.address;
      }
    }
  }
  return null;
}

// ─── Pair key generation ─────────────────────────────────────────────────────

function generatePairKey(): string {
  const chars = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
  const bytes = randomBytes(6);
  let key = "";
  for (const byte of bytes) {
    key += chars[byte % chars.length];
  }
  return key;
}

// ─── QR display ───────────────────────────────────────────────────────────────

function printStartBanner(port: number, pairKey: string, tls: boolean): void {
  const scheme = tls ? "wss" : "ws";
  const lan = getLanIp();
  const localUrl = `${scheme}://localhost:${port}?key=${pairKey}`;
  const connectUrl = lan ? `${scheme}://${lan}:${port}?key=${pairKey}` : localUrl;

  process.stderr.write("\n");
  process.stderr.write("  editor-core-rpc  ·  WebSocket\n");
  process.stderr.write("  ─────────────────────────────────\n");
  process.stderr.write(`  Local:    ${localUrl}\n`);
  if (lan) {
    process.stderr.write(`  Network:  ${scheme}://${lan}:${port}\n`);
  }
  process.stderr.write(`  Pair Key: ${pairKey}\n`);
  process.stderr.write("\n");

  qr.generate(connectUrl, { small: true }, (code: string) => {
    const indented = code
      .split("\n")
      .map((l) => "  " + l)
      .join("\n");
    process.stderr.write(indented + "\n");
    process.stderr.write("  Scan to connect\n\n");
  });
}

// ─── Offline subcommands ──────────────────────────────────────────────────────

function readLines(file: string): string[] {
  return readFileSync(file, "utf-8").split("\n");
}

/** Decode every line of a recorded session; exit code 1 if any fails. */
function runCheck(config: ServerConfig, file: string): number {
  const decode = DECODERS[config.strategy];
  let failures = 0;
  let decoded = 0;
  readLines(file).forEach((line, i) => {
    if (!line.trim()) return;
    let outcome: DecodeOutcome;
    try {
      outcome = decode(line);
    } catch (e) {
      if (!(e instanceof SyntaxError)) throw e;
      failures++;
      process.stdout.write(`${file}:${i + 1}: not JSON: ${e.message}\n`);
      return;
    }
    if (outcome.ok) {
      decoded++;
    } else {
      failures++;
      process.stdout.write(`${file}:${i + 1}: ${outcome.error.toString()}\n`);
    }
  });
  process.stdout.write(`${decoded} decoded, ${failures} failed\n`);
  return failures === 0 ? 0 : 1;
}

function runBench(config: ServerConfig, file: string): number {
  for (const timing of benchmark(readLines(file), config.iterations)) {
    process.stdout.write(formatTiming(timing) + "\n");
  }
  return 0;
}

// ─── Entry ────────────────────────────────────────────────────────────────────

function main(): void {
  let config: ServerConfig;
  try {
    config = parseArgs(process.argv);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    process.stderr.write(`[editor-core-rpc] ${e.message}\n`);
    process.exit(2);
  }
  logger.setLevel(config.logLevel);

  if (config.file !== undefined) {
    const code = config.subcommand === "bench" ? runBench(config, config.file) : runCheck(config, config.file);
    process.exit(code);
  }

  const server = new CoreServer({
    engine: new InspectorEngine(logger),
    logger,
    strategy: config.strategy,
  });

  if (config.transport === "ws") {
    const pairKey = generatePairKey();
    if (config.showQr) {
      printStartBanner(config.port, pairKey, config.tls);
    }
    startWebSocket(server, config.port, { pairKey, tls: config.tls }, logger);
  } else {
    startStdio(server, logger);
  }
}

main();
