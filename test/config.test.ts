import { describe, expect, it } from "@jest/globals";
import { ConfigError, DEFAULT_ITERATIONS, DEFAULT_PORT, parseArgs } from "../src/config.js";

const argv = (...args: string[]): string[] => ["node", "editor-core-rpc", ...args];

describe("parseArgs", () => {
  it("serves over stdio by default", () => {
    expect(parseArgs(argv(), {})).toEqual({
      subcommand: "serve",
      transport: "stdio",
      port: DEFAULT_PORT,
      tls: true,
      showQr: false,
      strategy: "tagged",
      iterations: DEFAULT_ITERATIONS,
      logLevel: "info",
    });
  });

  it("starts a WebSocket server with a QR code for `start`", () => {
    const config = parseArgs(argv("start", "--port", "4000", "--no-tls"), {});
    expect(config.subcommand).toBe("start");
    expect(config.transport).toBe("ws");
    expect(config.showQr).toBe(true);
    expect(config.port).toBe(4000);
    expect(config.tls).toBe(false);
  });

  it("accepts the transport flag without a subcommand", () => {
    const config = parseArgs(argv("--transport", "websocket"), {});
    expect(config.transport).toBe("ws");
    expect(config.showQr).toBe(false);
  });

  it("reads the input file for check and bench", () => {
    expect(parseArgs(argv("check", "session.jsonl", "--strategy", "owned"), {})).toMatchObject({
      subcommand: "check",
      file: "session.jsonl",
      strategy: "owned",
    });
    expect(parseArgs(argv("bench", "session.jsonl", "--iterations", "25"), {})).toMatchObject({
      subcommand: "bench",
      file: "session.jsonl",
      iterations: 25,
    });
  });

  it("takes the log level from the environment unless --debug is given", () => {
    expect(parseArgs(argv(), { EDITOR_RPC_LOG_LEVEL: "warn" }).logLevel).toBe("warn");
    expect(parseArgs(argv(), { EDITOR_RPC_LOG_LEVEL: "loud" }).logLevel).toBe("info");
    expect(parseArgs(argv("--debug"), { EDITOR_RPC_LOG_LEVEL: "warn" }).logLevel).toBe("debug");
  });

  it.each([
    [["check"], "check: missing input file"],
    [["bench", "--iterations", "3"], "bench: missing input file"],
    [["--strategy", "zero-copy"], "unknown decode strategy 'zero-copy'"],
    [["--port", "http"], "--port must be a positive integer, got 'http'"],
    [["--port"], "--port requires a value"],
    [["--transport", "carrier-pigeon"], "unknown transport 'carrier-pigeon'"],
    [["--verbose"], "unknown argument '--verbose'"],
  ])("rejects %j", (args, message) => {
    expect(() => parseArgs(argv(...args), {})).toThrow(new ConfigError(message));
  });
});
