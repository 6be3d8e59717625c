import { Writable } from "stream";
import { beforeEach, describe, expect, it } from "@jest/globals";
import { InspectorEngine, describe as describeCommand, type Engine } from "../src/engine.js";
import { createLogger, type Logger } from "../src/logger.js";
import { CoreServer } from "../src/server.js";
import { dispatchLine, makeConnection } from "../src/transport.js";
import type { ConnectionState, CoreNotification, CoreRequest } from "../src/types.js";

class RecordingEngine implements Engine {
  notifications: CoreNotification[] = [];
  requests: CoreRequest[] = [];
  failWith: Error | null = null;

  notify(cmd: CoreNotification): void {
    this.notifications.push(cmd);
  }

  async request(cmd: CoreRequest): Promise<unknown> {
    this.requests.push(cmd);
    if (this.failWith) throw this.failWith;
    return { view_id: "view-id-1" };
  }
}

function silentLogger(): Logger {
  const sink = new Writable({ write(_chunk, _enc, cb) { cb(); } });
  const logger = createLogger({ EDITOR_RPC_LOG_LEVEL: "debug" }, sink);
  logger.enableMemoryHook();
  return logger;
}

describe("CoreServer", () => {
  let engine: RecordingEngine;
  let logger: Logger;
  let server: CoreServer;
  let conn: ConnectionState;
  let sent: unknown[];

  beforeEach(() => {
    engine = new RecordingEngine();
    logger = silentLogger();
    server = new CoreServer({ engine, logger });
    sent = [];
    conn = { id: "conn-1", send: (msg) => sent.push(msg) };
  });

  it("defaults to the tagged strategy", () => {
    expect(server.strategy).toBe("tagged");
  });

  it("passes notifications to the engine without replying", async () => {
    const response = await server.handleLine('{"method":"set_theme","params":{"theme_name":"Dark"}}', conn);
    expect(response).toBeNull();
    expect(engine.notifications).toEqual([{ method: "set_theme", params: { theme_name: "Dark" } }]);
  });

  it("answers requests with the engine's result", async () => {
    const response = await server.handleLine('{"id":0,"method":"new_view","params":{}}', conn);
    expect(response).toEqual({ id: 0, result: { view_id: "view-id-1" } });
    expect(engine.requests).toEqual([{ method: "new_view", params: {} }]);
  });

  it("answers a request that fails to decode with an error response", async () => {
    const response = await server.handleLine('{"id":5,"method":"open_sesame","params":{}}', conn);
    expect(response).toEqual({
      id: 5,
      error: {
        code: -32601,
        message: "Error: Unknown core method 'open_sesame'",
        data: { kind: "unknown_core_method", method: "open_sesame" },
      },
    });
    expect(engine.requests).toEqual([]);
  });

  it("logs and drops a notification that fails to decode", async () => {
    const response = await server.handleLine('{"method":"save","params":{"view_id":"v"}}', conn);
    expect(response).toBeNull();
    expect(engine.notifications).toEqual([]);
    const warnings = logger.getMemory().filter((r) => r.level === "warn");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].msg).toBe(`Error: Malformed core parameters with method 'save', parameters: {"view_id":"v"}`);
    expect(warnings[0].correlationId).toBe("conn-1");
    expect(warnings[0].extra).toEqual({ kind: "malformed_core_params" });
  });

  it("logs and drops a line that is not JSON", async () => {
    expect(await server.handleLine("{oops", conn)).toBeNull();
    const warnings = logger.getMemory().filter((r) => r.level === "warn");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].msg.startsWith("dropping line that is not JSON")).toBe(true);
  });

  it("ignores blank lines", async () => {
    expect(await server.handleLine("   ", conn)).toBeNull();
    expect(logger.getMemory()).toEqual([]);
  });

  it("turns an engine failure into an internal error", async () => {
    engine.failWith = new Error("disk full");
    const response = await server.handleLine('{"id":"r1","method":"new_view","params":{}}', conn);
    expect(response).toEqual({ id: "r1", error: { code: -32603, message: "Error: disk full" } });
    expect(logger.getMemory().filter((r) => r.level === "error")).toHaveLength(1);
  });

  it("decodes the same way with every strategy", async () => {
    for (const strategy of ["borrowed", "owned", "tagged"] as const) {
      const s = new CoreServer({ engine, logger, strategy });
      await s.handleLine('{"method":"edit","params":{"view_id":"v","method":"scroll","params":[0,20]}}', conn);
    }
    const scroll: CoreNotification = {
      method: "edit",
      params: { view_id: "v", cmd: { method: "scroll", params: { start: 0, end: 20 } } },
    };
    expect(engine.notifications).toEqual([scroll, scroll, scroll]);
  });

  it("sends responses through the connection", async () => {
    await dispatchLine('{"id":1,"method":"new_view"}', conn, server);
    await dispatchLine('{"method":"client_started","params":{}}', conn, server);
    expect(sent).toEqual([{ id: 1, result: { view_id: "view-id-1" } }]);
  });
});

describe("InspectorEngine", () => {
  it("echoes requests in canonical form", () => {
    const logger = silentLogger();
    const engine = new InspectorEngine(logger);
    const result = engine.request(
      { method: "edit", params: { view_id: "v", cmd: { method: "find", params: { chars: "x", case_sensitive: true } } } },
      "conn-1",
    );
    expect(result).toEqual({
      accepted: {
        method: "edit",
        params: { view_id: "v", method: "find", params: { chars: "x", case_sensitive: true } },
      },
    });
    expect(logger.getMemory().map((r) => r.msg)).toEqual(["request edit/find@v"]);
  });

  it("logs notifications at debug level", () => {
    const logger = silentLogger();
    new InspectorEngine(logger).notify({ method: "plugin", params: { command: "start", view_id: "v", plugin_name: "p" } }, "c");
    const [rec] = logger.getMemory();
    expect(rec.level).toBe("debug");
    expect(rec.msg).toBe("notification plugin/start");
    expect(rec.correlationId).toBe("c");
  });

  it("describes commands briefly", () => {
    expect(describeCommand({ method: "client_started" })).toBe("client_started");
    expect(describeCommand({ method: "edit", params: { view_id: "view-1", cmd: { method: "undo" } } })).toBe(
      "edit/undo@view-1",
    );
  });
});

describe("makeConnection", () => {
  it("gives every connection its own id", () => {
    const a = makeConnection(() => undefined);
    const b = makeConnection(() => undefined);
    expect(a.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(a.id).not.toBe(b.id);
  });
});
