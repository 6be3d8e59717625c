/**
 * Transport layer: stdio (default) and WebSocket.
 *
 * Both transports create a ConnectionState, forward each incoming line (or
 * frame) to the server, and write back whatever response it produces.
 */

import * as readline from "readline";
import * as http from "http";
import * as https from "https";
import { URL } from "url";
import { WebSocketServer, WebSocket } from "ws";
import * as selfsigned from "selfsigned";
import { v4 as uuid } from "uuid";
import type { Logger } from "./logger.js";
import { toLine, type RpcResponse } from "./protocol.js";
import type { ConnectionState } from "./types.js";
import type { CoreServer } from "./server.js";

// ─── Connection factory ───────────────────────────────────────────────────────

export function makeConnection(sendFn: (msg: RpcResponse) => void): ConnectionState {
  return { id: uuid(), send: sendFn };
}

// ─── Line dispatcher ──────────────────────────────────────────────────────────

export async function dispatchLine(line: string, conn: ConnectionState, server: CoreServer): Promise<void> {
  const response = await server.handleLine(line, conn);
  if (response) conn.send(response);
}

function dispatchLogged(line: string, conn: ConnectionState, server: CoreServer, logger: Logger): void {
  dispatchLine(line, conn, server).catch((err: unknown) => {
    logger.error("failed to handle line", conn.id, { err: String(err) });
  });
}

// ─── stdio transport ──────────────────────────────────────────────────────────

export function startStdio(server: CoreServer, logger: Logger): void {
  const conn = makeConnection((msg) => {
    process.stdout.write(toLine(msg) + "\n");
  });

  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
    crlfDelay: Infinity,
  });

  rl.on("line", (line) => dispatchLogged(line, conn, server, logger));

  rl.on("close", () => {
    logger.info("stdin closed", conn.id);
    process.exit(0);
  });

  logger.info(`listening on stdio (strategy: ${server.strategy})`, conn.id);
}

// ─── WebSocket transport ──────────────────────────────────────────────────────

export interface WsOptions {
  pairKey: string;
  tls?: boolean;
}

/** Close code sent when the `?key=` query parameter does not match. */
export const CLOSE_BAD_PAIR_KEY = 4401;

export function startWebSocket(
  server: CoreServer,
  port: number,
  options: WsOptions,
  logger: Logger,
): http.Server | https.Server {
  const useTls = options.tls !== false;
  const proto = useTls ? "wss" : "ws";

  let httpServer: http.Server | https.Server;
  if (useTls) {
    const attrs = [{ name: "commonName", value: "localhost" }];
    const pems = selfsigned.generate(attrs, { days: 1 });
    httpServer = https.createServer({ key: pems.private, cert: pems.cert });
  } else {
    httpServer = http.createServer();
  }

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket, req) => {
    // ─── Pair key validation ──────────────────────────────────────────
    const reqUrl = new URL(req.url ?? "/", `${useTls ? "https" : "http"}://localhost:${port}`);
    const clientKey = reqUrl.searchParams.get("key");
    if (clientKey !== options.pairKey) {
      logger.warn("rejected connection with bad pair key", null, { remote: req.socket.remoteAddress });
      ws.close(CLOSE_BAD_PAIR_KEY, "Invalid pair key");
      return;
    }

    const conn = makeConnection((msg) => {
      if (ws.readyState !== WebSocket.OPEN) return;
      ws.send(toLine(msg), (err) => {
        // Socket closed between readyState check and send
        if (err) logger.debug("send failed", conn.id, { err: err.message });
      });
    });
    logger.info("client connected", conn.id, { remote: req.socket.remoteAddress });

    ws.on("message", (data) => {
      // A frame may hold several newline-delimited messages.
      for (const line of data.toString().split("\n")) {
        dispatchLogged(line, conn, server, logger);
      }
    });
    // Protocol violations (bad UTF-8, oversized frames) end this socket only.
    ws.on("error", (err) => logger.warn("socket error", conn.id, { err: err.message }));
    ws.on("close", () => logger.info("client disconnected", conn.id));
  });

  // Also receives the HTTP server's errors, such as EADDRINUSE on listen.
  wss.on("error", (err) => {
    logger.error(`WebSocket server error: ${err.message}`);
    httpServer.close();
  });

  httpServer.listen(port, () => {
    logger.info(`listening on ${proto}://0.0.0.0:${port} (strategy: ${server.strategy})`);
  });

  return httpServer;
}
