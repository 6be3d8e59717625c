/**
 * CoreServer: one decoded line at a time.
 *
 * For every line the transport hands over:
 *   1. decode it with the configured strategy;
 *   2. on success pass the typed command to the engine, replying to requests
 *      with the engine's result;
 *   3. on failure reply to requests with an error response; notifications have
 *      nobody to reply to, so the failure is logged and the line dropped.
 *
 * Decoding never suspends. Only the engine's request handler may be async.
 */

import { DECODERS, type DecodeOutcome, type DecodeStrategy, type LineDecoder } from "./decode.js";
import type { Engine } from "./engine.js";
import type { Logger } from "./logger.js";
import { E, ok, rpcErr, type RpcResponse } from "./protocol.js";
import type { ConnectionState } from "./types.js";

export interface CoreServerOptions {
  engine: Engine;
  logger: Logger;
  strategy?: DecodeStrategy;
}

export class CoreServer {
  private readonly engine: Engine;
  private readonly logger: Logger;
  private readonly decode: LineDecoder;
  readonly strategy: DecodeStrategy;

  constructor(options: CoreServerOptions) {
    this.engine = options.engine;
    this.logger = options.logger;
    this.strategy = options.strategy ?? "tagged";
    this.decode = DECODERS[this.strategy];
  }

  // ── Entry point ────────────────────────────────────────────────────────────

  async handleLine(line: string, conn: ConnectionState): Promise<RpcResponse | null> {
    const trimmed = line.trim();
    if (!trimmed) return null;

    let outcome: DecodeOutcome;
    try {
      outcome = this.decode(trimmed);
    } catch (e) {
      if (!(e instanceof SyntaxError)) throw e;
      this.logger.warn(`dropping line that is not JSON: ${e.message}`, conn.id, { line: trimmed });
      return null;
    }

    if (!outcome.ok) {
      const { error } = outcome;
      if (outcome.rpc_type === "request") {
        return rpcErr(outcome.id, error.code, error.toString(), error.toJSON());
      }
      this.logger.warn(error.toString(), conn.id, { kind: error.kind });
      return null;
    }

    const msg = outcome.message;
    if (msg.rpc_type === "notification") {
      this.engine.notify(msg.notification, conn.id);
      return null;
    }

    try {
      const result = await this.engine.request(msg.request, conn.id);
      return ok(msg.id, result);
    } catch (e) {
      this.logger.error(`engine failed on '${msg.request.method}'`, conn.id, { err: String(e) });
      return rpcErr(msg.id, E.InternalError, String(e));
    }
  }
}
