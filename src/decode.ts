/**
 * Line decoders.
 *
 * Three interchangeable strategies sit behind one signature so their cost can
 * be compared on real traffic (see `bench.ts`):
 *
 *   borrowed  classify the parsed value in place and hand `method`/`params`
 *             to `fromJson`; the result references the parse tree.
 *   owned     strip `id`, materialize a detached `{ method, params }` call,
 *             then convert; the result shares nothing with the parse tree.
 *   tagged    decode the whole parsed message in one pass, letting the `id`
 *             and `method` tags drive dispatch.
 *
 * Each strategy also has a `*Value` form taking the already parsed message.
 *
 * Input that is not JSON at all is a framing problem: every strategy lets the
 * `SyntaxError` from `JSON.parse` escape rather than reporting it as a
 * protocol error.
 */

import { decodeCoreMessage, decodeCoreNotification, decodeCoreRequest, fromJson } from "./core.js";
import { ProtocolError } from "./errors.js";
import { classify, isRecord, type RpcId, type RpcType, type WireCall } from "./protocol.js";
import type { CoreMessage } from "./types.js";

export type DecodeOutcome =
  | { ok: true; message: CoreMessage }
  | { ok: false; error: ProtocolError; rpc_type: RpcType; id: RpcId };

export type LineDecoder = (line: string) => DecodeOutcome;

export const STRATEGIES = ["borrowed", "owned", "tagged"] as const;

export type DecodeStrategy = (typeof STRATEGIES)[number];

export function isDecodeStrategy(name: string): name is DecodeStrategy {
  return STRATEGIES.some((s) => s === name);
}

// ─── borrowed ────────────────────────────────────────────────────────────────

export function decodeBorrowed(line: string): DecodeOutcome {
  return decodeBorrowedValue(JSON.parse(line));
}

export function decodeBorrowedValue(value: unknown): DecodeOutcome {
  const classified = classify(value);
  if (!classified.ok) return classified;

  const { rpc_type, id, method, params } = classified.value;
  const result = fromJson(method, params, rpc_type);
  if (!result.ok) return { ok: false, error: result.error, rpc_type, id };

  const cmd = result.value;
  return cmd.rpc_type === "request"
    ? { ok: true, message: { rpc_type: "request", id, request: cmd.request } }
    : { ok: true, message: cmd };
}

// ─── owned ───────────────────────────────────────────────────────────────────

export function decodeOwned(line: string): DecodeOutcome {
  return decodeOwnedValue(JSON.parse(line));
}

export function decodeOwnedValue(value: unknown): DecodeOutcome {
  if (!isRecord(value)) {
    return { ok: false, error: ProtocolError.missingMethod(value), rpc_type: "notification", id: undefined };
  }

  const rpc_type: RpcType = "id" in value ? "request" : "notification";
  const { id, ...rest } = value;
  if (typeof rest.method !== "string") {
    return { ok: false, error: ProtocolError.missingMethod(value), rpc_type, id };
  }

  const call: WireCall = { method: rest.method, params: structuredClone(rest.params) };
  try {
    return rpc_type === "request"
      ? { ok: true, message: { rpc_type, id: structuredClone(id), request: decodeCoreRequest(call) } }
      : { ok: true, message: { rpc_type, notification: decodeCoreNotification(call) } };
  } catch (e) {
    if (e instanceof ProtocolError) return { ok: false, error: e, rpc_type, id };
    throw e;
  }
}

// ─── tagged ──────────────────────────────────────────────────────────────────

export function decodeTagged(line: string): DecodeOutcome {
  return decodeTaggedValue(JSON.parse(line));
}

export function decodeTaggedValue(value: unknown): DecodeOutcome {
  try {
    return { ok: true, message: decodeCoreMessage(value) };
  } catch (e) {
    if (!(e instanceof ProtocolError)) throw e;
    if (isRecord(value) && "id" in value) {
      return { ok: false, error: e, rpc_type: "request", id: value.id };
    }
    return { ok: false, error: e, rpc_type: "notification", id: undefined };
  }
}

export const DECODERS: Record<DecodeStrategy, LineDecoder> = {
  borrowed: decodeBorrowed,
  owned:    decodeOwned,
  tagged:   decodeTagged,
};
