/**
 * Wire envelope types and helpers.
 * Messages are newline-delimited JSON over stdio or WebSocket frames:
 *
 *   {"id"?: <any>, "method": <string>, "params"?: <object|array>}
 *
 * A message with an `id` key (even `"id": null`) is a request; one without is
 * a notification.
 */

import { ProtocolError } from "./errors.js";

/** Correlation ids are opaque to the core and echoed back verbatim. */
export type RpcId = unknown;

export type RpcType = "notification" | "request";

/** Adjacently tagged call: the tag and its payload are sibling fields. */
export interface WireCall {
  method: string;
  params?: unknown;
}

export interface WireMessage extends WireCall {
  id?: RpcId;
}

export interface RpcSuccessResponse {
  id: RpcId;
  result: unknown;
}

export interface RpcErrorResponse {
  id: RpcId;
  error: RpcError;
}

export interface RpcError {
  code: number;
  message: string;
  data?: unknown;
}

export type RpcResponse = RpcSuccessResponse | RpcErrorResponse;

// ─── Error Codes ────────────────────────────────────────────────────────────

export const E = {
  MethodNotFound: -32601,
  InvalidParams:  -32602,
  InternalError:  -32603,
} as const;

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function ok(id: RpcId, result: unknown): RpcSuccessResponse {
  return { id, result };
}

export function rpcErr(id: RpcId, code: number, message: string, data?: unknown): RpcErrorResponse {
  const error: RpcError = { code, message };
  if (data !== undefined) error.data = data;
  return { id, error };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Classification ──────────────────────────────────────────────────────────

/**
 * A message split into the parts dispatch needs. `method` and `params` are
 * the parsed values themselves, not copies.
 */
export interface Classified {
  rpc_type: RpcType;
  id: RpcId;
  method: string;
  params: unknown;
}

export type Classification =
  | { ok: true; value: Classified }
  | { ok: false; error: ProtocolError; rpc_type: RpcType; id: RpcId };

export function classify(value: unknown): Classification {
  if (!isRecord(value)) {
    return { ok: false, error: ProtocolError.missingMethod(value), rpc_type: "notification", id: undefined };
  }
  const rpc_type: RpcType = "id" in value ? "request" : "notification";
  const { id, method, params } = value;
  if (typeof method !== "string") {
    return { ok: false, error: ProtocolError.missingMethod(value), rpc_type, id };
  }
  return { ok: true, value: { rpc_type, id, method, params } };
}

/** Serialize one outgoing message as a single line (no trailing newline). */
export function toLine(msg: WireMessage | RpcResponse): string {
  return JSON.stringify(msg);
}
