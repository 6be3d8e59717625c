/**
 * Core grammar: `{ method, params }` → CoreNotification / CoreRequest, plus
 * the inverse encoders and the engine entry point `fromJson`.
 */

import { expectObject, readOptionalString, readString, withShape } from "./codec.js";
import { decodeEditNotification, decodeEditRequest, encodeEditNotification, encodeEditRequest } from "./edit.js";
import { ProtocolError, attempt, type Decoded } from "./errors.js";
import { decodePluginNotification, encodePluginNotification } from "./plugin.js";
import { isRecord, type RpcType, type WireCall, type WireMessage } from "./protocol.js";
import type { CoreCommand, CoreMessage, CoreNotification, CoreRequest } from "./types.js";
import { decodeViewCommand, encodeViewCommand } from "./view.js";

// ─── Decoding ────────────────────────────────────────────────────────────────

/**
 * Throws `ProtocolError`. Failures inside the `edit` sub-grammar keep their
 * edit-level kind; failures of the view envelope itself are core-level.
 */
export function decodeCoreNotification({ method, params }: WireCall): CoreNotification {
  return withShape(
    () => notificationVariant(method, params),
    () => ProtocolError.malformedCoreParams(method, params),
  );
}

export function decodeCoreRequest({ method, params }: WireCall): CoreRequest {
  return withShape(
    () => requestVariant(method, params),
    () => ProtocolError.malformedCoreParams(method, params),
  );
}

function notificationVariant(method: string, params: unknown): CoreNotification {
  switch (method) {
    case "edit":
      return { method, params: decodeViewCommand(params, decodeEditNotification) };
    case "plugin":
      return { method, params: decodePluginNotification(params) };
    case "close_view":
      return { method, params: { view_id: readString(expectObject(params), "view_id") } };
    case "save": {
      const p = expectObject(params);
      return { method, params: { view_id: readString(p, "view_id"), file_path: readString(p, "file_path") } };
    }
    case "set_theme":
      return { method, params: { theme_name: readString(expectObject(params), "theme_name") } };
    case "client_started":
      if (params !== undefined) expectEmptyStruct(params);
      return { method };
  }
  throw ProtocolError.unknownCoreMethod(method);
}

function requestVariant(method: string, params: unknown): CoreRequest {
  switch (method) {
    case "edit":
      return { method, params: decodeViewCommand(params, decodeEditRequest) };
    case "new_view": {
      const file_path = params === undefined ? undefined : readOptionalString(expectObject(params), "file_path");
      return { method, params: file_path === undefined ? {} : { file_path } };
    }
  }
  throw ProtocolError.unknownCoreMethod(method);
}

/** A field-less struct: any object (extra keys ignored) or an empty array. */
function expectEmptyStruct(params: unknown): void {
  if (Array.isArray(params) && params.length === 0) return;
  expectObject(params);
}

/**
 * Single-pass decode of a whole parsed message: the presence of `id` picks
 * the grammar, `method` picks the variant.
 */
export function decodeCoreMessage(value: unknown): CoreMessage {
  if (!isRecord(value) || typeof value.method !== "string") {
    throw ProtocolError.missingMethod(value);
  }
  const call: WireCall = { method: value.method, params: value.params };
  if ("id" in value) {
    return { rpc_type: "request", id: value.id, request: decodeCoreRequest(call) };
  }
  return { rpc_type: "notification", notification: decodeCoreNotification(call) };
}

// ─── Engine entry point ──────────────────────────────────────────────────────

/**
 * Build a typed command from an already separated method and params. The
 * engine calls this once it knows whether the message was a request.
 */
export function fromJson(method: string, params: unknown, rpcType: RpcType): Decoded<CoreCommand> {
  return attempt((): CoreCommand =>
    rpcType === "request"
      ? { rpc_type: "request", request: decodeCoreRequest({ method, params }) }
      : { rpc_type: "notification", notification: decodeCoreNotification({ method, params }) },
  );
}

// ─── Encoding ────────────────────────────────────────────────────────────────

export function encodeCoreNotification(cmd: CoreNotification): WireCall {
  switch (cmd.method) {
    case "edit":
      return { method: cmd.method, params: encodeViewCommand(cmd.params, encodeEditNotification) };
    case "plugin":
      return { method: cmd.method, params: encodePluginNotification(cmd.params) };
    case "close_view":
    case "save":
    case "set_theme":
      return { method: cmd.method, params: { ...cmd.params } };
    case "client_started":
      return { method: cmd.method, params: {} };
  }
}

export function encodeCoreRequest(cmd: CoreRequest): WireCall {
  switch (cmd.method) {
    case "edit":
      return { method: cmd.method, params: encodeViewCommand(cmd.params, encodeEditRequest) };
    case "new_view":
      return { method: cmd.method, params: { ...cmd.params } };
  }
}

/** Inverse of `decodeCoreMessage`. */
export function encodeCoreMessage(msg: CoreMessage): WireMessage {
  if (msg.rpc_type === "request") {
    return { id: msg.id, ...encodeCoreRequest(msg.request) };
  }
  return encodeCoreNotification(msg.notification);
}
