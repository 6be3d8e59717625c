/**
 * Per-view edit grammar: `{ method, params? }` → EditNotification / EditRequest.
 */

import {
  ShapeError,
  expectNoParams,
  expectObject,
  readBool,
  readOptionalString,
  readString,
  readUint,
  withShape,
} from "./codec.js";
import { ProtocolError } from "./errors.js";
import { decodeLineRange, decodeMouseAction, encodeLineRange, encodeMouseAction } from "./positional.js";
import type { WireCall } from "./protocol.js";
import {
  EDIT_NOTIFICATION_UNIT_METHODS,
  EDIT_REQUEST_UNIT_METHODS,
  type EditNotification,
  type EditNotificationUnitMethod,
  type EditRequest,
  type EditRequestUnitMethod,
  type GestureType,
} from "./types.js";

const NOTIFICATION_UNITS: ReadonlySet<string> = new Set(EDIT_NOTIFICATION_UNIT_METHODS);
const REQUEST_UNITS: ReadonlySet<string> = new Set(EDIT_REQUEST_UNIT_METHODS);

function isNotificationUnit(method: string): method is EditNotificationUnitMethod {
  return NOTIFICATION_UNITS.has(method);
}

function isRequestUnit(method: string): method is EditRequestUnitMethod {
  return REQUEST_UNITS.has(method);
}

// ─── Decoding ────────────────────────────────────────────────────────────────

export function decodeEditNotification({ method, params }: WireCall): EditNotification {
  return withShape(
    () => notificationVariant(method, params),
    () => ProtocolError.malformedEditParams(method, params),
  );
}

export function decodeEditRequest({ method, params }: WireCall): EditRequest {
  return withShape(
    () => requestVariant(method, params),
    () => ProtocolError.malformedEditParams(method, params),
  );
}

function notificationVariant(method: string, params: unknown): EditNotification {
  if (isNotificationUnit(method)) {
    expectNoParams(params);
    return { method };
  }
  switch (method) {
    case "insert":
      return { method, params: { chars: readString(expectObject(params), "chars") } };
    case "scroll":
    case "request_lines":
      return { method, params: decodeLineRange(params) };
    case "goto_line":
      return { method, params: { line: readUint(expectObject(params), "line") } };
    case "click":
    case "drag":
      return { method, params: decodeMouseAction(params) };
    case "gesture": {
      const p = expectObject(params);
      return {
        method,
        params: { line: readUint(p, "line"), column: readUint(p, "column"), ty: readGestureType(p) },
      };
    }
    case "find_next": {
      const p = expectObject(params);
      return { method, params: { wrap_around: readBool(p, "wrap_around"), allow_same: readBool(p, "allow_same") } };
    }
    case "find_previous":
      return { method, params: { wrap_around: readBool(expectObject(params), "wrap_around") } };
  }
  throw ProtocolError.unknownEditMethod(method);
}

function requestVariant(method: string, params: unknown): EditRequest {
  if (isRequestUnit(method)) {
    expectNoParams(params);
    return { method };
  }
  if (method === "find") {
    const p = expectObject(params);
    const chars = readOptionalString(p, "chars");
    const case_sensitive = readBool(p, "case_sensitive");
    return { method, params: chars === undefined ? { case_sensitive } : { chars, case_sensitive } };
  }
  throw ProtocolError.unknownEditMethod(method);
}

function readGestureType(p: Record<string, unknown>): GestureType {
  const ty = readString(p, "ty");
  if (ty !== "toggle_sel") throw new ShapeError(`unknown gesture type '${ty}'`);
  return ty;
}

// ─── Encoding ────────────────────────────────────────────────────────────────

/** Unit variants encode with no `params` key at all. */
export function encodeEditNotification(cmd: EditNotification): WireCall {
  if (!("params" in cmd)) return { method: cmd.method };
  switch (cmd.method) {
    case "scroll":
    case "request_lines":
      return { method: cmd.method, params: encodeLineRange(cmd.params) };
    case "click":
    case "drag":
      return { method: cmd.method, params: encodeMouseAction(cmd.params) };
    case "insert":
    case "goto_line":
    case "gesture":
    case "find_next":
    case "find_previous":
      return { method: cmd.method, params: { ...cmd.params } };
  }
}

export function encodeEditRequest(cmd: EditRequest): WireCall {
  if (!("params" in cmd)) return { method: cmd.method };
  return { method: cmd.method, params: { ...cmd.params } };
}
