/**
 * View-scoped command adapter.
 *
 * Wire form of `{ view_id: "v1", cmd: { method: "insert", params: {...} } }`:
 *
 *   {"view_id":"v1","method":"insert","params":{...}}
 *
 * The adapter has no method name of its own, so its shape failures surface as
 * `ShapeError` and are attributed by the enclosing grammar.
 */

import { ShapeError, expectObject } from "./codec.js";
import type { WireCall } from "./protocol.js";
import type { ViewCommand } from "./types.js";

export function decodeViewCommand<T>(raw: unknown, decodeInner: (call: WireCall) => T): ViewCommand<T> {
  // Rest spread defines own properties, so a `__proto__` key stays an
  // ordinary field instead of becoming the copy's prototype.
  const { view_id, ...rest } = expectObject(raw);
  if (typeof view_id !== "string") throw new ShapeError("'view_id' must be a string");
  normalizeEmptyParams(rest);

  const method = Object.hasOwn(rest, "method") ? rest.method : undefined;
  if (typeof method !== "string") throw new ShapeError("'method' must be a string");

  const call: WireCall = { method };
  if (Object.hasOwn(rest, "params")) call.params = rest.params;
  return { view_id, cmd: decodeInner(call) };
}

export function encodeViewCommand<T>(
  command: ViewCommand<T>,
  encodeInner: (cmd: T) => WireCall,
): Record<string, unknown> {
  return { view_id: command.view_id, ...encodeInner(command.cmd) };
}

/**
 * `params: {}` and `params: []` mean the same as no params at all, which lets
 * payload-less variants share the envelope of those that carry one.
 */
function normalizeEmptyParams(obj: Record<string, unknown>): void {
  if (!Object.hasOwn(obj, "params")) return;
  const params = obj.params;
  let empty: boolean;
  if (Array.isArray(params)) empty = params.length === 0;
  else if (typeof params === "object" && params !== null) empty = Object.keys(params).length === 0;
  else throw new ShapeError("'params', if present, must be an object or array");
  if (empty) delete obj.params;
}
