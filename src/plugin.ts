/**
 * Plugin grammar. Unlike the core and edit grammars this one is internally
 * tagged: the discriminant is a `command` field inside the params object,
 * so plugin dispatch is never confused with core `method` dispatch.
 */

import { ShapeError, expectObject, readString, withShape, type JsonObject } from "./codec.js";
import { ProtocolError } from "./errors.js";
import { isRecord, type RpcType } from "./protocol.js";
import type { PlaceholderRpc, PluginNotification } from "./types.js";

export function decodePluginNotification(params: unknown): PluginNotification {
  const command = isRecord(params) && typeof params.command === "string" ? params.command : "";
  return withShape(
    () => pluginVariant(expectObject(params), command),
    () => ProtocolError.malformedPluginParams(command, params),
  );
}

function pluginVariant(p: JsonObject, command: string): PluginNotification {
  switch (command) {
    case "start":
    case "stop":
      return { command, view_id: readString(p, "view_id"), plugin_name: readString(p, "plugin_name") };
    case "plugin_rpc":
      return {
        command,
        view_id: readString(p, "view_id"),
        receiver: readString(p, "receiver"),
        rpc: decodePlaceholderRpc(p.rpc),
      };
  }
  throw new ShapeError(command ? `unknown plugin command '${command}'` : "missing plugin command");
}

/** `params` is kept exactly as parsed; it may be any JSON value, or absent. */
export function decodePlaceholderRpc(value: unknown): PlaceholderRpc {
  const obj = expectObject(value, "rpc");
  return { method: readString(obj, "method"), params: obj.params ?? null, rpc_type: readRpcType(obj) };
}

function readRpcType(obj: JsonObject): RpcType {
  const t = readString(obj, "rpc_type");
  if (t !== "notification" && t !== "request") throw new ShapeError(`unknown rpc_type '${t}'`);
  return t;
}

// ─── Encoding ────────────────────────────────────────────────────────────────

export function encodePluginNotification(cmd: PluginNotification): Record<string, unknown> {
  switch (cmd.command) {
    case "start":
    case "stop":
      return { command: cmd.command, view_id: cmd.view_id, plugin_name: cmd.plugin_name };
    case "plugin_rpc":
      return {
        command: cmd.command,
        view_id: cmd.view_id,
        receiver: cmd.receiver,
        rpc: { method: cmd.rpc.method, params: cmd.rpc.params, rpc_type: cmd.rpc.rpc_type },
      };
  }
}
