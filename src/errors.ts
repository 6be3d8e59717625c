/**
 * Decode failures.
 *
 * The set of kinds is closed: structural problems found by the codecs or the
 * view adapter are reported as the enclosing grammar's "malformed" kind rather
 * than as new kinds.
 */

import { E } from "./protocol.js";

export type ProtocolErrorKind =
  | "unknown_core_method"
  | "malformed_core_params"
  | "unknown_edit_method"
  | "malformed_edit_params"
  | "malformed_plugin_params";

const DESCRIPTIONS: Record<ProtocolErrorKind, string> = {
  unknown_core_method:     "Unknown core method",
  malformed_core_params:   "Malformed core parameters",
  unknown_edit_method:     "Unknown edit method",
  malformed_edit_params:   "Malformed edit parameters",
  malformed_plugin_params: "Malformed plugin parameters",
};

/** Serializable form, used as the `data` of an error response. */
export interface ProtocolErrorJson {
  kind: ProtocolErrorKind;
  method: string;
  params?: unknown;
  missing?: true;
}

export class ProtocolError extends Error {
  private constructor(
    public readonly kind: ProtocolErrorKind,
    public readonly method: string,
    /** Raw offending payload; only set for the malformed kinds. */
    public readonly params?: unknown,
    /** True when the message carried no method name at all. */
    public readonly missing = false,
  ) {
    super(formatMessage(kind, method, params, missing));
    this.name = "ProtocolError";
  }

  // ─── Constructors ──────────────────────────────────────────────────────────

  static unknownCoreMethod(method: string): ProtocolError {
    return new ProtocolError("unknown_core_method", method);
  }

  /** The message is not an object, or has no string `method`. */
  static missingMethod(raw: unknown): ProtocolError {
    return new ProtocolError("unknown_core_method", "", raw, true);
  }

  static malformedCoreParams(method: string, params: unknown): ProtocolError {
    return new ProtocolError("malformed_core_params", method, params);
  }

  static unknownEditMethod(method: string): ProtocolError {
    return new ProtocolError("unknown_edit_method", method);
  }

  static malformedEditParams(method: string, params: unknown): ProtocolError {
    return new ProtocolError("malformed_edit_params", method, params);
  }

  static malformedPluginParams(method: string, params: unknown): ProtocolError {
    return new ProtocolError("malformed_plugin_params", method, params);
  }

  // ─── Accessors ─────────────────────────────────────────────────────────────

  get description(): string {
    return DESCRIPTIONS[this.kind];
  }

  get isUnknownMethod(): boolean {
    return this.kind === "unknown_core_method" || this.kind === "unknown_edit_method";
  }

  /** JSON-RPC error code used when the failure is reported to a client. */
  get code(): number {
    return this.isUnknownMethod && !this.missing ? E.MethodNotFound : E.InvalidParams;
  }

  override toString(): string {
    return `Error: ${this.message}`;
  }

  toJSON(): ProtocolErrorJson {
    const json: ProtocolErrorJson = { kind: this.kind, method: this.method };
    if (this.params !== undefined) json.params = this.params;
    if (this.missing) json.missing = true;
    return json;
  }
}

function formatMessage(kind: ProtocolErrorKind, method: string, params: unknown, missing: boolean): string {
  if (missing) return `Missing core method in message: ${showPayload(params)}`;
  switch (kind) {
    case "unknown_core_method":
    case "unknown_edit_method":
      return `${DESCRIPTIONS[kind]} '${method}'`;
    case "malformed_core_params":
    case "malformed_edit_params":
    case "malformed_plugin_params":
      return `${DESCRIPTIONS[kind]} with method '${method}', parameters: ${showPayload(params)}`;
  }
}

/** Absent params print as `null` so the message always names a payload. */
export function showPayload(params: unknown): string {
  if (params === undefined) return "null";
  return JSON.stringify(params) ?? String(params);
}

// ─── Results ─────────────────────────────────────────────────────────────────

export type Decoded<T> =
  | { ok: true; value: T }
  | { ok: false; error: ProtocolError };

/**
 * Run a throwing grammar function and capture a `ProtocolError` as a value.
 * Anything else is a bug and keeps propagating.
 */
export function attempt<T>(fn: () => T): Decoded<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (e instanceof ProtocolError) return { ok: false, error: e };
    throw e;
  }
}
