/**
 * Field readers shared by the grammars.
 *
 * Readers throw `ShapeError`; the grammar that owns the method being decoded
 * turns it into its own "malformed params" error, carrying the raw payload.
 */

import { isRecord } from "./protocol.js";

export class ShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShapeError";
  }
}

export type JsonObject = Record<string, unknown>;

export function expectObject(value: unknown, what = "params"): JsonObject {
  if (!isRecord(value)) throw new ShapeError(`${what} must be an object`);
  return value;
}

export function expectArray(value: unknown, what = "params"): unknown[] {
  if (!Array.isArray(value)) throw new ShapeError(`${what} must be an array`);
  return value;
}

export function expectUint(value: unknown, what: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw new ShapeError(`${what} must be a non-negative integer`);
  }
  return value;
}

export function readString(obj: JsonObject, key: string): string {
  const v = obj[key];
  if (typeof v !== "string") throw new ShapeError(`'${key}' must be a string`);
  return v;
}

/** `null` and a missing key both read as unset. */
export function readOptionalString(obj: JsonObject, key: string): string | undefined {
  const v = obj[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new ShapeError(`'${key}' must be a string or null`);
  return v;
}

export function readUint(obj: JsonObject, key: string): number {
  return expectUint(obj[key], `'${key}'`);
}

export function readBool(obj: JsonObject, key: string): boolean {
  const v = obj[key];
  if (typeof v !== "boolean") throw new ShapeError(`'${key}' must be a boolean`);
  return v;
}

/** For payload-less variants: anything but an absent `params` is malformed. */
export function expectNoParams(params: unknown): void {
  if (params !== undefined) throw new ShapeError("params must be absent");
}

/**
 * Run `fn`, translating a `ShapeError` into the error the caller builds.
 * Other errors (including already-classified protocol errors) pass through.
 */
export function withShape<T>(fn: () => T, toError: (e: ShapeError) => Error): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof ShapeError) throw toError(e);
    throw e;
  }
}
