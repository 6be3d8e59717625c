/**
 * Positional encodings.
 *
 * Scrolling, line requests and mouse events arrive once per input event, so
 * they travel as bare arrays instead of named-field objects.
 */

import { ShapeError, expectArray, expectUint } from "./codec.js";
import type { LineRange, MouseAction } from "./types.js";

// ─── LineRange: [start, end] ─────────────────────────────────────────────────

export function decodeLineRange(value: unknown): LineRange {
  const arr = expectArray(value, "line range");
  if (arr.length !== 2) {
    throw new ShapeError(`line range must have 2 elements, got ${arr.length}`);
  }
  return {
    start: expectUint(arr[0], "line range start"),
    end:   expectUint(arr[1], "line range end"),
  };
}

export function encodeLineRange(range: LineRange): [number, number] {
  return [range.start, range.end];
}

// ─── MouseAction: [line, column, flags, click_count?] ────────────────────────

export function decodeMouseAction(value: unknown): MouseAction {
  const arr = expectArray(value, "mouse action");
  if (arr.length !== 3 && arr.length !== 4) {
    throw new ShapeError(`mouse action must have 3 or 4 elements, got ${arr.length}`);
  }
  const action: MouseAction = {
    line:   expectUint(arr[0], "mouse line"),
    column: expectUint(arr[1], "mouse column"),
    flags:  expectUint(arr[2], "mouse flags"),
  };
  if (arr.length === 4) {
    // Absent means "not a multi-click"; an explicit zero is never sent.
    const clicks = expectUint(arr[3], "click count");
    if (clicks === 0) throw new ShapeError("click count must be at least 1");
    action.click_count = clicks;
  }
  return action;
}

export function encodeMouseAction(action: MouseAction): number[] {
  const out = [action.line, action.column, action.flags];
  if (action.click_count !== undefined) out.push(action.click_count);
  return out;
}
