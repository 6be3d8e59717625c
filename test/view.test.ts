import { describe, expect, it } from "@jest/globals";
import { ShapeError } from "../src/codec.js";
import { decodeEditNotification, encodeEditNotification } from "../src/edit.js";
import { ProtocolError } from "../src/errors.js";
import type { WireCall } from "../src/protocol.js";
import type { EditNotification, ViewCommand } from "../src/types.js";
import { decodeViewCommand, encodeViewCommand } from "../src/view.js";

function decode(raw: unknown): ViewCommand<EditNotification> {
  return decodeViewCommand(raw, decodeEditNotification);
}

describe("decodeViewCommand", () => {
  it("pulls view_id out and decodes the rest with the inner grammar", () => {
    const raw = { view_id: "view-id-1", method: "insert", params: { chars: "hi" } };
    expect(decode(raw)).toEqual({ view_id: "view-id-1", cmd: { method: "insert", params: { chars: "hi" } } });
  });

  it("does not modify its input", () => {
    const raw = { view_id: "v", method: "undo", params: {} };
    decode(raw);
    expect(raw).toEqual({ view_id: "v", method: "undo", params: {} });
  });

  it.each([
    ["omitted", { view_id: "v", method: "delete_forward" }],
    ["an empty object", { view_id: "v", method: "delete_forward", params: {} }],
    ["an empty array", { view_id: "v", method: "delete_forward", params: [] }],
  ])("decodes a unit command the same when params is %s", (_label, raw) => {
    expect(decode(raw)).toEqual({ view_id: "v", cmd: { method: "delete_forward" } });
  });

  it("does not take method or params from a __proto__ field", () => {
    const raw: unknown = JSON.parse('{"view_id":"v","__proto__":{"method":"undo","params":{}}}');
    expect(() => decode(raw)).toThrow(new ShapeError("'method' must be a string"));
  });

  it("hands the inner grammar a call without a params key after normalization", () => {
    const seen: WireCall[] = [];
    decodeViewCommand({ view_id: "v", method: "yank", params: [] }, (call) => {
      seen.push(call);
      return call;
    });
    expect(seen).toHaveLength(1);
    expect("params" in seen[0]).toBe(false);
  });

  it.each([
    ["missing view_id", { method: "undo" }],
    ["numeric view_id", { view_id: 7, method: "undo" }],
    ["missing method", { view_id: "v", params: {} }],
    ["scalar params", { view_id: "v", method: "undo", params: "nope" }],
    ["null params", { view_id: "v", method: "undo", params: null }],
    ["not an object", ["v", "undo"]],
  ])("raises a shape error for %s", (_label, raw) => {
    expect(() => decode(raw)).toThrow(ShapeError);
  });

  it("lets inner grammar errors through unchanged", () => {
    expect(() => decode({ view_id: "v", method: "fly" })).toThrow(ProtocolError.unknownEditMethod("fly"));
  });
});

describe("encodeViewCommand", () => {
  it("places view_id beside the inner method and params", () => {
    const encoded = encodeViewCommand(
      { view_id: "view-id-1", cmd: { method: "insert", params: { chars: "hi" } } },
      encodeEditNotification,
    );
    expect(encoded).toEqual({ view_id: "view-id-1", method: "insert", params: { chars: "hi" } });
  });

  it("omits params for unit commands", () => {
    const encoded = encodeViewCommand({ view_id: "v", cmd: { method: "select_all" } }, encodeEditNotification);
    expect(encoded).toEqual({ view_id: "v", method: "select_all" });
    expect("params" in encoded).toBe(false);
  });

  it("round-trips through decode", () => {
    const original: ViewCommand<EditNotification> = {
      view_id: "view-id-2",
      cmd: { method: "click", params: { line: 3, column: 10, flags: 0, click_count: 2 } },
    };
    expect(decode(encodeViewCommand(original, encodeEditNotification))).toEqual(original);
  });
});
