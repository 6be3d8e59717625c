import { describe, expect, it } from "@jest/globals";
import { E, classify, ok, rpcErr, toLine } from "../src/protocol.js";

describe("classify", () => {
  it("treats a message with an id as a request", () => {
    const result = classify({ id: 0, method: "new_view", params: {} });
    expect(result).toEqual({ ok: true, value: { rpc_type: "request", id: 0, method: "new_view", params: {} } });
  });

  it("treats a null id as present", () => {
    const result = classify({ id: null, method: "new_view" });
    expect(result.ok && result.value.rpc_type).toBe("request");
  });

  it("treats a message without an id as a notification", () => {
    const result = classify({ method: "client_started", params: {} });
    expect(result.ok && result.value.rpc_type).toBe("notification");
  });

  it("returns the parsed params without copying", () => {
    const params = { view_id: "v", method: "undo" };
    const result = classify({ method: "edit", params });
    expect(result.ok && result.value.params).toBe(params);
  });

  it("fails on a message without a method, keeping the id", () => {
    const result = classify({ id: 4, params: {} });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.rpc_type).toBe("request");
      expect(result.id).toBe(4);
      expect(result.error.missing).toBe(true);
      expect(result.error.method).toBe("");
    }
  });

  it.each([["a string"], [[1, 2]], [null], [{ method: 12 }]])("fails on %j", (value) => {
    const result = classify(value);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("unknown_core_method");
  });
});

describe("responses", () => {
  it("builds success and error responses", () => {
    expect(ok(3, { done: true })).toEqual({ id: 3, result: { done: true } });
    expect(rpcErr(3, E.InvalidParams, "bad")).toEqual({ id: 3, error: { code: -32602, message: "bad" } });
    expect(rpcErr(null, E.MethodNotFound, "nope", { kind: "x" })).toEqual({
      id: null,
      error: { code: -32601, message: "nope", data: { kind: "x" } },
    });
  });

  it("serializes to a single line", () => {
    expect(toLine({ method: "edit", params: { view_id: "v", method: "undo" } })).toBe(
      '{"method":"edit","params":{"view_id":"v","method":"undo"}}',
    );
  });
});
