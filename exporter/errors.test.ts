import { describe, expect, it, vi } from "vitest";
import { ErrorCollector, RenderError, describeError, fail, ok } from "./errors";

describe("RenderError.fromBlock", () => {
  it("attaches the block key to errors raised below the handler", () => {
    const inner = new RenderError("Request to https://img.example.com/a.png returned 404", "external-service");
    const wrapped = RenderError.fromBlock("b1", inner);
    expect([wrapped.kind, wrapped.blockKey, wrapped.message]).toEqual([
      "external-service",
      "b1",
      "Request to https://img.example.com/a.png returned 404",
    ]);
  });

  it("keeps an error that already names its block", () => {
    const inner = new RenderError("bad", "attribute", "b0");
    expect(RenderError.fromBlock("b1", inner)).toBe(inner);
  });

  it("treats anything else as a block error", () => {
    const cause = new TypeError("x is undefined");
    const wrapped = RenderError.fromBlock("b2", cause);
    expect([wrapped.kind, wrapped.message, wrapped.reason]).toEqual(["block", "x is undefined", cause]);
  });
});

describe("describeError", () => {
  it("uses the message of errors and stringifies the rest", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError(42)).toBe("42");
  });
});

describe("Result helpers", () => {
  it("tag success and failure", () => {
    const failure = fail<number>(new RenderError("nope", "block"));
    expect(ok(3)).toEqual({ ok: true, value: 3 });
    expect(failure.ok).toBe(false);
  });
});

describe("ErrorCollector", () => {
  it("logs each error under its scope and filters by kind", () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const collector = new ErrorCollector("render");
    collector.report(new RenderError("Could not copy size", "attribute"));
    collector.report(new RenderError("Request failed", "external-service", "k7"));

    expect(collector.count).toBe(2);
    expect(collector.ofKind("attribute").map((error) => error.message)).toEqual(["Could not copy size"]);
    expect(log).toHaveBeenLastCalledWith("[render] external-service error (block k7): Request failed");
  });
});
