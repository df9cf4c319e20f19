import { EventEmitter } from "node:events";

import { describe, expect, it } from "vitest";

import { buildStopController, createStopSignal, normalizeAbortReason } from "./graceful-stop.js";

describe("createStopSignal", () => {
  it("aborts with the name of the first signal received", () => {
    const source = new EventEmitter();
    const handle = createStopSignal({ source });

    source.emit("SIGTERM");
    source.emit("SIGINT");

    expect(handle.signal.aborted).toBe(true);
    expect(handle.signal.reason).toEqual({ signal: "SIGTERM" });
    handle.dispose();
  });

  it("removes its listeners on dispose", () => {
    const source = new EventEmitter();
    const handle = createStopSignal({ source, signals: ["SIGINT"] });

    expect(source.listenerCount("SIGINT")).toBe(1);
    handle.dispose();

    expect(source.listenerCount("SIGINT")).toBe(0);
    source.emit("SIGINT");
    expect(handle.signal.aborted).toBe(false);
  });
});

describe("buildStopController", () => {
  it("has no reason until the signal aborts", () => {
    const controller = new AbortController();
    const stop = buildStopController(controller.signal);

    expect(stop.reason).toBeNull();
    controller.abort({ signal: "SIGINT" });

    expect(stop.reason).toEqual({ kind: "signal", signal: "SIGINT" });
    stop.cleanup();
  });

  it("picks up a signal that was aborted before it was built", () => {
    const controller = new AbortController();
    controller.abort("shutdown");

    expect(buildStopController(controller.signal).reason).toEqual({
      kind: "signal",
      signal: "shutdown",
    });
  });

  it("never stops without a signal", () => {
    expect(buildStopController().reason).toBeNull();
  });
});

describe("normalizeAbortReason", () => {
  it("reads names from the usual reason shapes", () => {
    expect(normalizeAbortReason(undefined)).toBeUndefined();
    expect(normalizeAbortReason(new Error("deadline"))).toBe("deadline");
    expect(normalizeAbortReason({ type: "timeout" })).toBe("timeout");
    expect(normalizeAbortReason(42)).toBe("42");
  });
});
