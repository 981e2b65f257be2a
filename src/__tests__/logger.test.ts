import { afterEach, describe, expect, test, vi } from "vitest";
import { createStderrSink, isLogLevel } from "../logger.js";

describe("createStderrSink", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("writes one JSON line per message at or above the threshold", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const sink = createStderrSink("info");
    sink.log("debug", "hidden");
    sink.log("info", "shown");
    sink.log("error", "also shown");
    expect(spy.mock.calls).toEqual([
      ['{"level":"info","message":"shown"}'],
      ['{"level":"error","message":"also shown"}'],
    ]);
  });

  test("defaults to warn", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const sink = createStderrSink();
    sink.log("info", "hidden");
    sink.log("warn", "shown");
    expect(spy).toHaveBeenCalledTimes(1);
  });
});

test("isLogLevel", () => {
  expect(isLogLevel("debug")).toBe(true);
  expect(isLogLevel("trace")).toBe(false);
  expect(isLogLevel(3)).toBe(false);
});
