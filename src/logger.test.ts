import { afterEach, describe, expect, test, vi } from "vitest";
import { createLogger, errorMessage, setLogLevel } from "./logger.js";

describe("createLogger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  test("writes one JSON line with component and fields", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger("gateway").info("Forwarded", { status: 200 });

    expect(out).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(out.mock.calls[0]?.[0]));
    expect(line).toMatchObject({
      level: "info",
      component: "gateway",
      message: "Forwarded",
      status: 200,
    });
  });

  test("sends warnings and errors to stderr", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("gateway").warn("Slow backend");

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(1);
  });

  test("drops lines below the configured level", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("error");

    const log = createLogger("gateway");
    log.debug("noise");
    log.info("noise");
    log.warn("noise");
    log.error("kept");

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(1);
  });
});

describe("errorMessage", () => {
  test("uses the message of an Error", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
  });

  test("stringifies anything else", () => {
    expect(errorMessage(42)).toBe("42");
  });
});
