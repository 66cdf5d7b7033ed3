import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../../src/common/logger.js";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON line per call to the stream for its level", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("test");

    logger.info("hello", { a: 1 });
    logger.warn("careful");
    logger.error("broken");

    const line = JSON.parse(String(out.mock.calls[0][0]));
    expect(line).toMatchObject({ level: "info", scope: "test", message: "hello", meta: { a: 1 } });
    expect(typeof line.ts).toBe("number");
    expect(JSON.parse(String(warn.mock.calls[0][0])).level).toBe("warn");
    expect(JSON.parse(String(err.mock.calls[0][0])).level).toBe("error");
  });
});
