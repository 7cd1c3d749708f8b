import { afterEach, describe, expect, it, vi } from "vitest";
import { LogLevel, parseLogLevel, StructuredLogger } from "./structured-logger.js";

function capture(options: { level?: LogLevel; component?: string } = {}) {
  const lines: string[] = [];
  const logger = new StructuredLogger({ writer: (line) => lines.push(line), ...options });
  const entry = (i: number): Record<string, unknown> => JSON.parse(lines[i] ?? "null");
  return { lines, logger, entry };
}

describe("StructuredLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("outputs JSON lines to the writer", () => {
    const { logger, entry } = capture();

    logger.info("pipe session established", { pid: 4242 });

    expect(entry(0).level).toBe("info");
    expect(entry(0).msg).toBe("pipe session established");
    expect(entry(0).pid).toBe(4242);
    expect(entry(0).time).toBeTypeOf("string");
  });

  it("respects log level filtering", () => {
    const { logger, lines } = capture({ level: LogLevel.WARN });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("visible");
    logger.error("visible");

    expect(lines).toHaveLength(2);
  });

  it("defaults to info level", () => {
    vi.stubEnv("LOCALRUN_LOG_LEVEL", "");
    const { logger, lines } = capture();

    logger.debug("hidden");
    logger.info("visible");

    expect(lines).toHaveLength(1);
  });

  it("reads the level from LOCALRUN_LOG_LEVEL", () => {
    vi.stubEnv("LOCALRUN_LOG_LEVEL", "debug");
    const { logger, lines } = capture();

    logger.debug("visible");

    expect(lines).toHaveLength(1);
  });

  it("includes component name when set", () => {
    const { logger, entry } = capture({ component: "pipe-session" });
    logger.info("test");
    expect(entry(0).component).toBe("pipe-session");
  });

  it("child() shares the writer and level under a new component", () => {
    const { logger, lines, entry } = capture({ level: LogLevel.WARN, component: "root" });
    const child = logger.child("invoker");

    child.info("hidden");
    child.warn("visible");

    expect(lines).toHaveLength(1);
    expect(entry(0).component).toBe("invoker");
  });

  it("serializes error objects with stack", () => {
    const { logger, entry } = capture();

    logger.error("failed", { error: new Error("boom") });

    expect(entry(0).error).toBe("boom");
    expect(entry(0).errorStack).toContain("Error: boom");
  });

  it("does not allow ctx to overwrite reserved fields", () => {
    const { logger, entry } = capture({ component: "test" });

    logger.info("spoofed", { level: "debug", time: "fake", msg: "injected", component: "evil" });

    expect(entry(0).level).toBe("info");
    expect(entry(0).msg).toBe("spoofed");
    expect(entry(0).component).toBe("test");
    expect(entry(0).time).not.toBe("fake");
  });

  it("keeps a ctx component when the logger has none", () => {
    const { logger, entry } = capture();
    logger.warn("fallback", { component: "runner-selector" });
    expect(entry(0).component).toBe("runner-selector");
  });

  it("survives circular references in ctx", () => {
    const { logger, lines, entry } = capture();

    const circular: Record<string, unknown> = { key: "value" };
    circular.self = circular;

    logger.error("circular data", circular);

    expect(lines).toHaveLength(1);
    expect(entry(0).msg).toBe("circular data");
    expect(entry(0).serializationError).toBe(true);
  });
});

describe("parseLogLevel", () => {
  it("maps names case-insensitively", () => {
    expect(parseLogLevel("DEBUG")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(" warning ")).toBe(LogLevel.WARN);
    expect(parseLogLevel("error")).toBe(LogLevel.ERROR);
  });

  it("returns undefined for unknown or missing names", () => {
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
