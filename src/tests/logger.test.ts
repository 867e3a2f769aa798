import {
  NullLogger,
  StructuredLogger,
  memorySink,
  parseLogLevel,
  type Logger,
} from "../logger";

describe("StructuredLogger", () => {
  test("child scopes nest and share the sink", () => {
    const { sink, entries } = memorySink();
    const logger = new StructuredLogger({ scope: "merge", sink, clock: () => 7 });

    logger.child("origin").info("merged", { path: "a.txt" });
    logger.warn("done", {});

    expect(entries).toEqual([
      {
        ts: 7,
        level: "info",
        scope: "merge.origin",
        message: "merged",
        meta: { path: "a.txt" },
      },
      { ts: 7, level: "warn", scope: "merge", message: "done", meta: undefined },
    ]);
  });

  test("entries below the minimum level are dropped", () => {
    const { sink, entries } = memorySink();
    const logger = new StructuredLogger({ sink, minLevel: "warn" }).child("x");

    logger.debug("skip");
    logger.info("skip");
    logger.error("kept");

    expect(entries.map((e) => e.message)).toEqual(["kept"]);
    expect(logger.isLevelEnabled("warn")).toBe(true);
    expect(logger.isLevelEnabled("info")).toBe(false);
  });

  test("echo writer receives entries at or above its level", () => {
    const echoed: string[] = [];
    const logger = new StructuredLogger({
      echo: { minLevel: "warn", writer: (e) => echoed.push(e.message) },
    });

    logger.info("quiet");
    logger.warn("loud");

    expect(echoed).toEqual(["loud"]);
  });

  test("NullLogger is disabled everywhere", () => {
    const logger: Logger = new NullLogger();
    expect(logger.child("x")).toBe(logger);
    expect(logger.isLevelEnabled("error")).toBe(false);
  });

  test("parseLogLevel", () => {
    expect(parseLogLevel(" Debug ")).toBe("debug");
    expect(parseLogLevel("loud")).toBe("info");
    expect(parseLogLevel(undefined, "error")).toBe("error");
  });
});
