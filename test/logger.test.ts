import { describe, it, expect, vi, afterEach } from "vitest";
import dayjs from "dayjs";
import { createLogger, verbosityToLevel } from "../src/logger.js";

const clock = () => dayjs("2018-03-29T10:15:02.123");

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes timestamp, level, module and message", () => {
    const lines: string[] = [];
    const log = createLogger({ module: "rotate", sink: (l) => lines.push(l), clock });
    log.info("hello");
    log.warn("careful");
    expect(lines).toEqual([
      "2018-03-29 10:15:02,123|INFO|rotate| hello",
      "2018-03-29 10:15:02,123|WARNING|rotate| careful",
    ]);
  });

  it("drops messages below the threshold", () => {
    const lines: string[] = [];
    const log = createLogger({ level: "warn", sink: (l) => lines.push(l), clock });
    log.trace("a");
    log.debug("b");
    log.info("c");
    log.error("d");
    expect(lines).toEqual(["2018-03-29 10:15:02,123|ERROR|tier-rotate| d"]);
  });

  it("appends the stack of an error", () => {
    const lines: string[] = [];
    const log = createLogger({ sink: (l) => lines.push(l), clock });
    const err = new Error("disk full");
    log.error("move failed", err);
    expect(lines).toEqual([`2018-03-29 10:15:02,123|ERROR|tier-rotate| move failed\n${err.stack}`]);
  });

  it("ignores a non-Error value passed as error", () => {
    const lines: string[] = [];
    const log = createLogger({ sink: (l) => lines.push(l), clock });
    log.error("move failed", "EACCES");
    expect(lines).toEqual(["2018-03-29 10:15:02,123|ERROR|tier-rotate| move failed"]);
  });

  it("child loggers share sink and threshold", () => {
    const lines: string[] = [];
    const log = createLogger({ level: "debug", sink: (l) => lines.push(l), clock });
    const child = log.child("tier-rotator");
    child.trace("hidden");
    child.debug("shown");
    expect(lines).toEqual(["2018-03-29 10:15:02,123|DEBUG|tier-rotator| shown"]);
  });

  it("writes to stdout by default", () => {
    const spy = vi.spyOn(process.stdout, "write").mockReturnValue(true);
    createLogger({ clock }).info("to stdout");
    expect(spy).toHaveBeenCalledWith("2018-03-29 10:15:02,123|INFO|tier-rotate| to stdout\n");
  });
});

describe("verbosityToLevel", () => {
  it("maps each verbosity to a threshold", () => {
    expect(verbosityToLevel(0)).toBe("warn");
    expect(verbosityToLevel(1)).toBe("info");
    expect(verbosityToLevel(2)).toBe("debug");
    expect(verbosityToLevel(3)).toBe("trace");
  });
});
