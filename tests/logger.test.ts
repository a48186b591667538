import { describe, it, expect } from "vitest";
import { Logger, isLogLevel, type LogLevel } from "../src/utils/logger";
import { LexiconError } from "../src/errors";

function collectingLogger(minLevel: LogLevel = "debug", structuredOutput = false) {
  const lines: Array<[LogLevel, string]> = [];
  const log = new Logger({ minLevel, structuredOutput, sink: (level, line) => lines.push([level, line]) });
  return { log, lines };
}

describe("Logger", () => {
  it("should format level, message and context", () => {
    const { log, lines } = collectingLogger();
    log.info("Lexicon loaded", { nouns: 3 });
    expect(lines).toEqual([["info", '[readability] [INFO] Lexicon loaded | nouns=3']]);
  });

  it("should drop entries below the minimum level", () => {
    const { log, lines } = collectingLogger("warn");
    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");
    expect(lines.map(([level]) => level)).toEqual(["warn"]);
  });

  it("should append plugin error details", () => {
    const { log, lines } = collectingLogger();
    log.error("Load failed", undefined, LexiconError.fileMissing("nouns.json"));
    expect(lines[0][1]).toBe(
      "[readability] [ERROR] Load failed | LexiconError (2001): Lexicon file not found: nouns.json"
    );
  });

  it("should merge child context", () => {
    const { log, lines } = collectingLogger();
    log.child({ component: "lexicon" }).child({ dir: "/data" }).warn("slow");
    expect(lines[0][1]).toBe('[readability] [WARN] slow | component="lexicon" dir="/data"');
  });

  it("should emit JSON in structured mode", () => {
    const { log, lines } = collectingLogger("debug", true);
    log.info("ready", { sentences: 2 });
    const entry: unknown = JSON.parse(lines[0][1]);
    expect(entry).toMatchObject({ level: "info", message: "ready", context: { sentences: 2 } });
  });
});

describe("isLogLevel", () => {
  it("should accept known levels only", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
