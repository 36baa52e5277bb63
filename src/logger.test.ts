import { describe, expect, test } from "vitest";
import { createLogger, errorMessage } from "./logger.js";

function capture() {
  const lines: string[] = [];
  return { lines, sink: { write: (line: string) => lines.push(line) } };
}

describe("createLogger", () => {
  test("writes one JSON object per line with fields merged in", () => {
    const { lines, sink } = capture();
    createLogger("info", sink).info("tool failed", { tool: "detect_callouts" });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith("\n")).toBe(true);
    const entry: unknown = JSON.parse(lines[0] ?? "");
    expect(entry).toMatchObject({
      level: "info",
      message: "tool failed",
      tool: "detect_callouts",
    });
  });

  test("drops entries below the configured level", () => {
    const { lines, sink } = capture();
    const logger = createLogger("warn", sink);
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(lines.map((line) => JSON.parse(line).message)).toEqual(["c", "d"]);
  });
});

describe("errorMessage", () => {
  test("uses the message of an Error and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
