import { describe, it, expect } from "vitest";
import { ConsoleLogger } from "./console-logger";

function capture() {
  const lines: string[] = [];
  const sink = {
    log: (line: string) => lines.push(line),
    error: (line: string) => lines.push(line),
  };
  return { lines, sink };
}

const fixedNow = () => new Date("2026-01-02T03:04:05.000Z");

describe("console-logger", () => {
  it("drops messages below the configured level", () => {
    const { lines, sink } = capture();
    const logger = new ConsoleLogger("warn", sink, fixedNow);

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(lines).toEqual(["[2026-01-02T03:04:05.000Z] WARN shown"]);
  });

  it("appends metadata as JSON", () => {
    const { lines, sink } = capture();
    const logger = new ConsoleLogger("debug", sink, fixedNow);

    logger.error("Move failed", { entry: "work/mail" });

    expect(lines).toEqual(['[2026-01-02T03:04:05.000Z] ERROR Move failed {"entry":"work/mail"}']);
  });
});
