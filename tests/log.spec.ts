import { describe, expect, it } from "vitest";
import { createLogger, formatLogLine } from "../modules/core/log";

describe("log", () => {
  it("prefixes the time and source", () => {
    const line = formatLogLine("reading bond log", "topology-audit", new Date(2026, 0, 5, 14, 7, 9));
    expect(line).toMatch(/^2:07:09\sPM \[topology-audit\] reading bond log$/);
  });

  it("writes through the provided sink", () => {
    const lines: string[] = [];
    const log = createLogger("physics-diagnostic", (line) => lines.push(line));

    log("simulating c4-square for 300 steps");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/\[physics-diagnostic\] simulating c4-square for 300 steps$/);
  });
});
