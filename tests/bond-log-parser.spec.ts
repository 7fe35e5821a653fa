import { describe, expect, it } from "vitest";
import { parseBondLine, parseBondLog } from "../modules/topology/bond-log-parser";

describe("parseBondLine", () => {
  it("extracts child and parent ids from a bond-success line", () => {
    expect(parseBondLine("[BOND] GLOBAL SUCCESS: 12 -> 0")).toEqual({ childId: 12, parentId: 0 });
  });

  it("matches the pattern anywhere in the line", () => {
    expect(parseBondLine("INFO: [BOND] GLOBAL SUCCESS: 7 -> 31 (slot 2)")).toEqual({
      childId: 7,
      parentId: 31,
    });
  });

  it("returns null for unrelated or malformed lines", () => {
    expect(parseBondLine("INFO: [PHYSICS] tick 120")).toBeNull();
    expect(parseBondLine("[BOND] GLOBAL SUCCESS: 7 ->")).toBeNull();
    expect(parseBondLine("[BOND] GLOBAL SUCCESS: -3 -> 1")).toBeNull();
    expect(parseBondLine("")).toBeNull();
  });

  it("rejects ids beyond the safe integer range", () => {
    expect(parseBondLine("[BOND] GLOBAL SUCCESS: 99999999999999999999 -> 1")).toBeNull();
  });
});

describe("parseBondLog", () => {
  it("keeps events in log order and counts skipped lines", () => {
    const result = parseBondLog([
      "WARNING: [PHYSICS] BOND BROKEN by stress: Atom 4 separated from 2",
      "[BOND] GLOBAL SUCCESS: 5 -> 0",
      "noise",
      "[BOND] GLOBAL SUCCESS: 6 -> 5",
      "[BOND] GLOBAL SUCCESS: 5 -> 0",
    ]);

    expect(result.events).toEqual([
      { childId: 5, parentId: 0 },
      { childId: 6, parentId: 5 },
      { childId: 5, parentId: 0 },
    ]);
    expect(result.linesRead).toBe(5);
    expect(result.skippedLines).toBe(2);
  });

  it("handles an empty log", () => {
    expect(parseBondLog([])).toEqual({ events: [], linesRead: 0, skippedLines: 0 });
  });
});
