import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  auditTopology,
  BondLogReadError,
  readBondLogLines,
} from "../modules/topology/topology-audit";

const tempRoots: string[] = [];

function writeLog(lines: string[]): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "bond-log-fixture-"));
  tempRoots.push(root);
  const logPath = path.join(root, "session.log");
  fs.writeFileSync(logPath, `${lines.join("\n")}\n`, "utf8");
  return logPath;
}

afterEach(() => {
  for (const root of tempRoots.splice(0)) {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

describe("auditTopology", () => {
  it("audits an H-C-H assembly from a log file", () => {
    const logPath = writeLog([
      "INFO: [SPAWN] 2500 atoms",
      "INFO: [BOND] GLOBAL SUCCESS: 14 -> 0",
      "INFO: [BOND] GLOBAL SUCCESS: 27 -> 14",
      "INFO: [TRACTOR] released",
    ]);

    const report = auditTopology({ kind: "file", path: logPath });

    expect(report).toEqual({
      logSource: logPath,
      linesRead: 4,
      bondEventCount: 2,
      skippedLineCount: 2,
      root: { id: 0, symbol: "H", valence: 1, childIds: [14] },
      rootChildSummaries: [{ childId: 14, grandchildIds: [27] }],
      chains: [[0, 14, 27]],
      rebondedChildren: [],
      violations: [],
      verdict: "clean",
    });
  });

  it("reports a root fan-out violation", () => {
    const report = auditTopology({
      kind: "lines",
      label: "inline",
      lines: ["[BOND] GLOBAL SUCCESS: 1 -> 0", "[BOND] GLOBAL SUCCESS: 2 -> 0"],
    });

    expect(report.logSource).toBe("inline");
    expect(report.verdict).toBe("violations");
    expect(report.violations).toHaveLength(1);
    expect(report.violations[0].description).toContain("2 bonds");
  });

  it("fails with BondLogReadError when the log is missing", () => {
    const missing = path.join(os.tmpdir(), "bond-log-missing", "nope.log");
    expect(() => auditTopology({ kind: "file", path: missing })).toThrow(BondLogReadError);
    expect(() => auditTopology({ kind: "file", path: missing })).toThrow(
      `Bond log not found: ${missing}`,
    );
  });
});

describe("readBondLogLines", () => {
  it("splits CRLF logs and drops the trailing empty line", () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "bond-log-fixture-"));
    tempRoots.push(root);
    const logPath = path.join(root, "windows.log");
    fs.writeFileSync(logPath, "a\r\nb\r\n", "utf8");

    expect(readBondLogLines(logPath)).toEqual(["a", "b"]);
  });
});
