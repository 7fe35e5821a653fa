import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { runPhysicsDiagnosticCli } from "../cli/physics-diagnostic";
import { runTopologyAuditCli } from "../cli/topology-audit";
import type { CliIo } from "../modules/core/cli-io";

const tempRoots: string[] = [];

function captureIo() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CliIo = {
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
  };
  return { io, stdout, stderr };
}

function writeLog(lines: string[]): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "bond-cli-fixture-"));
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

describe("topology-audit CLI", () => {
  it("exits 0 and prints a JSON report", () => {
    const logPath = writeLog(["[BOND] GLOBAL SUCCESS: 2 -> 0"]);
    const { io, stdout, stderr } = captureIo();

    const code = runTopologyAuditCli([logPath, "--format", "json"], {}, io);

    expect(code).toBe(0);
    expect(JSON.parse(stdout.join("\n"))).toMatchObject({
      bondEventCount: 1,
      root: { childIds: [2] },
      verdict: "clean",
    });
    expect(stderr.some((line) => line.includes(`[topology-audit] reading bond log ${logPath}`))).toBe(
      true,
    );
  });

  it("exits 2 on violations only in strict mode", () => {
    const logPath = writeLog(["[BOND] GLOBAL SUCCESS: 2 -> 0", "[BOND] GLOBAL SUCCESS: 3 -> 0"]);

    expect(runTopologyAuditCli([logPath], {}, captureIo().io)).toBe(0);
    expect(runTopologyAuditCli([logPath, "--strict"], {}, captureIo().io)).toBe(2);
  });

  it("exits 1 with the read error when the log is missing", () => {
    const missing = path.join(os.tmpdir(), "bond-cli-missing", "session.log");
    const { io, stdout, stderr } = captureIo();

    const code = runTopologyAuditCli([], { BOND_AUDIT_LOG: missing }, io);

    expect(code).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr[stderr.length - 1]).toBe(`BondLogReadError: Bond log not found: ${missing}`);
  });
});

describe("physics-diagnostic CLI", () => {
  it("prints the text report and exits 0", () => {
    const { io, stdout } = captureIo();

    const code = runPhysicsDiagnosticCli([], {}, io);

    expect(code).toBe(0);
    const lines = stdout.join("\n").split("\n");
    expect(lines[0]).toBe("--- DIAGNOSTICS: c4-square ---");
    expect(lines[lines.length - 1]).toBe(
      "[PASS] VISUALS CLEAR. Particles are separated by a visible bond line.",
    );
  });

  it("exits 2 on an overlap verdict in strict mode", () => {
    const { io, stdout } = captureIo();

    const code = runPhysicsDiagnosticCli(
      ["--params", '{"renderScale": 2}', "--format", "json", "--strict"],
      {},
      io,
    );

    expect(code).toBe(2);
    expect(JSON.parse(stdout.join("\n")).verdict).toBe("FAIL");
  });

  it("exits 1 on invalid configuration", () => {
    const { io, stderr } = captureIo();

    const code = runPhysicsDiagnosticCli(["--layout", "hexagon"], {}, io);

    expect(code).toBe(1);
    expect(stderr[stderr.length - 1]).toMatch(/^DiagnosticConfigError: Unknown particle layout "hexagon"/);
  });

  it("prints usage for --help", () => {
    const { io, stdout } = captureIo();
    expect(runPhysicsDiagnosticCli(["--help"], {}, io)).toBe(0);
    expect(stdout[0]).toMatch(/^Usage: physics-diagnostic/);
  });
});
