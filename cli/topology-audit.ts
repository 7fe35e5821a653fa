#!/usr/bin/env -S tsx

import { createLogger } from "../modules/core/log";
import {
  EXIT_ERROR,
  EXIT_FINDINGS,
  EXIT_OK,
  isMainModule,
  processIo,
  type CliIo,
} from "../modules/core/cli-io";
import { resolveTopologyAuditConfig, type Env } from "../modules/core/diagnostic-config";
import { formatTopologyReport } from "../modules/reporting/diagnostic-format";
import { auditTopology } from "../modules/topology/topology-audit";

const USAGE =
  "Usage: topology-audit [logPath] [--log <path>] [--format text|json] [--strict]";

export function runTopologyAuditCli(argv: string[], env: Env, io: CliIo): number {
  const log = createLogger("topology-audit", io.stderr);
  if (argv.includes("--help")) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  try {
    const config = resolveTopologyAuditConfig(argv, env);
    log(`reading bond log ${config.logPath}`);
    const report = auditTopology({ kind: "file", path: config.logPath });
    log(`${report.bondEventCount} bond events, ${report.violations.length} violations`);

    io.stdout(
      config.format === "json" ? JSON.stringify(report, null, 2) : formatTopologyReport(report),
    );
    return config.strict && report.verdict !== "clean" ? EXIT_FINDINGS : EXIT_OK;
  } catch (error) {
    io.stderr(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
    return EXIT_ERROR;
  }
}

if (isMainModule(import.meta.url)) {
  process.exitCode = runTopologyAuditCli(process.argv.slice(2), process.env, processIo);
}
