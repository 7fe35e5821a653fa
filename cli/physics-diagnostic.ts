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
import { resolvePhysicsDiagnosticConfig, type Env } from "../modules/core/diagnostic-config";
import { runPhysicsDiagnostic } from "../modules/physics/physics-diagnostic";
import { formatPhysicsReport } from "../modules/reporting/diagnostic-format";

const USAGE =
  "Usage: physics-diagnostic [--constants constants.json] [--params '{...}'] [--element C] " +
  "[--layout c4-square|c4-compressed|c4-stretched] [--steps 300] [--format text|json] [--strict]";

export function runPhysicsDiagnosticCli(argv: string[], env: Env, io: CliIo): number {
  const log = createLogger("physics-diagnostic", io.stderr);
  if (argv.includes("--help")) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  try {
    const config = resolvePhysicsDiagnosticConfig(argv, env);
    log(`simulating ${config.layout} for ${config.steps} steps`);
    const report = runPhysicsDiagnostic(config.constants, {
      layout: config.layout,
      steps: config.steps,
    });
    if (report.overstressed) {
      log(`max strain ${report.maxStrain.toFixed(2)} exceeds break stress ${report.constants.breakStress}`);
    }

    io.stdout(
      config.format === "json" ? JSON.stringify(report, null, 2) : formatPhysicsReport(report),
    );
    return config.strict && report.verdict === "FAIL" ? EXIT_FINDINGS : EXIT_OK;
  } catch (error) {
    io.stderr(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
    return EXIT_ERROR;
  }
}

if (isMainModule(import.meta.url)) {
  process.exitCode = runPhysicsDiagnosticCli(process.argv.slice(2), process.env, processIo);
}
