import type { PhysicsDiagnosticReport } from "@shared/bond-physics";
import type { TopologyAuditReport } from "@shared/bond-topology";
import { GAP_VERDICT_MESSAGES } from "../physics/geometry-verifier";

const px = (value: number): string => `${value.toFixed(2)} px`;

const idList = (ids: number[]): string => `[${ids.join(", ")}]`;

export function formatTopologyReport(report: TopologyAuditReport): string {
  const { root } = report;
  const rootLabel = `${root.symbol}(${root.id})`;
  const lines: string[] = [
    `--- TOPOLOGY AUDIT: ${report.logSource} ---`,
    `Lines read: ${report.linesRead}, bond events: ${report.bondEventCount}, skipped: ${report.skippedLineCount}`,
    "",
    "[DETECTED STRUCTURES]",
  ];

  if (root.childIds.length > 0) {
    lines.push(
      `Root (${root.symbol}, id ${root.id}): ${root.childIds.length} bonds. Children: ${idList(root.childIds)}`,
    );
    for (const summary of report.rootChildSummaries) {
      lines.push(
        `  -> Child ${summary.childId} has ${summary.grandchildIds.length} bonds. ` +
          `Structure: ${root.symbol}-${summary.childId}-(...)`,
      );
    }
  } else {
    lines.push(`Root (${root.symbol}, id ${root.id}): no bonds.`);
  }

  lines.push("", "[CHAIN TRACES]");
  if (report.chains.length === 0) {
    lines.push("No depth-2 chains from the root.");
  }
  for (const [, childId, grandchildId] of report.chains) {
    lines.push(`Chain: ${rootLabel} -> Atom(${childId}) -> Atom(${grandchildId})`);
  }

  if (report.rebondedChildren.length > 0) {
    lines.push("", "[REBONDED PARTICLES]");
    for (const rebond of report.rebondedChildren) {
      lines.push(`Atom(${rebond.childId}) parents in log order: ${idList(rebond.parentIds)}`);
    }
  }

  lines.push("");
  if (report.violations.length === 0) {
    lines.push("[RESULT] No valence violations or impossible structures detected.");
  } else {
    lines.push("[ALERT] Anomalies detected:");
    for (const violation of report.violations) {
      lines.push(`  - ${violation.description}`);
    }
  }

  return lines.join("\n");
}

export function formatPhysicsReport(report: PhysicsDiagnosticReport): string {
  const [probeA, probeB] = report.probeBond;
  const strainState = report.overstressed ? "EXCEEDED" : "within limit";
  return [
    `--- DIAGNOSTICS: ${report.layout} ---`,
    `Physics Dist Target: ${px(report.targetDistance)}`,
    `Particle Radius: ${px(report.particleRadius)}`,
    `Particle Diameter: ${px(report.particleDiameter)}`,
    `Visual Collision Threshold: ${px(report.collisionThreshold)}`,
    "",
    `--- RESULTS after ${report.steps} steps (bond ${probeA}-${probeB}) ---`,
    `Final Bond Length: ${px(report.finalBondLength)}`,
    `Final Visual Gap:  ${px(report.finalGap)}`,
    `Minimum Gap:       ${px(report.minGap)} (step ${report.minGapStep})`,
    `Max Strain: ${px(report.maxStrain)} (break threshold ${px(report.constants.breakStress)}, ${strainState})`,
    ...(report.skippedForceApplications > 0
      ? [`Skipped force applications (coincident particles): ${report.skippedForceApplications}`]
      : []),
    `[${report.verdict}] ${GAP_VERDICT_MESSAGES[report.verdict]}`,
  ].join("\n");
}
