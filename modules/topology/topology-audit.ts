import fs from "node:fs";
import {
  DEFAULT_ELEMENT_TABLE,
  type ElementTable,
  type TopologyAuditReport,
} from "@shared/bond-topology";
import { buildBondGraph } from "./bond-graph";
import { parseBondLog } from "./bond-log-parser";
import { auditValence, type ValenceAuditOptions } from "./valence-auditor";

export type BondLogSource =
  | { kind: "file"; path: string }
  | { kind: "lines"; label: string; lines: Iterable<string> };

export type TopologyAuditOptions = ValenceAuditOptions & {
  elements?: ElementTable;
};

export class BondLogReadError extends Error {
  constructor(
    public readonly logPath: string,
    public readonly code: string | undefined,
    options?: { cause?: unknown },
  ) {
    super(
      code === "ENOENT"
        ? `Bond log not found: ${logPath}`
        : `Unable to read bond log ${logPath}${code ? ` (${code})` : ""}`,
      options,
    );
    this.name = "BondLogReadError";
  }
}

const errorCode = (error: unknown): string | undefined => {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
};

export function readBondLogLines(logPath: string): string[] {
  let text: string;
  try {
    text = fs.readFileSync(logPath, "utf8");
  } catch (error) {
    throw new BondLogReadError(logPath, errorCode(error), { cause: error });
  }
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

const describeSource = (source: BondLogSource): string =>
  source.kind === "file" ? source.path : source.label;

export function auditTopology(
  source: BondLogSource,
  options: TopologyAuditOptions = {},
): TopologyAuditReport {
  const lines = source.kind === "file" ? readBondLogLines(source.path) : source.lines;
  const parsed = parseBondLog(lines);
  const graph = buildBondGraph(parsed.events);
  const audit = auditValence(graph, options.elements ?? DEFAULT_ELEMENT_TABLE, {
    rootId: options.rootId,
    rootAtomicNumber: options.rootAtomicNumber,
  });

  return {
    logSource: describeSource(source),
    linesRead: parsed.linesRead,
    bondEventCount: parsed.events.length,
    skippedLineCount: parsed.skippedLines,
    root: audit.root,
    rootChildSummaries: audit.rootChildSummaries,
    chains: audit.chains,
    rebondedChildren: audit.rebondedChildren,
    violations: audit.violations,
    verdict: audit.verdict,
  };
}
