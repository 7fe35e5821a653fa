import fs from "node:fs";
import { z } from "zod";
import { PhysicsConstants, type TPhysicsConstants } from "@shared/bond-physics";
import { DEFAULT_ELEMENT_TABLE, type ElementTable } from "@shared/bond-topology";
import { DEFAULT_LAYOUT_NAME, resolveLayout } from "../physics/layouts";
import { DEFAULT_DIAGNOSTIC_STEPS } from "../physics/physics-diagnostic";

export const DEFAULT_BOND_LOG_PATH = "session.log";

export type OutputFormat = "text" | "json";

export type Env = Record<string, string | undefined>;

export type TopologyAuditConfig = {
  logPath: string;
  format: OutputFormat;
  strict: boolean;
};

export type PhysicsDiagnosticConfig = {
  constants: TPhysicsConstants;
  layout: string;
  steps: number;
  format: OutputFormat;
  strict: boolean;
};

export class DiagnosticConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DiagnosticConfigError";
  }
}

type ParsedArgs = {
  values: Map<string, string>;
  switches: Set<string>;
  positionals: string[];
};

const OutputFormatSchema = z.enum(["text", "json"]);
const StepsSchema = z.coerce.number().int().min(1).max(1_000_000);
const JsonObject = z.record(z.string(), z.unknown());

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DiagnosticConfigError(`Invalid ${label}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function parseArgs(
  argv: string[],
  valueFlags: ReadonlyArray<string>,
  switchFlags: ReadonlyArray<string>,
): ParsedArgs {
  const values = new Map<string, string>();
  const switches = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }
    if (switchFlags.includes(token)) {
      switches.add(token);
      continue;
    }
    if (!valueFlags.includes(token)) {
      throw new DiagnosticConfigError(`Unknown option ${token}`);
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new DiagnosticConfigError(`Option ${token} expects a value`);
    }
    values.set(token, value);
    i += 1;
  }

  return { values, switches, positionals };
}

const resolveFormat = (args: ParsedArgs): OutputFormat =>
  parseWith(OutputFormatSchema, args.values.get("--format") ?? "text", "--format");

export function resolveTopologyAuditConfig(argv: string[], env: Env = {}): TopologyAuditConfig {
  const args = parseArgs(argv, ["--log", "--format"], ["--strict"]);
  if (args.positionals.length > 1) {
    throw new DiagnosticConfigError(`Expected at most one log path, got ${args.positionals.length}`);
  }
  const logPath =
    args.values.get("--log") ?? args.positionals[0] ?? env.BOND_AUDIT_LOG ?? DEFAULT_BOND_LOG_PATH;

  return {
    logPath,
    format: resolveFormat(args),
    strict: args.switches.has("--strict"),
  };
}

const readJsonObject = (text: string, label: string): Record<string, unknown> => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DiagnosticConfigError(`${label} is not valid JSON`, { cause: error });
  }
  return parseWith(JsonObject, raw, label);
};

export function elementRadiusOverride(
  symbol: string,
  elements: ElementTable = DEFAULT_ELEMENT_TABLE,
): { vdwRadius: number } {
  for (const entry of elements.values()) {
    if (entry.symbol === symbol) {
      return { vdwRadius: entry.vdwRadius };
    }
  }
  throw new DiagnosticConfigError(`Unknown element symbol ${symbol}`);
}

/**
 * Defaults, then the element's vdW radius, then the constants file, then inline
 * params; later sources win per field.
 */
export function loadPhysicsConstants(
  constantsPath?: string,
  rawParams?: string,
  elementSymbol?: string,
): TPhysicsConstants {
  const fromElement = elementSymbol ? elementRadiusOverride(elementSymbol) : {};
  let fromFile: Record<string, unknown> = {};
  if (constantsPath) {
    let text: string;
    try {
      text = fs.readFileSync(constantsPath, "utf8");
    } catch (error) {
      throw new DiagnosticConfigError(`Unable to read constants file ${constantsPath}`, {
        cause: error,
      });
    }
    fromFile = readJsonObject(text, `constants file ${constantsPath}`);
  }
  const fromParams = rawParams ? readJsonObject(rawParams, "--params") : {};
  return parseWith(
    PhysicsConstants,
    { ...fromElement, ...fromFile, ...fromParams },
    "physics constants",
  );
}

export function resolvePhysicsDiagnosticConfig(
  argv: string[],
  env: Env = {},
): PhysicsDiagnosticConfig {
  const args = parseArgs(
    argv,
    ["--constants", "--params", "--element", "--layout", "--steps", "--format"],
    ["--strict"],
  );
  if (args.positionals.length > 0) {
    throw new DiagnosticConfigError(`Unexpected argument ${args.positionals[0]}`);
  }

  const layout = args.values.get("--layout") ?? env.BOND_DIAGNOSTIC_LAYOUT ?? DEFAULT_LAYOUT_NAME;
  try {
    resolveLayout(layout);
  } catch (error) {
    throw new DiagnosticConfigError(error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }

  const rawSteps = args.values.get("--steps") ?? env.BOND_DIAGNOSTIC_STEPS;
  const steps =
    rawSteps === undefined ? DEFAULT_DIAGNOSTIC_STEPS : parseWith(StepsSchema, rawSteps, "--steps");

  return {
    constants: loadPhysicsConstants(
      args.values.get("--constants"),
      args.values.get("--params"),
      args.values.get("--element"),
    ),
    layout,
    steps,
    format: resolveFormat(args),
    strict: args.switches.has("--strict"),
  };
}
