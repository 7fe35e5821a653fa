import { BondEvent, type TBondEvent } from "@shared/bond-topology";

// Emitted by the engine on every successful bond: `[BOND] GLOBAL SUCCESS: <child> -> <parent>`.
export const BOND_SUCCESS_PATTERN = /\[BOND\] GLOBAL SUCCESS: (\d+) -> (\d+)/;

export type BondLogParse = {
  events: TBondEvent[];
  linesRead: number;
  skippedLines: number;
};

/**
 * Extract a bond event from one log line. Anything that is not a bond-success
 * line yields `null`; log noise is the normal case, not an error.
 */
export function parseBondLine(line: string): TBondEvent | null {
  const match = BOND_SUCCESS_PATTERN.exec(line);
  if (!match) return null;
  const parsed = BondEvent.safeParse({
    childId: Number.parseInt(match[1], 10),
    parentId: Number.parseInt(match[2], 10),
  });
  return parsed.success ? parsed.data : null;
}

export function parseBondLog(lines: Iterable<string>): BondLogParse {
  const events: TBondEvent[] = [];
  let linesRead = 0;

  for (const line of lines) {
    linesRead += 1;
    const event = parseBondLine(line);
    if (event) {
      events.push(event);
    }
  }

  return {
    events,
    linesRead,
    skippedLines: linesRead - events.length,
  };
}
