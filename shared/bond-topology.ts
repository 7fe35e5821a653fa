import { z } from "zod";

// Shared types for the topology auditor (CLI + modules).
// Logic lives in modules/topology/*.

const ParticleId = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const BondEvent = z.object({
  childId: ParticleId,
  parentId: ParticleId,
});

export type TBondEvent = z.infer<typeof BondEvent>;

export const ElementEntry = z.object({
  atomicNumber: z.number().int().min(1),
  symbol: z.string().min(1),
  valence: z.number().int().min(1),
  vdwRadius: z.number().positive(),
});

export type TElementEntry = z.infer<typeof ElementEntry>;

export const ElementEntries = z
  .array(ElementEntry)
  .min(1)
  .superRefine((entries, ctx) => {
    const seen = new Set<number>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.atomicNumber)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "atomicNumber"],
          message: `duplicate atomic number ${entry.atomicNumber}`,
        });
      }
      seen.add(entry.atomicNumber);
    });
  });

export type ElementTable = ReadonlyMap<number, Readonly<TElementEntry>>;

// Valences mirror the engine's chemistry database; vdW radii are in render units.
export const DEFAULT_ELEMENT_ENTRIES: ReadonlyArray<TElementEntry> = Object.freeze([
  { atomicNumber: 1, symbol: "H", valence: 1, vdwRadius: 1.2 },
  { atomicNumber: 6, symbol: "C", valence: 4, vdwRadius: 1.7 },
  { atomicNumber: 7, symbol: "N", valence: 3, vdwRadius: 1.55 },
  { atomicNumber: 8, symbol: "O", valence: 2, vdwRadius: 1.52 },
  { atomicNumber: 15, symbol: "P", valence: 5, vdwRadius: 1.8 },
  { atomicNumber: 16, symbol: "S", valence: 2, vdwRadius: 1.8 },
]);

export function createElementTable(entries: unknown): ElementTable {
  const parsed = ElementEntries.parse(entries);
  return new Map(parsed.map((entry) => [entry.atomicNumber, Object.freeze(entry)]));
}

export const DEFAULT_ELEMENT_TABLE: ElementTable = createElementTable(DEFAULT_ELEMENT_ENTRIES);

export const ROOT_PARTICLE_ID = 0;
export const ROOT_ATOMIC_NUMBER = 1;

export type ViolationCode = "root_valence_exceeded";

export type Violation = {
  code: ViolationCode;
  description: string;
};

export type RootChildSummary = {
  childId: number;
  grandchildIds: number[];
};

export type BondChain = [rootId: number, childId: number, grandchildId: number];

export type RebondedChild = {
  childId: number;
  parentIds: number[];
};

export type TopologyVerdict = "clean" | "violations";

export type TopologyRootSummary = {
  id: number;
  symbol: string;
  valence: number;
  childIds: number[];
};

export type TopologyAuditReport = {
  logSource: string;
  linesRead: number;
  bondEventCount: number;
  skippedLineCount: number;
  root: TopologyRootSummary;
  rootChildSummaries: RootChildSummary[];
  chains: BondChain[];
  rebondedChildren: RebondedChild[];
  violations: Violation[];
  verdict: TopologyVerdict;
};
