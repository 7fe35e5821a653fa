import {
  DEFAULT_ELEMENT_TABLE,
  ROOT_ATOMIC_NUMBER,
  ROOT_PARTICLE_ID,
  type BondChain,
  type ElementTable,
  type RebondedChild,
  type RootChildSummary,
  type TopologyRootSummary,
  type TopologyVerdict,
  type Violation,
} from "@shared/bond-topology";
import { childrenOf, type BondGraph } from "./bond-graph";

export type ValenceAuditOptions = {
  rootId?: number;
  rootAtomicNumber?: number;
};

export type ValenceAudit = {
  root: TopologyRootSummary;
  rootChildSummaries: RootChildSummary[];
  chains: BondChain[];
  rebondedChildren: RebondedChild[];
  violations: Violation[];
  verdict: TopologyVerdict;
};

export class UnknownElementError extends Error {
  constructor(public readonly atomicNumber: number) {
    super(`Element with atomic number ${atomicNumber} is not in the element table`);
    this.name = "UnknownElementError";
  }
}

/**
 * Check the bond graph against the valence limits the log can support.
 *
 * Only the root's element is known (it is fixed by construction), so the root's
 * fan-out is the one hard check. Everything else is reported as context: the
 * root's children with their own children, root -> child -> grandchild chains,
 * and children that were bonded to more than one parent.
 */
export function auditValence(
  graph: BondGraph,
  elements: ElementTable = DEFAULT_ELEMENT_TABLE,
  options: ValenceAuditOptions = {},
): ValenceAudit {
  const rootId = options.rootId ?? ROOT_PARTICLE_ID;
  const rootAtomicNumber = options.rootAtomicNumber ?? ROOT_ATOMIC_NUMBER;
  const rootElement = elements.get(rootAtomicNumber);
  if (!rootElement) {
    throw new UnknownElementError(rootAtomicNumber);
  }

  const rootChildren = [...childrenOf(graph, rootId)];
  const violations: Violation[] = [];

  if (rootChildren.length > rootElement.valence) {
    violations.push({
      code: "root_valence_exceeded",
      description:
        `root particle (${rootElement.symbol}, id ${rootId}) exceeds its valence of ` +
        `${rootElement.valence}: ${rootChildren.length} bonds`,
    });
  }

  const rootChildSummaries: RootChildSummary[] = [];
  const chains: BondChain[] = [];
  for (const childId of rootChildren) {
    const grandchildIds = childrenOf(graph, childId);
    if (grandchildIds.length === 0) continue;
    rootChildSummaries.push({ childId, grandchildIds: [...grandchildIds] });
    for (const grandchildId of grandchildIds) {
      chains.push([rootId, childId, grandchildId]);
    }
  }

  const rebondedChildren: RebondedChild[] = [];
  for (const [childId, parentIds] of graph.parentHistoryOf) {
    if (parentIds.length > 1) {
      rebondedChildren.push({ childId, parentIds: [...parentIds] });
    }
  }
  rebondedChildren.sort((left, right) => left.childId - right.childId);

  return {
    root: {
      id: rootId,
      symbol: rootElement.symbol,
      valence: rootElement.valence,
      childIds: rootChildren,
    },
    rootChildSummaries,
    chains,
    rebondedChildren,
    violations,
    verdict: violations.length === 0 ? "clean" : "violations",
  };
}
