import type { TBondEvent } from "@shared/bond-topology";

export type BondGraph = {
  childrenOf: Map<number, number[]>;
  parentOf: Map<number, number>;
  parentHistoryOf: Map<number, number[]>;
  eventCount: number;
};

const appendTo = (map: Map<number, number[]>, key: number, value: number) => {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
};

/**
 * Fold bond events, in log order, into a parent/child index.
 *
 * Children keep log order and duplicates; a rebonded child's parent is the
 * last one seen. Cycles are not detected here.
 */
export function buildBondGraph(events: Iterable<TBondEvent>): BondGraph {
  const graph: BondGraph = {
    childrenOf: new Map(),
    parentOf: new Map(),
    parentHistoryOf: new Map(),
    eventCount: 0,
  };

  for (const event of events) {
    appendTo(graph.childrenOf, event.parentId, event.childId);
    graph.parentOf.set(event.childId, event.parentId);
    appendTo(graph.parentHistoryOf, event.childId, event.parentId);
    graph.eventCount += 1;
  }

  return graph;
}

export function childrenOf(graph: BondGraph, particleId: number): number[] {
  return graph.childrenOf.get(particleId) ?? [];
}
