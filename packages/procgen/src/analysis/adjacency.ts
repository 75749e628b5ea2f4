/**
 * Region adjacency post-processing.
 */

import type { Region } from "../generators/region-growth/region";

/**
 * Two-way neighbour map built from the one-way relation regions record
 * while growing. Every region gets an entry; lists are sorted ascending.
 */
export function symmetricAdjacency(source: {
  regions(): readonly Region[];
}): Map<number, number[]> {
  const adjacency = new Map<number, Set<number>>();
  const regions = source.regions();

  for (const region of regions) {
    adjacency.set(region.id, new Set());
  }

  for (const region of regions) {
    for (const neighbor of region.neighbors) {
      adjacency.get(region.id)?.add(neighbor);
      adjacency.get(neighbor)?.add(region.id);
    }
  }

  const result = new Map<number, number[]>();
  for (const [id, neighbors] of adjacency) {
    result.set(id, [...neighbors].sort((a, b) => a - b));
  }
  return result;
}
