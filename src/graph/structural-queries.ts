import { DependencyGraph } from './dependency-graph';
import { QueryValidationError } from './errors';
import { FilePath } from './types';

function breadthFirst(
  start: FilePath,
  neighbours: (node: FilePath) => readonly FilePath[],
  maxDepth = Number.POSITIVE_INFINITY
): Set<FilePath> {
  const visited = new Set<FilePath>([start]);
  let frontier: FilePath[] = [start];

  for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
    const next: FilePath[] = [];
    for (const node of frontier) {
      for (const neighbour of neighbours(node)) {
        if (!visited.has(neighbour)) {
          visited.add(neighbour);
          next.push(neighbour);
        }
      }
    }
    frontier = next;
  }

  return visited;
}

/**
 * Neighbourhood of `target` within `level` hops, following dependency edges
 * in either direction. Edges are kept only between retained nodes.
 */
export function filterByLevel(graph: DependencyGraph, target: FilePath, level: number): DependencyGraph {
  if (!graph.has(target)) {
    return DependencyGraph.empty();
  }

  const dependents = graph.dependents();
  const visited = breadthFirst(
    target,
    node => [...graph.dependenciesOf(node), ...(dependents.get(node) ?? [])],
    Math.max(0, level)
  );

  return graph.subgraph(visited);
}

/**
 * Every node lying on some directed path between any two of the targets, in
 * either direction, plus the targets themselves. Targets missing from the
 * graph appear as isolated nodes.
 */
export function findPathNodes(graph: DependencyGraph, targets: readonly FilePath[]): DependencyGraph {
  const uniqueTargets = Array.from(new Set(targets));
  const dependents = graph.dependents();
  const forward = new Map<FilePath, Set<FilePath>>();
  const backward = new Map<FilePath, Set<FilePath>>();

  for (const target of uniqueTargets) {
    if (graph.has(target)) {
      forward.set(target, breadthFirst(target, node => graph.dependenciesOf(node)));
      backward.set(target, breadthFirst(target, node => dependents.get(node) ?? []));
    }
  }

  const keep = new Set<FilePath>(uniqueTargets);
  for (const source of uniqueTargets) {
    const reachable = forward.get(source);
    if (!reachable) continue;

    for (const destination of uniqueTargets) {
      const reaching = backward.get(destination);
      if (source === destination || !reaching) continue;

      for (const node of reachable) {
        if (reaching.has(node)) {
          keep.add(node);
        }
      }
    }
  }

  return graph.subgraph(keep);
}

export function validateLevelQuery(graph: DependencyGraph, target: FilePath, level: number): void {
  if (!Number.isInteger(level) || level < 1) {
    throw new QueryValidationError(`Level must be a positive integer, got ${level}`);
  }
  if (!graph.has(target)) {
    throw new QueryValidationError(`File not found in graph: ${target}`);
  }
}

export function validateBetweenQuery(graph: DependencyGraph, targets: readonly FilePath[]): void {
  const missing = targets.filter(target => !graph.has(target));
  if (missing.length > 0) {
    throw new QueryValidationError(`Files not found in graph: ${missing.join(', ')}`);
  }

  const found = new Set(targets).size;
  if (found < 2) {
    throw new QueryValidationError(`At least 2 files are required for a path query, got ${found}`);
  }
}
