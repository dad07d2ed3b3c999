import { DependencyGraph, FileEdgeMap, ReadonlyFileEdgeMap, compareFilePaths } from './dependency-graph';
import { Cycle, FilePath } from './types';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('cycle-analyzer');

export interface CycleAnalysis {
  readonly cycles: Cycle[];
  /** One entry per edge of the graph. */
  readonly edgeFlags: ReadonlyFileEdgeMap<boolean>;
  /** One entry per node of the graph. */
  readonly nodeFlags: ReadonlyMap<FilePath, boolean>;
}

interface Frame {
  node: FilePath;
  next: number;
}

/**
 * Strongly connected components in Tarjan order. Roots are visited in sorted
 * order and neighbours in dependency-list order; members of each component
 * are returned in discovery order.
 */
export function stronglyConnectedComponents(graph: DependencyGraph): FilePath[][] {
  const index = new Map<FilePath, number>();
  const lowlink = new Map<FilePath, number>();
  const onStack = new Set<FilePath>();
  const stack: FilePath[] = [];
  const components: FilePath[][] = [];
  let counter = 0;

  const low = (node: FilePath): number => lowlink.get(node) ?? Number.MAX_SAFE_INTEGER;

  for (const root of graph.sortedNodes()) {
    if (index.has(root)) continue;

    const callStack: Frame[] = [];
    const visit = (node: FilePath): void => {
      index.set(node, counter);
      lowlink.set(node, counter);
      counter++;
      stack.push(node);
      onStack.add(node);
      callStack.push({ node, next: 0 });
    };

    visit(root);

    while (callStack.length > 0) {
      const frame = callStack[callStack.length - 1];
      const dependencies = graph.dependenciesOf(frame.node);

      if (frame.next < dependencies.length) {
        const dependency = dependencies[frame.next];
        frame.next++;

        const dependencyIndex = index.get(dependency);
        if (dependencyIndex === undefined) {
          visit(dependency);
        } else if (onStack.has(dependency)) {
          lowlink.set(frame.node, Math.min(low(frame.node), dependencyIndex));
        }
        continue;
      }

      callStack.pop();
      const parent = callStack[callStack.length - 1];
      if (parent) {
        lowlink.set(parent.node, Math.min(low(parent.node), low(frame.node)));
      }

      if (low(frame.node) === index.get(frame.node)) {
        const start = stack.lastIndexOf(frame.node);
        const component = stack.splice(start);
        for (const member of component) {
          onStack.delete(member);
        }
        components.push(component);
      }
    }
  }

  return components;
}

function rotateToSmallest(members: FilePath[]): FilePath[] {
  let smallest = 0;
  for (let i = 1; i < members.length; i++) {
    if (compareFilePaths(members[i], members[smallest]) < 0) {
      smallest = i;
    }
  }
  return [...members.slice(smallest), ...members.slice(0, smallest)];
}

/**
 * Find every cycle of the graph and flag the edges and nodes taking part.
 * A self-dependency is a cycle of length one.
 */
export function analyzeCycles(graph: DependencyGraph): CycleAnalysis {
  const componentOf = new Map<FilePath, number>();
  const componentSizes: number[] = [];
  const cycles: Cycle[] = [];

  stronglyConnectedComponents(graph).forEach((members, componentIndex) => {
    componentSizes.push(members.length);
    for (const member of members) {
      componentOf.set(member, componentIndex);
    }

    const isCycle = members.length > 1 || graph.hasEdge(members[0], members[0]);
    if (isCycle) {
      cycles.push({ path: Object.freeze(rotateToSmallest(members)) });
    }
  });

  cycles.sort((a, b) => compareFilePaths(a.path[0], b.path[0]));

  const edgeFlags = new FileEdgeMap<boolean>();
  const nodeFlags = new Map<FilePath, boolean>();

  for (const node of graph.nodes()) {
    const component = componentOf.get(node);
    const size = component === undefined ? 0 : componentSizes[component];
    nodeFlags.set(node, size > 1 || graph.hasEdge(node, node));
  }

  for (const edge of graph.edges()) {
    const sameComponent = componentOf.get(edge.from) === componentOf.get(edge.to);
    const fromFlag = nodeFlags.get(edge.from) ?? false;
    edgeFlags.set(edge, sameComponent && fromFlag);
  }

  if (cycles.length > 0) {
    logger.debug('Detected dependency cycles', { cycles: cycles.length });
  }

  return { cycles, edgeFlags: edgeFlags.readonlyView(), nodeFlags };
}
