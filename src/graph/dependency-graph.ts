import { GraphClosureError } from './errors';
import { FileEdge, FilePath } from './types';

export type AdjacencyInput = Iterable<readonly [FilePath, Iterable<FilePath>]>;

export function edgeKey(from: FilePath, to: FilePath): string {
  return `${from}\u0000${to}`;
}

/**
 * Immutable directed graph of files. Every dependency is itself a node, and
 * node order follows construction order.
 */
export class DependencyGraph {
  private readonly adjacency: ReadonlyMap<FilePath, readonly FilePath[]>;

  private constructor(adjacency: Map<FilePath, readonly FilePath[]>) {
    this.adjacency = adjacency;
  }

  /**
   * Build a graph from an adjacency description. Duplicate dependencies are
   * collapsed keeping the first occurrence. Throws GraphClosureError when a
   * dependency is not a key.
   */
  static from(input: AdjacencyInput): DependencyGraph {
    const adjacency = new Map<FilePath, readonly FilePath[]>();
    for (const [node, dependencies] of input) {
      adjacency.set(node, Object.freeze(Array.from(new Set(dependencies))));
    }

    for (const [node, dependencies] of adjacency) {
      for (const dependency of dependencies) {
        if (!adjacency.has(dependency)) {
          throw new GraphClosureError(node, dependency);
        }
      }
    }

    return new DependencyGraph(adjacency);
  }

  static fromRecord(record: { readonly [path: string]: Iterable<FilePath> }): DependencyGraph {
    return DependencyGraph.from(Object.entries(record));
  }

  static empty(): DependencyGraph {
    return new DependencyGraph(new Map());
  }

  get size(): number {
    return this.adjacency.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const dependencies of this.adjacency.values()) {
      count += dependencies.length;
    }
    return count;
  }

  has(filePath: FilePath): boolean {
    return this.adjacency.has(filePath);
  }

  /** Nodes in construction order. */
  nodes(): FilePath[] {
    return Array.from(this.adjacency.keys());
  }

  sortedNodes(): FilePath[] {
    return this.nodes().sort(compareFilePaths);
  }

  dependenciesOf(filePath: FilePath): readonly FilePath[] {
    return this.adjacency.get(filePath) ?? [];
  }

  edges(): FileEdge[] {
    const edges: FileEdge[] = [];
    for (const [from, dependencies] of this.adjacency) {
      for (const to of dependencies) {
        edges.push({ from, to });
      }
    }
    return edges;
  }

  hasEdge(from: FilePath, to: FilePath): boolean {
    return this.dependenciesOf(from).includes(to);
  }

  /** Reverse adjacency: for each node, the nodes that depend on it. */
  dependents(): Map<FilePath, FilePath[]> {
    const reverse = new Map<FilePath, FilePath[]>();
    for (const node of this.adjacency.keys()) {
      reverse.set(node, []);
    }
    for (const [from, dependencies] of this.adjacency) {
      for (const to of dependencies) {
        reverse.get(to)?.push(from);
      }
    }
    return reverse;
  }

  /**
   * Induced subgraph over the given nodes. Nodes absent from this graph are
   * added without dependencies after the retained ones.
   */
  subgraph(keep: Iterable<FilePath>): DependencyGraph {
    const wanted = new Set(keep);
    const adjacency = new Map<FilePath, readonly FilePath[]>();

    for (const [node, dependencies] of this.adjacency) {
      if (wanted.has(node)) {
        adjacency.set(node, Object.freeze(dependencies.filter(dep => wanted.has(dep))));
      }
    }
    for (const node of wanted) {
      if (!adjacency.has(node)) {
        adjacency.set(node, Object.freeze([]));
      }
    }

    return new DependencyGraph(adjacency);
  }

  /** Copy of the adjacency, safe for callers to mutate. */
  toAdjacency(): Map<FilePath, FilePath[]> {
    const copy = new Map<FilePath, FilePath[]>();
    for (const [node, dependencies] of this.adjacency) {
      copy.set(node, [...dependencies]);
    }
    return copy;
  }

  /** Same node set and, per node, the same dependency set. */
  equals(other: DependencyGraph): boolean {
    if (this.size !== other.size) {
      return false;
    }
    for (const [node, dependencies] of this.adjacency) {
      if (!other.has(node)) {
        return false;
      }
      const theirs = new Set(other.dependenciesOf(node));
      if (theirs.size !== dependencies.length || dependencies.some(dep => !theirs.has(dep))) {
        return false;
      }
    }
    return true;
  }
}

export function containsNode(graph: DependencyGraph, filePath: FilePath): boolean {
  return graph.has(filePath);
}

export function adjacencyList(graph: DependencyGraph): Map<FilePath, FilePath[]> {
  return graph.toAdjacency();
}

export function compareFilePaths(a: FilePath, b: FilePath): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Lookup side of a FileEdgeMap. */
export interface ReadonlyFileEdgeMap<V> extends Iterable<[FileEdge, V]> {
  readonly size: number;
  get(from: FilePath, to: FilePath): V | undefined;
  has(from: FilePath, to: FilePath): boolean;
  entries(): IterableIterator<[FileEdge, V]>;
}

/** Map keyed structurally by (from, to). */
export class FileEdgeMap<V> implements ReadonlyFileEdgeMap<V> {
  private readonly entriesByKey = new Map<string, { edge: FileEdge; value: V }>();

  get size(): number {
    return this.entriesByKey.size;
  }

  set(edge: FileEdge, value: V): this {
    this.entriesByKey.set(edgeKey(edge.from, edge.to), {
      edge: { from: edge.from, to: edge.to },
      value,
    });
    return this;
  }

  get(from: FilePath, to: FilePath): V | undefined {
    return this.entriesByKey.get(edgeKey(from, to))?.value;
  }

  has(from: FilePath, to: FilePath): boolean {
    return this.entriesByKey.has(edgeKey(from, to));
  }

  *entries(): IterableIterator<[FileEdge, V]> {
    for (const { edge, value } of this.entriesByKey.values()) {
      yield [edge, value];
    }
  }

  [Symbol.iterator](): IterableIterator<[FileEdge, V]> {
    return this.entries();
  }

  /** Read-only view backed by this map. */
  readonlyView(): ReadonlyFileEdgeMap<V> {
    const source: FileEdgeMap<V> = this;
    return Object.freeze({
      get size() {
        return source.size;
      },
      get: (from: FilePath, to: FilePath) => source.get(from, to),
      has: (from: FilePath, to: FilePath) => source.has(from, to),
      entries: () => source.entries(),
      [Symbol.iterator]: () => source.entries(),
    });
  }
}
