import path from 'path';
import { analyzeCycles } from './cycle-analyzer';
import { DependencyGraph, FileEdgeMap, ReadonlyFileEdgeMap } from './dependency-graph';
import { Cycle, EdgeMetadata, FileMetadata, FilePath, FileStats, TestFileClassifier } from './types';

/**
 * A finished graph together with its cycles and per-edge and per-file
 * metadata. Handed as a unit to formatters.
 */
export interface FileDependencyGraph {
  readonly graph: DependencyGraph;
  readonly cycles: readonly Cycle[];
  readonly edges: ReadonlyFileEdgeMap<EdgeMetadata>;
  readonly files: ReadonlyMap<FilePath, FileMetadata>;
}

const neverTest: TestFileClassifier = {
  isTestFile: () => false,
};

export function newFileDependencyGraph(
  graph: DependencyGraph,
  stats?: ReadonlyMap<FilePath, FileStats>,
  classifier: TestFileClassifier = neverTest
): FileDependencyGraph {
  const { cycles, edgeFlags, nodeFlags } = analyzeCycles(graph);

  const edges = new FileEdgeMap<EdgeMetadata>();
  for (const [edge, inCycle] of edgeFlags) {
    edges.set(edge, Object.freeze({ inCycle }));
  }

  const files = new Map<FilePath, FileMetadata>();
  for (const node of graph.nodes()) {
    const fileStats = stats?.get(node);
    files.set(
      node,
      Object.freeze({
        isTest: classifier.isTestFile(node),
        inCycle: nodeFlags.get(node) ?? false,
        extension: path.extname(node).toLowerCase(),
        ...(fileStats ? { stats: Object.freeze({ ...fileStats }) } : {}),
      })
    );
  }

  return Object.freeze({
    graph,
    cycles: Object.freeze(cycles),
    edges: edges.readonlyView(),
    files,
  });
}
