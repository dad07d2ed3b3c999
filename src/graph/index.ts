export * from './types';
export * from './errors';
export {
  DependencyGraph,
  FileEdgeMap,
  ReadonlyFileEdgeMap,
  AdjacencyInput,
  adjacencyList,
  compareFilePaths,
  containsNode,
  edgeKey,
} from './dependency-graph';
export { GraphBuilder, buildDependencyGraph } from './builder';
export { BuildOptions, BuildResult, DiscoveryOptions, FileDiscoveryService, SKIPPED_DIRECTORIES } from './builder/index';
export { CycleAnalysis, analyzeCycles, stronglyConnectedComponents } from './cycle-analyzer';
export {
  filterByLevel,
  findPathNodes,
  validateBetweenQuery,
  validateLevelQuery,
} from './structural-queries';
export { buildNodeNames } from './node-names';
export { FileDependencyGraph, newFileDependencyGraph } from './file-dependency-graph';
