import type { ImportResolverRegistry } from '../../parsers/base';
import { DependencyGraph } from '../dependency-graph';
import { BuildWarning, FilePath } from '../types';

/**
 * Type definitions for GraphBuilder
 */

export interface BuildOptions {
  /** Resolvers to dispatch on; defaults to every built-in language. */
  registry?: ImportResolverRegistry;
  /** Files read and parsed at the same time. */
  maxConcurrency?: number;
  /** Larger files become standalone nodes with a `too-large` warning. */
  maxFileSize?: number;
}

export interface BuildResult {
  graph: DependencyGraph;
  /** Files that degraded to standalone nodes, in input order. */
  warnings: BuildWarning[];
  /** Files with no registered resolver, in input order. */
  unsupportedFiles: FilePath[];
}

export interface DiscoveryOptions {
  /** Keep files whose extension has no resolver. */
  includeUnsupported?: boolean;
  registry?: ImportResolverRegistry;
}
