import { FileDependencyGraph } from '../graph/file-dependency-graph';
import { buildNodeNames } from '../graph/node-names';
import { FilePath, FileStats } from '../graph/types';
import { sortedDependencies, sortedFiles } from './common';
import { Formatter, RenderOptions } from './types';

export type NodeAttribute = 'test' | 'new' | 'cycle';

export interface JsonNode {
  path: FilePath;
  name: string;
  attributes?: NodeAttribute[];
  stats?: FileStats;
}

export interface JsonEdge {
  from: FilePath;
  to: FilePath;
  inCycle: boolean;
}

export interface JsonGraph {
  label?: string;
  nodes: JsonNode[];
  edges: JsonEdge[];
  cycles: { path: FilePath[] }[];
}

export class JsonFormatter implements Formatter {
  readonly name = 'json';

  toJson(graph: FileDependencyGraph, options: RenderOptions = {}): JsonGraph {
    const files = sortedFiles(graph);
    const names = buildNodeNames(files);

    const nodes = files.map((file): JsonNode => {
      const metadata = graph.files.get(file);
      const attributes: NodeAttribute[] = [];
      if (metadata?.isTest) attributes.push('test');
      if (metadata?.stats?.isNew) attributes.push('new');
      if (metadata?.inCycle) attributes.push('cycle');

      return {
        path: file,
        name: names.get(file) ?? file,
        ...(attributes.length > 0 ? { attributes } : {}),
        ...(metadata?.stats ? { stats: { ...metadata.stats } } : {}),
      };
    });

    const edges = files.flatMap(file =>
      sortedDependencies(graph, file).map(
        (dependency): JsonEdge => ({
          from: file,
          to: dependency,
          inCycle: graph.edges.get(file, dependency)?.inCycle ?? false,
        })
      )
    );

    return {
      ...(options.label ? { label: options.label } : {}),
      nodes,
      edges,
      cycles: graph.cycles.map(cycle => ({ path: [...cycle.path] })),
    };
  }

  format(graph: FileDependencyGraph, options: RenderOptions = {}): string {
    return JSON.stringify(this.toJson(graph, options), null, 2);
  }

  generateUrl(_output: string): undefined {
    return undefined;
  }
}
