import type { FileDependencyGraph } from '../graph/file-dependency-graph';

export interface RenderOptions {
  /** Title shown above the graph. */
  label?: string;
}

export interface Formatter {
  readonly name: string;
  format(graph: FileDependencyGraph, options?: RenderOptions): string;
  /** Shareable viewer URL for the rendered output, when the format has one. */
  generateUrl(output: string): string | undefined;
}
