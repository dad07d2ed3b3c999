import { FileDependencyGraph } from '../graph/file-dependency-graph';
import { buildNodeNames } from '../graph/node-names';
import {
  extensionColors,
  extensionOf,
  majorityExtension,
  nodeLabel,
  sortedDependencies,
  sortedFiles,
} from './common';
import { Formatter, RenderOptions } from './types';

const GRAPHVIZ_ONLINE_URL = 'https://dreampuf.github.io/GraphvizOnline/?engine=dot#';

function quote(value: string): string {
  return JSON.stringify(value);
}

/** Graphviz DOT output. */
export class DotFormatter implements Formatter {
  readonly name = 'dot';

  format(graph: FileDependencyGraph, options: RenderOptions = {}): string {
    const files = sortedFiles(graph);
    const names = buildNodeNames(files);
    const nameOf = (file: string): string => names.get(file) ?? file;

    const lines: string[] = ['digraph dependencies {', '  rankdir=LR;', '  node [shape=box];'];

    if (options.label) {
      lines.push(
        `  label=${quote(options.label)};`,
        '  labelloc=t;',
        '  labeljust=l;',
        '  fontsize=10;',
        '  fontname=Courier;'
      );
    }
    lines.push('');

    if (graph.cycles.length > 0) {
      lines.push('  // Cyclic paths:');
      graph.cycles.forEach((cycle, i) => {
        const members = [...cycle.path, cycle.path[0]].map(nameOf);
        lines.push(`  // C${i + 1}: ${members.join(' -> ')}`);
      });
      lines.push('');
    }

    const colors = extensionColors(files);
    const majority = majorityExtension(files);
    const hasMultipleExtensions = new Set(files.map(extensionOf)).size > 1;

    for (const file of files) {
      const metadata = graph.files.get(file);
      let fill: string;
      if (metadata?.isTest) {
        fill = 'lightgreen';
      } else if (extensionOf(file) === majority || !hasMultipleExtensions) {
        fill = 'white';
      } else {
        fill = colors.get(extensionOf(file)) ?? 'white';
      }

      const label = nodeLabel(nameOf(file), metadata?.stats, '\n');
      const outline = metadata?.inCycle ? ', color=red' : '';
      lines.push(`  ${quote(nameOf(file))} [label=${quote(label)}, style=filled, fillcolor=${fill}${outline}];`);
    }

    if (files.length > 0 && graph.graph.edgeCount > 0) {
      lines.push('');
    }

    for (const file of files) {
      for (const dependency of sortedDependencies(graph, file)) {
        const style = graph.edges.get(file, dependency)?.inCycle ? ' [color=red, style=dashed]' : '';
        lines.push(`  ${quote(nameOf(file))} -> ${quote(nameOf(dependency))}${style};`);
      }
    }

    lines.push('}');
    return lines.join('\n');
  }

  generateUrl(output: string): string {
    return GRAPHVIZ_ONLINE_URL + encodeURIComponent(output);
  }
}
