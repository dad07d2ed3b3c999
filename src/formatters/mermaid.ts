import { FileDependencyGraph } from '../graph/file-dependency-graph';
import { buildNodeNames } from '../graph/node-names';
import { nodeLabel, sortedDependencies, sortedFiles } from './common';
import { Formatter, RenderOptions } from './types';

const MERMAID_LIVE_URL = 'https://mermaid.live/edit#base64:';
const CYCLE_STROKE = 'stroke:#d62728,stroke-width:2px';

/** Mermaid flowchart output. */
export class MermaidFormatter implements Formatter {
  readonly name = 'mermaid';

  format(graph: FileDependencyGraph, options: RenderOptions = {}): string {
    const files = sortedFiles(graph);
    const names = buildNodeNames(files);
    const ids = new Map(files.map((file, i): [string, string] => [file, `n${i}`]));
    const idOf = (file: string): string => ids.get(file) ?? file;

    const lines: string[] = [];
    if (options.label) {
      lines.push('---', `title: ${options.label}`, '---');
    }
    lines.push('flowchart LR');

    for (const file of files) {
      const metadata = graph.files.get(file);
      const label = nodeLabel(names.get(file) ?? file, metadata?.stats, '<br/>').replace(/"/g, '#quot;');
      lines.push(`    ${idOf(file)}["${label}"]`);
    }
    lines.push('');

    const cycleLinks: number[] = [];
    let linkIndex = 0;
    for (const file of files) {
      for (const dependency of sortedDependencies(graph, file)) {
        lines.push(`    ${idOf(file)} --> ${idOf(dependency)}`);
        if (graph.edges.get(file, dependency)?.inCycle) {
          cycleLinks.push(linkIndex);
        }
        linkIndex++;
      }
    }
    lines.push('');

    const testNodes: string[] = [];
    const newNodes: string[] = [];
    const cycleNodes: string[] = [];
    for (const file of files) {
      const metadata = graph.files.get(file);
      if (metadata?.isTest) {
        testNodes.push(idOf(file));
      } else if (metadata?.stats?.isNew) {
        newNodes.push(idOf(file));
      }
      if (metadata?.inCycle) {
        cycleNodes.push(idOf(file));
      }
    }

    lines.push(
      '    classDef testFile fill:#90EE90,stroke:#228B22,color:#000000',
      '    classDef newFile fill:#87CEEB,stroke:#4682B4',
      `    classDef cycleFile ${CYCLE_STROKE}`
    );
    if (testNodes.length > 0) lines.push(`    class ${testNodes.join(',')} testFile`);
    if (newNodes.length > 0) lines.push(`    class ${newNodes.join(',')} newFile`);
    if (cycleNodes.length > 0) lines.push(`    class ${cycleNodes.join(',')} cycleFile`);
    if (cycleLinks.length > 0) lines.push(`    linkStyle ${cycleLinks.join(',')} ${CYCLE_STROKE}`);

    return lines.join('\n');
  }

  generateUrl(output: string): string {
    const payload = JSON.stringify({
      autoSync: true,
      code: output,
      mermaid: { theme: 'default' },
      updateDiagram: true,
    });
    const encoded = Buffer.from(payload, 'utf8').toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
    return MERMAID_LIVE_URL + encoded;
  }
}
