import { DependencyGraph } from '../../src/graph/dependency-graph';
import { FileDependencyGraph, newFileDependencyGraph } from '../../src/graph/file-dependency-graph';
import { FileStats } from '../../src/graph/types';

/**
 * Four files: a two-file cycle (a.ts, b.ts), a test importing a.ts and a new
 * Python module imported by b.ts.
 */
export function sampleGraph(): FileDependencyGraph {
  const graph = DependencyGraph.fromRecord({
    '/r/src/a.ts': ['/r/src/b.ts'],
    '/r/src/b.ts': ['/r/src/a.ts', '/r/lib/c.py'],
    '/r/lib/c.py': [],
    '/r/src/a.test.ts': ['/r/src/a.ts'],
  });
  const stats = new Map<string, FileStats>([
    ['/r/src/b.ts', { additions: 4, deletions: 2, isNew: false }],
    ['/r/lib/c.py', { additions: 7, deletions: 0, isNew: true }],
  ]);

  return newFileDependencyGraph(graph, stats, {
    isTestFile: filePath => filePath.includes('.test.'),
  });
}

export function simpleGraph(record: { [path: string]: string[] }): FileDependencyGraph {
  return newFileDependencyGraph(DependencyGraph.fromRecord(record));
}
