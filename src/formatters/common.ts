import path from 'path';
import { FileDependencyGraph } from '../graph/file-dependency-graph';
import { compareFilePaths } from '../graph/dependency-graph';
import { FilePath, FileStats } from '../graph/types';

const EXTENSION_PALETTE = [
  'lightblue',
  'lightyellow',
  'mistyrose',
  'lightsalmon',
  'lightpink',
  'lavender',
  'peachpuff',
  'plum',
  'powderblue',
  'khaki',
  'palegoldenrod',
  'thistle',
] as const;

export const NEW_FILE_MARKER = '🪴';

export function extensionOf(filePath: FilePath): string {
  return path.extname(path.basename(filePath));
}

export function sortedFiles(graph: FileDependencyGraph): FilePath[] {
  return graph.graph.sortedNodes();
}

export function sortedDependencies(graph: FileDependencyGraph, filePath: FilePath): FilePath[] {
  return [...graph.graph.dependenciesOf(filePath)].sort(compareFilePaths);
}

/** Palette colour per extension, assigned in sorted extension order. */
export function extensionColors(files: readonly FilePath[]): Map<string, string> {
  const extensions = Array.from(new Set(files.map(extensionOf).filter(ext => ext !== ''))).sort();
  return new Map(
    extensions.map((ext, i): [string, string] => [ext, EXTENSION_PALETTE[i % EXTENSION_PALETTE.length]])
  );
}

/** Most common extension; ties go to the extension that sorts first. */
export function majorityExtension(files: readonly FilePath[]): string | undefined {
  const counts = new Map<string, number>();
  for (const file of files) {
    const ext = extensionOf(file);
    counts.set(ext, (counts.get(ext) ?? 0) + 1);
  }

  let majority: string | undefined;
  let maxCount = 0;
  for (const ext of Array.from(counts.keys()).sort()) {
    const count = counts.get(ext) ?? 0;
    if (count > maxCount) {
      maxCount = count;
      majority = ext;
    }
  }
  return majority;
}

export function statsSummary(stats: FileStats): string {
  const parts: string[] = [];
  if (stats.additions > 0) parts.push(`+${stats.additions}`);
  if (stats.deletions > 0) parts.push(`-${stats.deletions}`);
  return parts.join(' ');
}

/** Node label with the new-file marker and a second line of change counts. */
export function nodeLabel(name: string, stats: FileStats | undefined, lineBreak: string): string {
  if (!stats) return name;
  const prefix = stats.isNew ? `${NEW_FILE_MARKER} ${name}` : name;
  const summary = statsSummary(stats);
  return summary ? `${prefix}${lineBreak}${summary}` : prefix;
}
