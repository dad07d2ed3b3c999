import { FilePath } from './types';

function segmentsOf(filePath: FilePath): string[] {
  return filePath.split(/[\\/]+/).filter(segment => segment.length > 0);
}

function suffix(segments: readonly string[], depth: number): string {
  return segments.slice(Math.max(0, segments.length - depth)).join('/');
}

function allDistinct(values: readonly string[]): boolean {
  return new Set(values).size === values.length;
}

/**
 * Shortest collision-free display names. Files sharing a base name are
 * widened together to the smallest suffix depth that tells them apart.
 */
export function buildNodeNames(paths: Iterable<FilePath>): Map<FilePath, string> {
  const names = new Map<FilePath, string>();
  const groups = new Map<string, { path: FilePath; segments: string[] }[]>();

  for (const filePath of new Set(paths)) {
    const segments = segmentsOf(filePath);
    const baseName = segments[segments.length - 1] ?? filePath;
    const group = groups.get(baseName);
    if (group) {
      group.push({ path: filePath, segments });
    } else {
      groups.set(baseName, [{ path: filePath, segments }]);
    }
  }

  for (const [baseName, members] of groups) {
    if (members.length === 1) {
      names.set(members[0].path, baseName);
      continue;
    }

    const maxDepth = Math.max(...members.map(member => member.segments.length));
    let assigned = false;

    for (let depth = 2; depth <= maxDepth; depth++) {
      const candidates = members.map(member => suffix(member.segments, depth));
      if (allDistinct(candidates)) {
        members.forEach((member, i) => names.set(member.path, candidates[i]));
        assigned = true;
        break;
      }
    }

    // Paths that differ only in separators or a leading slash
    if (!assigned) {
      for (const member of members) {
        names.set(member.path, member.path);
      }
    }
  }

  return names;
}
