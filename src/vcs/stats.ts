import path from 'path';
import { FilePath, FileStats } from '../graph/types';

export interface NumstatEntry {
  path: string;
  additions: number;
  deletions: number;
}

function parseCount(value: string): number {
  // Binary files report '-'
  if (value === '-') return 0;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? 0 : parsed;
}

/**
 * New-side path of a numstat rename, in either the `old => new` or the
 * `dir/{old => new}/file` form. Other paths are returned unchanged.
 */
export function resolveRenamedPath(filePath: string): string {
  const open = filePath.indexOf('{');
  const close = filePath.indexOf('}');
  if (open !== -1 && open < close) {
    const middle = filePath.slice(open + 1, close);
    const parts = middle.split(' => ');
    if (parts.length === 2) {
      const joined = filePath.slice(0, open) + parts[1].trim() + filePath.slice(close + 1);
      return joined.replace(/\/{2,}/g, '/');
    }
  }

  const parts = filePath.split(' => ');
  if (parts.length === 2) {
    return parts[1].trim();
  }
  return filePath;
}

export function parseNumstat(output: string): NumstatEntry[] {
  const entries: NumstatEntry[] = [];
  for (const line of output.split('\n')) {
    if (line.trim() === '') continue;

    const [additions, deletions, ...rest] = line.split('\t');
    const filePath = rest.join('\t').trim();
    if (!filePath || deletions === undefined) continue;

    entries.push({
      path: resolveRenamedPath(filePath),
      additions: parseCount(additions.trim()),
      deletions: parseCount(deletions.trim()),
    });
  }
  return entries;
}

/** `--name-status` output keyed by the new-side path. */
export function parseNameStatus(output: string): Map<string, string> {
  const statuses = new Map<string, string>();
  for (const line of output.split('\n')) {
    if (line.trim() === '') continue;

    const fields = line.split('\t');
    if (fields.length < 2) continue;
    const status = fields[0].trim();
    const filePath = fields[fields.length - 1].trim();
    if (status && filePath) {
      statuses.set(filePath, status);
    }
  }
  return statuses;
}

/** `status --porcelain` output keyed by path, values are the two-letter XY code. */
export function parsePorcelainStatus(output: string): Map<string, string> {
  const statuses = new Map<string, string>();
  for (const line of output.split('\n')) {
    if (line.length < 4) continue;

    const status = line.slice(0, 2);
    let filePath = line.slice(3).trim();
    const renameIndex = filePath.indexOf(' -> ');
    if (renameIndex !== -1) {
      filePath = filePath.slice(renameIndex + 4);
    }
    if (filePath) {
      statuses.set(filePath, status);
    }
  }
  return statuses;
}

export function isDeletedStatus(status: string): boolean {
  return status.includes('D');
}

export function isNewStatus(status: string): boolean {
  const trimmed = status.trim();
  if (trimmed === '') return false;
  if (trimmed === '??') return true;
  return trimmed.startsWith('A');
}

export function countLines(content: string): number {
  if (content.length === 0) return 0;
  const newlines = content.split('\n').length - 1;
  return content.endsWith('\n') ? newlines : newlines + 1;
}

export function toAbsolutePath(root: string, relativePath: string): FilePath {
  return path.resolve(root, relativePath);
}

/**
 * Combine numstat counts with status codes into per-file statistics keyed by
 * absolute path. Files that only appear in `statuses` as new get an entry too.
 */
export function mergeFileStats(
  root: string,
  numstat: readonly NumstatEntry[],
  statuses: ReadonlyMap<string, string>,
  isNew: (status: string) => boolean = isNewStatus
): Map<FilePath, FileStats> {
  const stats = new Map<FilePath, FileStats>();

  for (const entry of numstat) {
    const status = statuses.get(entry.path) ?? '';
    stats.set(toAbsolutePath(root, entry.path), {
      additions: entry.additions,
      deletions: entry.deletions,
      isNew: isNew(status),
    });
  }

  for (const [relativePath, status] of statuses) {
    if (!isNew(status)) continue;
    const absolutePath = toAbsolutePath(root, relativePath);
    const existing = stats.get(absolutePath);
    stats.set(absolutePath, {
      additions: existing?.additions ?? 0,
      deletions: existing?.deletions ?? 0,
      isNew: true,
    });
  }

  return stats;
}
