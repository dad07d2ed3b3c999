import path from 'path';
import { FilePath } from '../graph/types';

/** Lower-case, dotted form: `TS` and `.ts` both become `.ts`. */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

export function filterByExtensions(
  files: readonly FilePath[],
  include: readonly string[] = [],
  exclude: readonly string[] = []
): FilePath[] {
  const included = new Set(include.map(normalizeExtension));
  const excluded = new Set(exclude.map(normalizeExtension));

  return files.filter(file => {
    const ext = path.extname(file).toLowerCase();
    if (included.size > 0 && !included.has(ext)) return false;
    return !excluded.has(ext);
  });
}

/** Whether `filePath` is `prefix` itself or lies beneath it. */
export function isUnderPath(filePath: FilePath, prefix: FilePath): boolean {
  if (filePath === prefix) return true;
  const withSeparator = prefix.endsWith(path.sep) ? prefix : prefix + path.sep;
  return filePath.startsWith(withSeparator);
}

export function excludePaths(files: readonly FilePath[], excluded: readonly FilePath[]): FilePath[] {
  if (excluded.length === 0) return [...files];
  return files.filter(file => !excluded.some(prefix => isUnderPath(file, prefix)));
}
