import path from 'path';
import { BaseImportResolver } from './base';
import { FilePath } from '../graph/types';

const IMPORT_PATTERN = /^import\s+(.+)$/;
const FROM_IMPORT_PATTERN = /^from\s+([\w.]+)\s+import\s+(.+)$/;

function firstWord(clause: string): string {
  return clause.trim().split(/\s+/)[0] ?? '';
}

function toSlashes(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Line-based Python import extraction. `from . import x` is reported as the
 * relative module `.x` so that it resolves like any other relative import.
 */
export class PythonImportResolver extends BaseImportResolver {
  readonly language = 'Python';
  readonly extensions: readonly string[] = ['.py'];

  extractImports(content: string, _filePath: FilePath): string[] {
    const specifiers: string[] = [];
    const lines = content.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
      const line = this.stripComments(lines[i], '#').trim();

      const fromMatch = FROM_IMPORT_PATTERN.exec(line);
      if (fromMatch) {
        const moduleName = fromMatch[1];
        let names = fromMatch[2];

        // Parenthesized name list spanning several lines
        if (names.startsWith('(')) {
          while (!names.includes(')') && i + 1 < lines.length) {
            i++;
            names += ' ' + this.stripComments(lines[i], '#').trim();
          }
        }

        if (/^\.+$/.test(moduleName)) {
          for (const name of names.replace(/[()]/g, ' ').split(',')) {
            const imported = firstWord(name);
            if (imported && imported !== '*') {
              specifiers.push(moduleName + imported);
            }
          }
        } else {
          specifiers.push(moduleName);
        }
        continue;
      }

      const importMatch = IMPORT_PATTERN.exec(line);
      if (importMatch) {
        for (const clause of importMatch[1].split(',')) {
          const moduleName = firstWord(clause);
          if (/^[\w.]+$/.test(moduleName)) {
            specifiers.push(moduleName);
          }
        }
      }
    }

    return specifiers;
  }

  resolve(specifier: string, fromPath: FilePath, candidates: ReadonlySet<FilePath>): FilePath | undefined {
    if (specifier.startsWith('.')) {
      return this.resolveRelative(specifier, fromPath, candidates);
    }
    return this.resolveAbsolute(specifier, candidates);
  }

  isTestFile(filePath: FilePath): boolean {
    const baseName = path.basename(filePath);
    if (!baseName.endsWith('.py')) {
      return false;
    }
    return (
      baseName.startsWith('test_') || baseName.endsWith('_test.py') || baseName === 'conftest.py'
    );
  }

  private resolveRelative(
    specifier: string,
    fromPath: FilePath,
    candidates: ReadonlySet<FilePath>
  ): FilePath | undefined {
    const dots = specifier.length - specifier.replace(/^\.+/, '').length;
    let baseDir = path.dirname(fromPath);
    for (let level = 1; level < dots; level++) {
      baseDir = path.dirname(baseDir);
    }

    const modulePath = specifier.slice(dots);
    if (modulePath === '') {
      return this.firstCandidate([path.join(baseDir, '__init__.py')], candidates);
    }

    const parts = modulePath.split('.');
    return this.firstCandidate(
      [path.join(baseDir, ...parts) + '.py', path.join(baseDir, ...parts, '__init__.py')],
      candidates
    );
  }

  private resolveAbsolute(specifier: string, candidates: ReadonlySet<FilePath>): FilePath | undefined {
    const modulePath = specifier.split('.').join('/');
    const fileSuffix = `/${modulePath}.py`;
    const packageSuffix = `/${modulePath}/__init__.py`;

    let best: FilePath | undefined;
    for (const candidate of candidates) {
      const normalized = toSlashes(candidate);
      if (normalized.endsWith(fileSuffix) || normalized.endsWith(packageSuffix)) {
        if (best === undefined || candidate < best) {
          best = candidate;
        }
      }
    }
    return best;
  }
}
