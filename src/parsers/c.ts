import path from 'path';
import { BaseImportResolver } from './base';
import { FilePath } from '../graph/types';

const LOCAL_INCLUDE_PATTERN = /^\s*#\s*include\s*"([^"]+)"/gm;

/** C and C++ sources. Only quoted includes can name project files. */
export class CImportResolver extends BaseImportResolver {
  readonly language = 'C/C++';
  readonly extensions: readonly string[] = ['.c', '.h', '.cc', '.cpp', '.cxx', '.hpp', '.hh', '.hxx'];

  extractImports(content: string, _filePath: FilePath): string[] {
    return Array.from(content.matchAll(LOCAL_INCLUDE_PATTERN), match => match[1]);
  }

  resolve(specifier: string, fromPath: FilePath, candidates: ReadonlySet<FilePath>): FilePath | undefined {
    return this.firstCandidate([path.resolve(path.dirname(fromPath), specifier)], candidates);
  }

  isTestFile(filePath: FilePath): boolean {
    if (!this.canResolveFile(filePath)) {
      return false;
    }
    const stem = this.stem(filePath);
    return stem.startsWith('test_') || stem.endsWith('_test') || stem.endsWith('_tests');
  }
}
