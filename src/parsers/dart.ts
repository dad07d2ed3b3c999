import path from 'path';
import { BaseImportResolver } from './base';
import { FilePath } from '../graph/types';

const DIRECTIVE_PATTERN = /^\s*(?:import|export|part)\s+['"]([^'"]+)['"]/gm;

export class DartImportResolver extends BaseImportResolver {
  readonly language = 'Dart';
  readonly extensions: readonly string[] = ['.dart'];

  extractImports(content: string, _filePath: FilePath): string[] {
    return Array.from(content.matchAll(DIRECTIVE_PATTERN), match => match[1]);
  }

  resolve(specifier: string, fromPath: FilePath, candidates: ReadonlySet<FilePath>): FilePath | undefined {
    // dart:, package: and any other scheme point outside the project tree
    if (/^[a-zA-Z][\w+.-]*:/.test(specifier)) {
      return undefined;
    }

    const target = path.resolve(path.dirname(fromPath), specifier);
    const probes = target.endsWith('.dart') ? [target] : [target, `${target}.dart`];
    return this.firstCandidate(probes, candidates);
  }

  isTestFile(filePath: FilePath): boolean {
    return path.basename(filePath).endsWith('_test.dart');
  }
}
