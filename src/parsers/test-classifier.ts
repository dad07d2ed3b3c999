import path from 'path';
import { ImportResolverRegistry } from './base';
import { FilePath, TestFileClassifier } from '../graph/types';

const TEST_DIRECTORIES = new Set(['test', 'tests', '__tests__', 'spec']);

export function isInTestDirectory(filePath: FilePath): boolean {
  return path
    .dirname(filePath)
    .split(/[\\/]/)
    .some(segment => TEST_DIRECTORIES.has(segment));
}

/**
 * Test files are recognised by their language resolver's naming rules, or by
 * living under a conventional test directory whatever their extension.
 */
export function createTestFileClassifier(registry: ImportResolverRegistry): TestFileClassifier {
  return {
    isTestFile(filePath: FilePath): boolean {
      const resolver = registry.forFile(filePath);
      if (resolver?.isTestFile(filePath)) {
        return true;
      }
      return isInTestDirectory(filePath);
    },
  };
}
