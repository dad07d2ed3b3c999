import Parser from 'tree-sitter';
import { JavaScriptImportResolver, isRelativeSpecifier } from '../../src/parsers/javascript';
import type { TreeSitterRuntime } from '../tree-sitter-environment';

describe('JavaScriptImportResolver', () => {
  let resolver: JavaScriptImportResolver;

  beforeEach(() => {
    resolver = new JavaScriptImportResolver();
  });

  describe('canResolveFile', () => {
    it('should accept JavaScript and TypeScript files', () => {
      expect(resolver.canResolveFile('/p/a.js')).toBe(true);
      expect(resolver.canResolveFile('/p/a.tsx')).toBe(true);
      expect(resolver.canResolveFile('/p/a.MTS')).toBe(true);
    });

    it('should reject other files', () => {
      expect(resolver.canResolveFile('/p/a.py')).toBe(false);
      expect(resolver.canResolveFile('/p/style.css')).toBe(false);
    });
  });

  describe('extractImports', () => {
    it('should collect static, re-export, require and dynamic import specifiers', () => {
      const content = [
        "import a from './a';",
        "import './side-effect';",
        "export { b } from '../b';",
        "export * from './c.js';",
        "const d = require('./d');",
        "const lazy = () => import('./e');",
        "import fs from 'fs';",
      ].join('\n');

      expect(resolver.extractImports(content, '/p/src/main.js')).toEqual([
        './a',
        './side-effect',
        '../b',
        './c.js',
        './d',
        './e',
        'fs',
      ]);
    });

    it('should parse TypeScript-only syntax', () => {
      const content = [
        "import type { User } from './types';",
        "import fs = require('./legacy');",
        'export const answer: number = 42;',
      ].join('\n');

      expect(resolver.extractImports(content, '/p/src/main.ts')).toEqual(['./types', './legacy']);
    });

    it('should parse JSX with the tsx grammar', () => {
      const content = [
        "import { Button } from './Button';",
        'export const App = () => <Button label="ok" />;',
      ].join('\n');

      expect(resolver.extractImports(content, '/p/src/App.tsx')).toEqual(['./Button']);
    });

    it('should ignore require calls without a string literal', () => {
      const content = ['const name = "./x";', 'require(name);', "other('./y');"].join('\n');

      expect(resolver.extractImports(content, '/p/src/main.js')).toEqual([]);
    });

    it('should parse with the tree-sitter runtime shared by the worker', () => {
      const shared: TreeSitterRuntime | undefined = globalThis.treeSitterRuntime;
      const content = "import { a } from './a';";

      expect(Parser).toBe(shared?.['tree-sitter']);
      expect(new JavaScriptImportResolver().extractImports(content, '/p/x.ts')).toEqual(['./a']);
      expect(new JavaScriptImportResolver().extractImports(content, '/p/y.tsx')).toEqual(['./a']);
    });

    it('should not throw on malformed source', () => {
      expect(() => resolver.extractImports("import { from './broken'", '/p/src/bad.ts')).not.toThrow();
    });
  });

  describe('resolve', () => {
    const candidates = new Set([
      '/proj/src/a.ts',
      '/proj/src/b.js',
      '/proj/src/util/index.ts',
      '/proj/lib/c.tsx',
    ]);
    const fromPath = '/proj/src/main.ts';

    it('should probe extensions for an extensionless specifier', () => {
      expect(resolver.resolve('./a', fromPath, candidates)).toBe('/proj/src/a.ts');
      expect(resolver.resolve('./b', fromPath, candidates)).toBe('/proj/src/b.js');
      expect(resolver.resolve('../lib/c', fromPath, candidates)).toBe('/proj/lib/c.tsx');
    });

    it('should map a .js specifier onto its TypeScript sibling', () => {
      expect(resolver.resolve('./a.js', fromPath, candidates)).toBe('/proj/src/a.ts');
    });

    it('should fall back to a directory index file', () => {
      expect(resolver.resolve('./util', fromPath, candidates)).toBe('/proj/src/util/index.ts');
    });

    it('should treat bare specifiers as external', () => {
      expect(resolver.resolve('react', fromPath, candidates)).toBeUndefined();
      expect(resolver.resolve('@scope/pkg', fromPath, candidates)).toBeUndefined();
    });

    it('should return undefined when no candidate matches', () => {
      expect(resolver.resolve('./missing', fromPath, candidates)).toBeUndefined();
    });
  });

  describe('isTestFile', () => {
    it('should recognise test and spec files', () => {
      expect(resolver.isTestFile('/p/src/a.test.ts')).toBe(true);
      expect(resolver.isTestFile('/p/src/a.spec.jsx')).toBe(true);
      expect(resolver.isTestFile('/p/__tests__/a.js')).toBe(true);
    });

    it('should not flag regular sources', () => {
      expect(resolver.isTestFile('/p/src/a.ts')).toBe(false);
      expect(resolver.isTestFile('/p/src/testing.ts')).toBe(false);
    });
  });
});

describe('isRelativeSpecifier', () => {
  it('should accept only dot-prefixed paths', () => {
    expect(isRelativeSpecifier('./a')).toBe(true);
    expect(isRelativeSpecifier('../a')).toBe(true);
    expect(isRelativeSpecifier('..')).toBe(true);
    expect(isRelativeSpecifier('.hidden')).toBe(false);
    expect(isRelativeSpecifier('/abs/a')).toBe(false);
  });
});
