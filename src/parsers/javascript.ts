import Parser from 'tree-sitter';
import JavaScript from 'tree-sitter-javascript';
import TypeScript from 'tree-sitter-typescript';
import path from 'path';
import { BaseImportResolver } from './base';
import { FilePath } from '../graph/types';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('javascript-resolver');

type GrammarName = 'javascript' | 'typescript' | 'tsx';

const EXTENSIONS = ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.mts', '.cts'] as const;

// Probe order for extensionless specifiers
const PROBE_EXTENSIONS = ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.mts', '.cts'] as const;

// `import './a.js'` in TypeScript sources refers to a.ts
const TYPESCRIPT_SIBLINGS: Readonly<Record<string, string>> = {
  '.js': '.ts',
  '.jsx': '.tsx',
  '.mjs': '.mts',
  '.cjs': '.cts',
};

const CHUNK_SIZE = 8192;

function grammarFor(filePath: FilePath): GrammarName {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.tsx' || extension === '.jsx') return 'tsx';
  if (extension === '.ts' || extension === '.mts' || extension === '.cts') return 'typescript';
  return 'javascript';
}

function stringLiteralValue(node: Parser.SyntaxNode | null | undefined): string | null {
  if (!node || node.type !== 'string') return null;
  const text = node.text;
  return text.length >= 2 ? text.slice(1, -1) : null;
}

export function isRelativeSpecifier(specifier: string): boolean {
  return (
    specifier === '.' ||
    specifier === '..' ||
    specifier.startsWith('./') ||
    specifier.startsWith('../')
  );
}

export class JavaScriptImportResolver extends BaseImportResolver {
  readonly language = 'JavaScript/TypeScript';
  readonly extensions: readonly string[] = EXTENSIONS;

  private readonly parsers = new Map<GrammarName, Parser>();

  extractImports(content: string, filePath: FilePath): string[] {
    const tree = this.getParser(grammarFor(filePath)).parse((index: number) =>
      index < content.length ? content.slice(index, index + CHUNK_SIZE) : null
    );

    const specifiers: string[] = [];
    const nodes = tree.rootNode.descendantsOfType([
      'import_statement',
      'export_statement',
      'call_expression',
    ]);

    for (const node of nodes) {
      const specifier =
        node.type === 'call_expression'
          ? this.extractCallSpecifier(node)
          : this.extractStatementSource(node);
      if (specifier !== null) {
        specifiers.push(specifier);
      }
    }

    logger.debug('Extracted imports', { filePath, imports: specifiers.length });
    return specifiers;
  }

  resolve(specifier: string, fromPath: FilePath, candidates: ReadonlySet<FilePath>): FilePath | undefined {
    if (!isRelativeSpecifier(specifier)) {
      return undefined;
    }

    const base = path.resolve(path.dirname(fromPath), specifier);
    const probes: string[] = [];

    const extension = path.extname(base).toLowerCase();
    if (this.extensions.includes(extension)) {
      probes.push(base);
      const sibling = TYPESCRIPT_SIBLINGS[extension];
      if (sibling) {
        probes.push(base.slice(0, -extension.length) + sibling);
      }
    }

    for (const probe of PROBE_EXTENSIONS) {
      probes.push(base + probe);
    }
    for (const probe of PROBE_EXTENSIONS) {
      probes.push(path.join(base, `index${probe}`));
    }

    return this.firstCandidate(probes, candidates);
  }

  isTestFile(filePath: FilePath): boolean {
    const baseName = path.basename(filePath);
    if (baseName.includes('.test.') || baseName.includes('.spec.')) {
      return true;
    }
    return path.dirname(filePath).split(/[\\/]/).includes('__tests__');
  }

  private getParser(grammar: GrammarName): Parser {
    let parser = this.parsers.get(grammar);
    if (!parser) {
      parser = new Parser();
      switch (grammar) {
        case 'tsx':
          parser.setLanguage(TypeScript.tsx);
          break;
        case 'typescript':
          parser.setLanguage(TypeScript.typescript);
          break;
        default:
          parser.setLanguage(JavaScript);
      }
      this.parsers.set(grammar, parser);
    }
    return parser;
  }

  private extractStatementSource(node: Parser.SyntaxNode): string | null {
    const source = stringLiteralValue(node.childForFieldName('source'));
    if (source !== null) {
      return source;
    }

    // import fs = require('fs')
    const requireClause = node.descendantsOfType('import_require_clause')[0];
    return stringLiteralValue(requireClause?.childForFieldName('source'));
  }

  private extractCallSpecifier(node: Parser.SyntaxNode): string | null {
    const callee = node.childForFieldName('function');
    if (!callee) return null;

    const isRequire = callee.type === 'identifier' && callee.text === 'require';
    const isDynamicImport = callee.type === 'import';
    if (!isRequire && !isDynamicImport) return null;

    const args = node.childForFieldName('arguments');
    return stringLiteralValue(args?.namedChild(0));
  }
}
