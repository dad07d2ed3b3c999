import path from 'path';
import pLimit from 'p-limit';
import { ImportResolver, ImportResolverRegistry } from '../parsers/base';
import { createDefaultRegistry } from '../parsers';
import { ContentSource, isBinaryContent } from '../vcs/content-source';
import { DependencyGraph } from './dependency-graph';
import { errorMessage } from './errors';
import { BuildWarning, FilePath } from './types';
import { BuildOptions, BuildResult } from './builder/types';
import { config } from '../utils/config';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('graph-builder');

interface FileOutcome {
  dependencies: FilePath[];
  warning?: BuildWarning;
  unsupported: boolean;
}

/**
 * Builds a closed DependencyGraph from a list of files. Each file is read
 * once, its imports are extracted by the resolver registered for its
 * extension and resolved against the input set only.
 */
export class GraphBuilder {
  private readonly registry: ImportResolverRegistry;
  private readonly maxConcurrency: number;
  private readonly maxFileSize: number;

  constructor(options: BuildOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.maxConcurrency = options.maxConcurrency ?? config.graph.concurrency;
    this.maxFileSize = options.maxFileSize ?? config.graph.maxFileSize;
  }

  async build(filePaths: readonly string[], contentSource: ContentSource): Promise<BuildResult> {
    const files = Array.from(new Set(filePaths.map(filePath => path.resolve(filePath))));
    const candidates: ReadonlySet<FilePath> = new Set(files);
    const startTime = Date.now();

    logger.info('Building dependency graph', {
      files: files.length,
      source: contentSource.describe(),
      concurrency: this.maxConcurrency,
    });

    const limit = pLimit(this.maxConcurrency);
    const outcomes = await Promise.all(
      files.map(filePath => limit(() => this.processFile(filePath, candidates, contentSource)))
    );

    const warnings: BuildWarning[] = [];
    const unsupportedFiles: FilePath[] = [];
    outcomes.forEach((outcome, i) => {
      if (outcome.warning) warnings.push(outcome.warning);
      if (outcome.unsupported) unsupportedFiles.push(files[i]);
    });

    const graph = DependencyGraph.from(
      files.map((filePath, i): [FilePath, FilePath[]] => [filePath, outcomes[i].dependencies])
    );

    if (unsupportedFiles.length > 0) {
      logger.debug('Files without a resolver', {
        extensions: Array.from(new Set(unsupportedFiles.map(file => path.extname(file) || '(none)'))),
      });
    }

    logger.info('Dependency graph built', {
      nodes: graph.size,
      edges: graph.edgeCount,
      warnings: warnings.length,
      unsupported: unsupportedFiles.length,
      duration: Date.now() - startTime,
    });

    return { graph, warnings, unsupportedFiles };
  }

  private async processFile(
    filePath: FilePath,
    candidates: ReadonlySet<FilePath>,
    contentSource: ContentSource
  ): Promise<FileOutcome> {
    const resolver = this.registry.forFile(filePath);
    if (!resolver) {
      return { dependencies: [], unsupported: true };
    }

    let content: string;
    try {
      content = await contentSource.read(filePath);
    } catch (error) {
      return this.degrade(filePath, 'content-read', errorMessage(error));
    }

    const size = Buffer.byteLength(content, 'utf8');
    if (size > this.maxFileSize) {
      return this.degrade(filePath, 'too-large', `File size ${size} exceeds limit of ${this.maxFileSize}`);
    }
    if (isBinaryContent(content)) {
      return this.degrade(filePath, 'content-read', 'File appears to be binary');
    }

    try {
      const specifiers = resolver.extractImports(content, filePath);
      return {
        dependencies: this.resolveAll(resolver, specifiers, filePath, candidates),
        unsupported: false,
      };
    } catch (error) {
      return this.degrade(filePath, 'parse', errorMessage(error));
    }
  }

  private resolveAll(
    resolver: ImportResolver,
    specifiers: readonly string[],
    filePath: FilePath,
    candidates: ReadonlySet<FilePath>
  ): FilePath[] {
    const dependencies = new Set<FilePath>();
    for (const specifier of specifiers) {
      const resolved = resolver.resolve(specifier, filePath, candidates);
      if (resolved !== undefined) {
        dependencies.add(resolved);
      }
    }
    return Array.from(dependencies);
  }

  private degrade(filePath: FilePath, kind: BuildWarning['kind'], message: string): FileOutcome {
    logger.warn('File added without dependencies', { filePath, kind, error: message });
    return { dependencies: [], unsupported: false, warning: { filePath, kind, message } };
  }
}

export async function buildDependencyGraph(
  filePaths: readonly string[],
  contentSource: ContentSource,
  options: BuildOptions = {}
): Promise<BuildResult> {
  return new GraphBuilder(options).build(filePaths, contentSource);
}
