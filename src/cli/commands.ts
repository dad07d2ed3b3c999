import chalk from 'chalk';
import path from 'path';
import { GraphBuilder } from '../graph/builder';
import { BuildResult } from '../graph/builder/types';
import { analyzeCycles } from '../graph/cycle-analyzer';
import { DependencyGraph } from '../graph/dependency-graph';
import { errorMessage } from '../graph/errors';
import { newFileDependencyGraph } from '../graph/file-dependency-graph';
import { buildNodeNames } from '../graph/node-names';
import {
  filterByLevel,
  findPathNodes,
  validateBetweenQuery,
  validateLevelQuery,
} from '../graph/structural-queries';
import { FilePath, FileStats } from '../graph/types';
import { createFormatter } from '../formatters';
import { ImportResolverRegistry } from '../parsers/base';
import { createTestFileClassifier } from '../parsers/test-classifier';
import { createComponentLogger } from '../utils/logger';
import { CyclesOptions, SelectionOptions, ShowOptions } from './options';
import {
  FileSelectionError,
  SelectionContext,
  SelectionDependencies,
  prepareContext,
  selectFiles,
} from './selection';
import { GitRepository } from '../vcs/git';

const logger = createComponentLogger('cli-commands');

export interface CommandIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

/** Progress indicator shown while the graph is built. */
export interface Progress {
  start(text: string): void;
  stop(): void;
}

export interface CommandEnvironment {
  io: CommandIO;
  registry: ImportResolverRegistry;
  progress?: Progress;
  discovery?: SelectionDependencies['discovery'];
  createRepository?: (repoPath: string) => GitRepository;
}

export interface SelectedGraph {
  graph: DependencyGraph;
  build: BuildResult;
  context: SelectionContext;
}

export const CLEAN_TREE_GUIDANCE = [
  'Working directory is clean (no uncommitted changes).',
  '',
  'To visualize the most recent commit:',
  '  depweave show -c HEAD',
  '',
  'To visualize a specific commit:',
  '  depweave show -c <commit-hash>',
].join('\n');

function reportBuildWarnings(build: BuildResult, io: CommandIO): void {
  if (build.warnings.length === 0) return;

  io.stderr(
    chalk.yellow(
      `Warning: ${build.warnings.length} file(s) could not be analyzed and appear without dependencies:`
    )
  );
  for (const warning of build.warnings) {
    io.stderr(chalk.yellow(`  ${warning.filePath} (${warning.kind}): ${warning.message}`));
  }
}

/**
 * Selects files, builds the graph and applies the --file or --between query.
 * Returns undefined when there is nothing to show.
 */
export async function buildSelectedGraph(
  options: SelectionOptions,
  env: CommandEnvironment
): Promise<SelectedGraph | undefined> {
  const context = await prepareContext(options, env.createRepository);
  const selection = await selectFiles(options, context, {
    registry: env.registry,
    discovery: env.discovery,
  });

  if (selection.kind === 'clean') {
    env.io.stdout(CLEAN_TREE_GUIDANCE);
    return undefined;
  }
  if (selection.files.length === 0) {
    throw new FileSelectionError('No files left after applying filters');
  }

  env.progress?.start(`Building dependency graph from ${selection.files.length} file(s)...`);
  let build: BuildResult;
  try {
    build = await new GraphBuilder({ registry: env.registry }).build(
      selection.files,
      selection.contentSource
    );
  } finally {
    env.progress?.stop();
  }

  reportBuildWarnings(build, env.io);

  let graph = build.graph;

  if (options.file !== undefined) {
    const target = await context.resolver.resolve(options.file);
    validateLevelQuery(graph, target, options.level);
    graph = filterByLevel(graph, target, options.level);
  }

  if (options.between.length > 0) {
    const targets = await context.resolver.resolveAll(options.between);
    validateBetweenQuery(graph, targets);
    graph = findPathNodes(graph, targets);
  }

  return { graph, build, context };
}

async function collectFileStats(
  options: SelectionOptions,
  context: SelectionContext,
  io: CommandIO
): Promise<Map<FilePath, FileStats> | undefined> {
  try {
    if (context.to === undefined) {
      return await context.repository.uncommittedStats();
    }
    if (context.isRange && context.from !== undefined) {
      return await context.repository.commitRangeStats(context.from, context.to);
    }
    return await context.repository.commitStats(context.to);
  } catch (error) {
    logger.warn('Failed to collect file statistics', { error: errorMessage(error), commit: options.commit });
    io.stderr(chalk.yellow(`Warning: failed to get file statistics: ${errorMessage(error)}`));
    return undefined;
  }
}

export function repoLabelName(repoPath: string): string {
  const name = path.basename(path.resolve(repoPath));
  return name === '' || name === '.' || name === path.sep ? 'repo' : name;
}

export function formatFileCount(count: number): string {
  return count === 1 ? '1 file' : `${count} files`;
}

export async function buildGraphLabel(context: SelectionContext, fileCount: number): Promise<string | undefined> {
  const { repository } = context;
  try {
    let commitLabel: string;
    if (context.to === undefined) {
      commitLabel = await repository.currentCommitHash();
      if (await repository.hasUncommittedChanges()) {
        commitLabel += '-dirty';
      }
    } else if (context.isRange && context.from !== undefined) {
      commitLabel = await repository.rangeLabel(context.from, context.to);
    } else {
      commitLabel = await repository.shortHash(context.to);
    }

    return `${repoLabelName(context.resolver.baseDir)} • ${commitLabel} • ${formatFileCount(fileCount)}`;
  } catch (error) {
    logger.debug('Graph label unavailable', { error: errorMessage(error) });
    return undefined;
  }
}

export async function runShow(options: ShowOptions, env: CommandEnvironment): Promise<number> {
  const selected = await buildSelectedGraph(options, env);
  if (!selected) {
    return 0;
  }

  const { graph, context } = selected;
  const decorated = options.format === 'dot' || options.format === 'mermaid';
  const stats = decorated ? await collectFileStats(options, context, env.io) : undefined;
  const label = decorated ? await buildGraphLabel(context, graph.size) : undefined;

  const fileGraph = newFileDependencyGraph(graph, stats, createTestFileClassifier(env.registry));
  const formatter = createFormatter(options.format);
  const output = formatter.format(fileGraph, { label });

  if (options.url) {
    const url = formatter.generateUrl(output);
    if (url) {
      env.io.stdout(url);
      return 0;
    }
    env.io.stderr(chalk.yellow(`Warning: URL generation is not supported for ${options.format} format\n`));
  }

  env.io.stdout(output);
  return 0;
}

export async function runCycles(options: CyclesOptions, env: CommandEnvironment): Promise<number> {
  const selected = await buildSelectedGraph(options, env);
  if (!selected) {
    return 0;
  }

  const { cycles } = analyzeCycles(selected.graph);
  if (cycles.length === 0) {
    env.io.stdout('No cycles found.');
    return 0;
  }

  const names = buildNodeNames(selected.graph.sortedNodes());
  const lines = [`Found ${cycles.length} cycle(s):`];
  cycles.forEach((cycle, i) => {
    const members = [...cycle.path, cycle.path[0]].map(member => names.get(member) ?? member);
    lines.push(`C${i + 1}: ${members.join(' -> ')}`);
  });
  env.io.stdout(lines.join('\n'));

  return options.failOnCycle ? 2 : 0;
}

export function runLanguages(registry: ImportResolverRegistry, json: boolean, io: CommandIO): number {
  const languages = registry.all().map(resolver => ({
    language: resolver.language,
    extensions: [...resolver.extensions],
  }));

  if (json) {
    io.stdout(JSON.stringify(languages, null, 2));
  } else {
    io.stdout(languages.map(entry => `${entry.language}: ${entry.extensions.join(', ')}`).join('\n'));
  }
  return 0;
}
