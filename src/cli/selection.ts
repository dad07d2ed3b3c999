import { FileDiscoveryService } from '../graph/builder/index';
import { DepweaveError } from '../graph/errors';
import { FilePath } from '../graph/types';
import { ImportResolverRegistry } from '../parsers/base';
import {
  ContentSource,
  FilesystemContentSource,
  GitRevisionContentSource,
} from '../vcs/content-source';
import { GitRepository, parseCommitRange } from '../vcs/git';
import { excludePaths, filterByExtensions, isUnderPath } from '../utils/path-filters';
import { PathResolver } from '../utils/path-resolver';
import { createComponentLogger } from '../utils/logger';
import { SelectionOptions } from './options';

const logger = createComponentLogger('cli-selection');

export class FileSelectionError extends DepweaveError {}

export interface SelectionContext {
  resolver: PathResolver;
  repository: GitRepository;
  /** Older end of a commit range. */
  from?: string;
  /** The commit, or the newer end of a range. */
  to?: string;
  isRange: boolean;
}

export type FileSelection =
  | { kind: 'clean' }
  | { kind: 'files'; files: FilePath[]; contentSource: ContentSource };

export interface SelectionDependencies {
  registry: ImportResolverRegistry;
  discovery?: FileDiscoveryService;
}

export async function prepareContext(
  options: SelectionOptions,
  createRepository: (repoPath: string) => GitRepository = repoPath => new GitRepository(repoPath)
): Promise<SelectionContext> {
  const resolver = await PathResolver.create(options.repo, options.allowOutsideRepo);
  const repository = createRepository(resolver.baseDir);

  if (!options.commit) {
    return { resolver, repository, isRange: false };
  }

  const range = parseCommitRange(options.commit);
  if (!range.isRange || range.from === undefined) {
    return { resolver, repository, to: range.to, isRange: false };
  }

  const normalized = await repository.normalizeCommitRange(range.from, range.to);
  if (normalized.swapped) {
    logger.info('Commit range reordered oldest first', normalized);
  }
  return { resolver, repository, from: normalized.from, to: normalized.to, isRange: true };
}

async function collectFiles(
  options: SelectionOptions,
  context: SelectionContext,
  dependencies: SelectionDependencies
): Promise<FilePath[] | undefined> {
  const { resolver, repository } = context;
  const discovery = dependencies.discovery ?? new FileDiscoveryService();
  const expandWorkingTree = async (): Promise<FilePath[]> => {
    const files = await discovery.expandPaths([resolver.baseDir], { registry: dependencies.registry });
    if (files.length === 0) {
      throw new FileSelectionError('No supported files found in working directory');
    }
    return files;
  };

  if (options.input.length > 0) {
    const inputs = await resolver.resolveAll(options.input);
    const files = context.to
      ? (await repository.treeFiles(context.to)).filter(file =>
          inputs.some(input => isUnderPath(file, input))
        )
      : await discovery.expandPaths(inputs, {
          includeUnsupported: true,
          registry: dependencies.registry,
        });
    if (files.length === 0) {
      throw new FileSelectionError('No files found in specified paths');
    }
    return files;
  }

  if (options.between.length > 0) {
    if (context.to) {
      const files = await repository.treeFiles(context.to);
      if (files.length === 0) {
        throw new FileSelectionError(`No files found in commit ${context.to}`);
      }
      return files;
    }
    return expandWorkingTree();
  }

  if (context.to) {
    const files =
      context.isRange && context.from !== undefined
        ? await repository.commitRangeFiles(context.from, context.to)
        : await repository.commitFiles(context.to);
    if (files.length === 0) {
      const scope = context.isRange ? `commit range ${options.commit}` : `commit ${context.to}`;
      throw new FileSelectionError(`No files changed in ${scope}`);
    }
    return files;
  }

  if (options.file !== undefined) {
    return expandWorkingTree();
  }

  const files = await repository.uncommittedFiles();
  return files.length > 0 ? files : undefined;
}

/**
 * Decide which files go into the graph and where their content comes from.
 * A clean working tree with no other selection yields `{ kind: 'clean' }`.
 */
export async function selectFiles(
  options: SelectionOptions,
  context: SelectionContext,
  dependencies: SelectionDependencies
): Promise<FileSelection> {
  const collected = await collectFiles(options, context, dependencies);
  if (!collected) {
    return { kind: 'clean' };
  }

  const excluded = await context.resolver.resolveAll(options.exclude);
  const files = filterByExtensions(excludePaths(collected, excluded), options.includeExt, options.excludeExt);

  const contentSource =
    context.to && options.file === undefined
      ? new GitRevisionContentSource(context.repository, await context.repository.root(), context.to)
      : new FilesystemContentSource();

  logger.debug('Selected files', {
    collected: collected.length,
    selected: files.length,
    source: contentSource.describe(),
  });

  return { kind: 'files', files, contentSource };
}
