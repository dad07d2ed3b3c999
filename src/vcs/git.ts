import simpleGit, { SimpleGit } from 'simple-git';
import { readFile } from 'fs/promises';
import { VcsError, errorMessage } from '../graph/errors';
import { FilePath, FileStats } from '../graph/types';
import { createComponentLogger } from '../utils/logger';
import {
  countLines,
  isDeletedStatus,
  isNewStatus,
  mergeFileStats,
  parseNameStatus,
  parseNumstat,
  parsePorcelainStatus,
  toAbsolutePath,
} from './stats';

const logger = createComponentLogger('git-repository');

export interface CommitRange {
  from?: string;
  to: string;
  isRange: boolean;
}

export interface NormalizedRange {
  from: string;
  to: string;
  swapped: boolean;
}

/** Split `a...b` or `a..b`; anything else names a single commit. */
export function parseCommitRange(spec: string): CommitRange {
  for (const separator of ['...', '..']) {
    const index = spec.indexOf(separator);
    if (index !== -1) {
      return {
        from: spec.slice(0, index),
        to: spec.slice(index + separator.length),
        isRange: true,
      };
    }
  }
  return { to: spec, isRange: false };
}

export function validateGitRef(ref: string): void {
  if (ref.trim() === '') {
    throw new VcsError('Git revision must not be empty');
  }
  if (ref.startsWith('-')) {
    throw new VcsError(`Invalid git revision: ${ref}`);
  }
}

function nonEmptyLines(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

export class GitRepository {
  private readonly git: SimpleGit;
  private rootPath?: string;

  constructor(private readonly repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  static async open(repoPath: string): Promise<GitRepository> {
    const repository = new GitRepository(repoPath);
    const isRepo = await repository.git.checkIsRepo();
    if (!isRepo) {
      throw new VcsError(`${repoPath} is not a git repository (use 'git init' to initialize)`);
    }
    return repository;
  }

  async root(): Promise<string> {
    if (!this.rootPath) {
      this.rootPath = (await this.run(['rev-parse', '--show-toplevel'])).trim();
    }
    return this.rootPath;
  }

  async currentCommitHash(): Promise<string> {
    return this.shortHash('HEAD');
  }

  async shortHash(revision: string): Promise<string> {
    validateGitRef(revision);
    return (await this.run(['rev-parse', '--short', revision])).trim();
  }

  async hasUncommittedChanges(): Promise<boolean> {
    const output = await this.run(['status', '--porcelain']);
    return output.trim() !== '';
  }

  async rangeLabel(from: string, to: string): Promise<string> {
    const [fromShort, toShort] = await Promise.all([this.shortHash(from), this.shortHash(to)]);
    return `${fromShort}...${toShort}`;
  }

  async uncommittedFiles(): Promise<FilePath[]> {
    const statuses = parsePorcelainStatus(
      await this.run(['status', '--porcelain', '--untracked-files=all'])
    );
    const files = Array.from(statuses)
      .filter(([, status]) => !isDeletedStatus(status))
      .map(([filePath]) => filePath);
    return this.absolute(files);
  }

  async commitFiles(revision: string): Promise<FilePath[]> {
    validateGitRef(revision);
    const output = await this.run([
      'diff-tree',
      '--no-commit-id',
      '--name-only',
      '-r',
      '--root',
      '--diff-filter=d',
      revision,
    ]);
    return this.absolute(nonEmptyLines(output));
  }

  async commitRangeFiles(from: string, to: string): Promise<FilePath[]> {
    validateGitRef(from);
    validateGitRef(to);
    const output = await this.run(['diff', '--name-only', '--diff-filter=d', from, to]);
    return this.absolute(nonEmptyLines(output));
  }

  async treeFiles(revision: string): Promise<FilePath[]> {
    validateGitRef(revision);
    const output = await this.run(['ls-tree', '-r', '--name-only', revision]);
    return this.absolute(nonEmptyLines(output));
  }

  async uncommittedStats(): Promise<Map<FilePath, FileStats>> {
    const root = await this.root();
    const [numstat, status] = await Promise.all([
      this.run(['diff', '--numstat', 'HEAD']),
      this.run(['status', '--porcelain', '--untracked-files=all']),
    ]);
    const statuses = parsePorcelainStatus(status);
    const stats = mergeFileStats(root, parseNumstat(numstat), statuses);

    // Untracked files are invisible to diff, count their lines instead
    for (const [relativePath, code] of statuses) {
      if (!isNewStatus(code)) continue;
      const absolutePath = toAbsolutePath(root, relativePath);
      const existing = stats.get(absolutePath);
      if (!existing || existing.additions > 0 || existing.deletions > 0) continue;

      try {
        const content = await readFile(absolutePath, 'utf8');
        stats.set(absolutePath, { ...existing, additions: countLines(content) });
      } catch (error) {
        logger.debug('Could not count lines of untracked file', {
          filePath: absolutePath,
          error: errorMessage(error),
        });
      }
    }

    return stats;
  }

  async commitStats(revision: string): Promise<Map<FilePath, FileStats>> {
    validateGitRef(revision);
    const root = await this.root();
    const [numstat, nameStatus] = await Promise.all([
      this.run(['show', '--numstat', '--format=', revision]),
      this.run(['show', '--name-status', '--format=', revision]),
    ]);
    return mergeFileStats(root, parseNumstat(numstat), parseNameStatus(nameStatus));
  }

  async commitRangeStats(from: string, to: string): Promise<Map<FilePath, FileStats>> {
    validateGitRef(from);
    validateGitRef(to);
    const root = await this.root();
    const [numstat, nameStatus] = await Promise.all([
      this.run(['diff', '--numstat', from, to]),
      this.run(['diff', '--name-status', from, to]),
    ]);
    return mergeFileStats(
      root,
      parseNumstat(numstat),
      parseNameStatus(nameStatus),
      status => status === 'A'
    );
  }

  /** True when `ancestor` is reachable from `descendant` (or equal to it). */
  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    validateGitRef(ancestor);
    validateGitRef(descendant);
    try {
      const [mergeBase, ancestorHash] = await Promise.all([
        this.run(['merge-base', ancestor, descendant]),
        this.run(['rev-parse', ancestor]),
      ]);
      return mergeBase.trim() !== '' && mergeBase.trim() === ancestorHash.trim();
    } catch (error) {
      // Unrelated histories have no merge base
      logger.debug('No merge base found', { ancestor, descendant, error: errorMessage(error) });
      return false;
    }
  }

  /** Order a range oldest first. Ranges across diverged branches are kept as given. */
  async normalizeCommitRange(from: string, to: string): Promise<NormalizedRange> {
    if (await this.isAncestor(from, to)) {
      return { from, to, swapped: false };
    }
    if (await this.isAncestor(to, from)) {
      return { from: to, to: from, swapped: true };
    }
    return { from, to, swapped: false };
  }

  async showFile(revision: string, relativePath: string): Promise<string> {
    validateGitRef(revision);
    if (relativePath.startsWith('-') || relativePath.split('/').includes('..')) {
      throw new VcsError(`Invalid repository path: ${relativePath}`);
    }
    return this.run(['show', `${revision}:${relativePath}`]);
  }

  private async absolute(relativePaths: readonly string[]): Promise<FilePath[]> {
    const root = await this.root();
    return Array.from(new Set(relativePaths.map(file => toAbsolutePath(root, file)))).sort();
  }

  private async run(args: string[]): Promise<string> {
    try {
      return await this.git.raw(args);
    } catch (error) {
      const message = errorMessage(error).trim();
      logger.debug('Git command failed', { args, repoPath: this.repoPath, error: message });
      throw new VcsError(`git ${args[0]} failed: ${message}`, { cause: error });
    }
  }
}
