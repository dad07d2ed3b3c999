/**
 * depweave - file-level dependency graphs with cycle detection and
 * structural queries.
 *
 * Library entry point. The command line lives in ./cli.
 */

export * from './graph';
export * from './parsers';
export * from './formatters';
export {
  ContentSource,
  FilesystemContentSource,
  GitRevisionContentSource,
  MemoryContentSource,
  isBinaryContent,
} from './vcs/content-source';
export { CommitRange, GitRepository, parseCommitRange, validateGitRef } from './vcs/git';
export {
  NumstatEntry,
  mergeFileStats,
  parseNameStatus,
  parseNumstat,
  parsePorcelainStatus,
  resolveRenamedPath,
} from './vcs/stats';
export { PathResolutionError, PathResolver } from './utils/path-resolver';
export { excludePaths, filterByExtensions, isUnderPath, normalizeExtension } from './utils/path-filters';
export { config } from './utils/config';
export { logger, createComponentLogger } from './utils/logger';
