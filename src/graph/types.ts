/**
 * Type definitions shared by the dependency-graph engine
 */

/** Absolute, normalized file path. The only node identity in a graph. */
export type FilePath = string;

export interface FileEdge {
  readonly from: FilePath;
  readonly to: FilePath;
}

/**
 * One strongly connected component with more than one node, or a single
 * node that depends on itself. Starts at the lexicographically smallest member.
 */
export interface Cycle {
  readonly path: readonly FilePath[];
}

export interface EdgeMetadata {
  readonly inCycle: boolean;
}

export interface FileStats {
  readonly additions: number;
  readonly deletions: number;
  readonly isNew: boolean;
}

export interface FileMetadata {
  readonly isTest: boolean;
  readonly inCycle: boolean;
  readonly extension: string;
  readonly stats?: FileStats;
}

export interface TestFileClassifier {
  isTestFile(filePath: FilePath): boolean;
}

export type BuildWarningKind = 'content-read' | 'too-large' | 'parse';

export interface BuildWarning {
  readonly filePath: FilePath;
  readonly kind: BuildWarningKind;
  readonly message: string;
}
