import { FilePath } from './types';

export class DepweaveError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A dependency list referenced a path that is not a node of the graph.
 * Indicates a resolver defect; a build that hits this rejects as a whole.
 */
export class GraphClosureError extends DepweaveError {
  readonly from: FilePath;
  readonly to: FilePath;

  constructor(from: FilePath, to: FilePath) {
    super(`Dependency graph is not closed: ${from} depends on ${to}, which is not a node`);
    this.from = from;
    this.to = to;
  }
}

export class ContentReadError extends DepweaveError {
  readonly filePath: FilePath;

  constructor(filePath: FilePath, message: string, options?: ErrorOptions) {
    super(`Failed to read ${filePath}: ${message}`, options);
    this.filePath = filePath;
  }
}

export class QueryValidationError extends DepweaveError {}

export class ResolverRegistrationError extends DepweaveError {}

export class VcsError extends DepweaveError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
