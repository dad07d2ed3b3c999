import { realpath } from 'fs/promises';
import path from 'path';
import { DepweaveError } from '../graph/errors';
import { FilePath } from '../graph/types';

export class PathResolutionError extends DepweaveError {}

async function resolveSymlinks(filePath: string): Promise<string> {
  try {
    return await realpath(filePath);
  } catch {
    // Paths that do not exist yet are compared as written
    return filePath;
  }
}

export async function isWithinBase(baseDir: string, targetPath: string): Promise<boolean> {
  const base = await resolveSymlinks(path.resolve(baseDir));
  const target = await resolveSymlinks(path.resolve(targetPath));
  const relative = path.relative(base, target);
  if (relative === '') return true;
  if (relative === '..' || relative.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(relative);
}

/**
 * Resolves user-supplied paths against a repository directory, refusing
 * paths outside it unless explicitly allowed.
 */
export class PathResolver {
  private constructor(
    readonly baseDir: FilePath,
    private readonly allowOutside: boolean
  ) {}

  static async create(baseDir = '.', allowOutside = false): Promise<PathResolver> {
    const absolute = await resolveSymlinks(path.resolve(baseDir || '.'));
    return new PathResolver(absolute, allowOutside);
  }

  async resolve(rawPath: string): Promise<FilePath> {
    if (rawPath.trim() === '') {
      throw new PathResolutionError('Path cannot be empty');
    }

    const absolute = path.isAbsolute(rawPath)
      ? path.normalize(rawPath)
      : path.resolve(this.baseDir, rawPath);

    if (!this.allowOutside && !(await isWithinBase(this.baseDir, absolute))) {
      throw new PathResolutionError(`Path must be within repository: "${rawPath}"`);
    }
    return absolute;
  }

  async resolveAll(rawPaths: readonly string[]): Promise<FilePath[]> {
    return Promise.all(rawPaths.map(rawPath => this.resolve(rawPath)));
  }
}
