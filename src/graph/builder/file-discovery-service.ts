import fs from 'fs/promises';
import path from 'path';
import { createDefaultRegistry } from '../../parsers';
import { errorMessage } from '../errors';
import { FilePath } from '../types';
import { DiscoveryOptions } from './types';
import { createComponentLogger } from '../../utils/logger';

const logger = createComponentLogger('file-discovery-service');

export const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set([
  '.git',
  'node_modules',
  'dist',
  'build',
  'coverage',
  '.dart_tool',
  '__pycache__',
  '.venv',
]);

/**
 * Turns user-supplied files and directories into the flat file list the
 * graph builder takes.
 */
export class FileDiscoveryService {
  async expandPaths(paths: readonly string[], options: DiscoveryOptions = {}): Promise<FilePath[]> {
    const registry = options.registry ?? createDefaultRegistry();
    const files = new Set<FilePath>();
    const visitedDirectories = new Set<string>();

    const keep = (filePath: string): boolean =>
      options.includeUnsupported === true || registry.supportsExtension(path.extname(filePath));

    const traverse = async (currentPath: string, isRoot = false): Promise<void> => {
      const lstats = await fs.lstat(currentPath);

      if (lstats.isSymbolicLink()) {
        try {
          await fs.stat(currentPath);
        } catch (symlinkError) {
          logger.debug('Skipping broken symlink', { path: currentPath, error: errorMessage(symlinkError) });
          return;
        }
      }

      const stats = lstats.isSymbolicLink() ? await fs.stat(currentPath) : lstats;

      if (stats.isDirectory()) {
        if (!isRoot && this.shouldSkipDirectory(path.basename(currentPath))) {
          return;
        }
        // Symlinked directories may point back up the tree
        const realPath = await fs.realpath(currentPath);
        if (visitedDirectories.has(realPath)) {
          return;
        }
        visitedDirectories.add(realPath);
        const entries = await fs.readdir(currentPath);
        await Promise.all(entries.map(entry => traverse(path.join(currentPath, entry))));
      } else if (stats.isFile() && keep(currentPath)) {
        files.add(currentPath);
      }
    };

    for (const input of paths) {
      const absolute = path.resolve(input);
      const stats = await fs.stat(absolute);
      if (stats.isDirectory()) {
        await traverse(absolute, true);
      } else {
        // Explicitly named files are kept whatever their extension
        files.add(absolute);
      }
    }

    const result = Array.from(files).sort();

    const extensionStats: Record<string, number> = {};
    for (const file of result) {
      const ext = path.extname(file) || '(none)';
      extensionStats[ext] = (extensionStats[ext] || 0) + 1;
    }
    logger.info('File discovery completed', { totalFiles: result.length, extensionStats });

    return result;
  }

  shouldSkipDirectory(dirName: string): boolean {
    return SKIPPED_DIRECTORIES.has(dirName);
  }
}
