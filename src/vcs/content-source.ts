import { readFile } from 'fs/promises';
import path from 'path';
import { ContentReadError, errorMessage } from '../graph/errors';
import { FilePath } from '../graph/types';
import { GitRepository } from './git';

const BINARY_SNIFF_LENGTH = 8000;

/** Where the builder reads file content from: the working tree, a revision, or memory. */
export interface ContentSource {
  read(filePath: FilePath): Promise<string>;
  describe(): string;
}

export function isBinaryContent(content: string): boolean {
  return content.slice(0, BINARY_SNIFF_LENGTH).includes('\u0000');
}

export class FilesystemContentSource implements ContentSource {
  async read(filePath: FilePath): Promise<string> {
    try {
      return await readFile(filePath, 'utf8');
    } catch (error) {
      throw new ContentReadError(filePath, errorMessage(error), { cause: error });
    }
  }

  describe(): string {
    return 'working tree';
  }
}

export class GitRevisionContentSource implements ContentSource {
  constructor(
    private readonly repository: GitRepository,
    private readonly repoRoot: string,
    private readonly revision: string
  ) {}

  async read(filePath: FilePath): Promise<string> {
    const relativePath = path.relative(this.repoRoot, filePath).split(path.sep).join('/');
    if (relativePath === '' || relativePath.startsWith('../') || path.isAbsolute(relativePath)) {
      throw new ContentReadError(filePath, `outside repository ${this.repoRoot}`);
    }

    try {
      return await this.repository.showFile(this.revision, relativePath);
    } catch (error) {
      throw new ContentReadError(filePath, errorMessage(error), { cause: error });
    }
  }

  describe(): string {
    return `revision ${this.revision}`;
  }
}

export class MemoryContentSource implements ContentSource {
  private readonly files: Map<FilePath, string>;

  constructor(entries: Iterable<readonly [FilePath, string]> = []) {
    this.files = new Map(entries);
  }

  static fromRecord(record: { readonly [filePath: string]: string }): MemoryContentSource {
    return new MemoryContentSource(Object.entries(record));
  }

  set(filePath: FilePath, content: string): this {
    this.files.set(filePath, content);
    return this;
  }

  async read(filePath: FilePath): Promise<string> {
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new ContentReadError(filePath, 'no such file');
    }
    return content;
  }

  describe(): string {
    return 'memory';
  }
}
