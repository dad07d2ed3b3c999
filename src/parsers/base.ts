import path from 'path';
import { ResolverRegistrationError } from '../graph/errors';
import { FilePath } from '../graph/types';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('resolver-registry');

/**
 * Per-language import extraction and resolution. The graph builder only
 * depends on this interface.
 */
export interface ImportResolver {
  readonly language: string;
  /** Lower-case, dotted extensions handled by this resolver. */
  readonly extensions: readonly string[];
  extractImports(content: string, filePath: FilePath): string[];
  /** Resolve a specifier to one of `candidates`, or undefined when external. */
  resolve(specifier: string, fromPath: FilePath, candidates: ReadonlySet<FilePath>): FilePath | undefined;
  isTestFile(filePath: FilePath): boolean;
}

export abstract class BaseImportResolver implements ImportResolver {
  abstract readonly language: string;
  abstract readonly extensions: readonly string[];

  abstract extractImports(content: string, filePath: FilePath): string[];
  abstract resolve(
    specifier: string,
    fromPath: FilePath,
    candidates: ReadonlySet<FilePath>
  ): FilePath | undefined;
  abstract isTestFile(filePath: FilePath): boolean;

  canResolveFile(filePath: FilePath): boolean {
    return this.extensions.includes(path.extname(filePath).toLowerCase());
  }

  protected firstCandidate(
    paths: readonly string[],
    candidates: ReadonlySet<FilePath>
  ): FilePath | undefined {
    for (const candidate of paths) {
      const normalized = path.resolve(candidate);
      if (candidates.has(normalized)) {
        return normalized;
      }
    }
    return undefined;
  }

  /** File name without any of this resolver's extensions. */
  protected stem(filePath: FilePath): string {
    const baseName = path.basename(filePath);
    const extension = path.extname(baseName);
    return this.extensions.includes(extension.toLowerCase())
      ? baseName.slice(0, -extension.length)
      : baseName;
  }

  protected stripComments(line: string, marker: string): string {
    const index = line.indexOf(marker);
    return index === -1 ? line : line.slice(0, index);
  }
}

export class ImportResolverRegistry {
  private readonly byExtension = new Map<string, ImportResolver>();
  private readonly resolvers: ImportResolver[] = [];

  register(resolver: ImportResolver): this {
    for (const extension of resolver.extensions) {
      const key = extension.toLowerCase();
      if (!key.startsWith('.')) {
        throw new ResolverRegistrationError(
          `Extension "${extension}" of ${resolver.language} resolver must start with a dot`
        );
      }
      const existing = this.byExtension.get(key);
      if (existing) {
        throw new ResolverRegistrationError(
          `Extension ${key} is already handled by the ${existing.language} resolver`
        );
      }
    }

    for (const extension of resolver.extensions) {
      this.byExtension.set(extension.toLowerCase(), resolver);
    }
    this.resolvers.push(resolver);

    logger.debug('Registered import resolver', {
      language: resolver.language,
      extensions: resolver.extensions,
    });
    return this;
  }

  forExtension(extension: string): ImportResolver | undefined {
    return this.byExtension.get(extension.toLowerCase());
  }

  forFile(filePath: FilePath): ImportResolver | undefined {
    return this.forExtension(path.extname(filePath));
  }

  supportsExtension(extension: string): boolean {
    return this.byExtension.has(extension.toLowerCase());
  }

  /** Languages in registration order. */
  languages(): string[] {
    return this.resolvers.map(resolver => resolver.language);
  }

  all(): readonly ImportResolver[] {
    return this.resolvers;
  }

  supportedExtensions(): string[] {
    return Array.from(this.byExtension.keys()).sort();
  }
}
