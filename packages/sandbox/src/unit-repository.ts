import { readdir } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import type { IPathGuard, IRevisionUnitRepository } from '@revloop/core';
import {
  DEFAULT_EXCLUDED_DIRS,
  DEFAULT_EXTENSION,
  VALIDATION_PREFIX,
  createLogger,
  errorMessage,
} from '@revloop/core';

const log = createLogger('RevisionUnitRepository');

export interface RevisionUnitRepositoryOptions {
  extension?: string;
  excludedDirs?: readonly string[];
}

/**
 * Enumerates work items: every file with the configured extension under a
 * root, sorted. Excluded directories are pruned before descending. An
 * unusable root (missing, unreadable, outside the sandbox) lists as empty.
 */
export class RevisionUnitRepository implements IRevisionUnitRepository {
  private readonly extension: string;
  private readonly excluded: ReadonlySet<string>;

  constructor(
    private readonly guard: IPathGuard,
    options: RevisionUnitRepositoryOptions = {},
  ) {
    this.extension = options.extension ?? DEFAULT_EXTENSION;
    this.excluded = new Set(options.excludedDirs ?? DEFAULT_EXCLUDED_DIRS);
  }

  async list(root: string): Promise<string[]> {
    const files: string[] = [];
    try {
      const safeRoot = this.guard.validate(root);
      await this.walk(safeRoot, files, true);
    } catch (error) {
      log.warn(`Error listing files in '${root}': ${errorMessage(error)}`);
      return [];
    }
    return files.sort();
  }

  async listSources(root: string): Promise<string[]> {
    const files = await this.list(root);
    return files.filter((file) => !this.isValidationItem(file));
  }

  isValidationItem(path: string): boolean {
    return basename(path).startsWith(VALIDATION_PREFIX);
  }

  validationPathFor(sourcePath: string): string {
    const ext = extname(sourcePath);
    return join(dirname(sourcePath), `${VALIDATION_PREFIX}${basename(sourcePath, ext)}${ext}`);
  }

  private async walk(dir: string, out: string[], isRoot: boolean): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
      if (isRoot) throw error;
      log.debug(`Skipping unreadable directory '${dir}': ${errorMessage(error)}`);
      return null;
    });
    if (!entries) return;

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (this.excluded.has(entry.name)) continue;
        await this.walk(fullPath, out, false);
      } else if (entry.isFile() && entry.name.endsWith(this.extension)) {
        out.push(fullPath);
      }
    }
  }
}
