import { access, mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { v4 as uuid } from 'uuid';
import type { IConfinedFileStore, IPathGuard, WriteOutcome } from '@revloop/core';
import { SandboxViolation, createLogger, errorMessage } from '@revloop/core';

const log = createLogger('ConfinedFileStore');

/**
 * Text file access restricted to the guard's root.
 *
 * Reads never throw. Any failure, including invalid UTF-8 and sandbox
 * violations, yields `''` and a warning in the log. Writes go to a temporary sibling
 * and are renamed over the target.
 */
export class ConfinedFileStore implements IConfinedFileStore {
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(private readonly guard: IPathGuard) {}

  async read(path: string): Promise<string> {
    try {
      const safePath = this.guard.validate(path);
      const bytes = await readFile(safePath);
      return this.decoder.decode(bytes);
    } catch (error) {
      log.warn(`Error reading file '${path}': ${errorMessage(error)}`);
      return '';
    }
  }

  async write(path: string, content: string): Promise<WriteOutcome> {
    let safePath: string;
    try {
      safePath = this.guard.validate(path);
    } catch (error) {
      if (!(error instanceof SandboxViolation)) throw error;
      log.warn(error.message);
      return { ok: false, kind: 'sandbox', error: error.message };
    }

    const tempPath = `${safePath}.${uuid().slice(0, 8)}.tmp`;
    try {
      await mkdir(dirname(safePath), { recursive: true });
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, safePath);
      return { ok: true, path: safePath };
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        log.debug(`Temp file not removed: ${errorMessage(cleanupError)}`);
      });
      const message = `Error writing file '${path}': ${errorMessage(error)}`;
      log.warn(message);
      return { ok: false, kind: 'io', error: message };
    }
  }

  async exists(path: string): Promise<boolean> {
    if (!this.guard.contains(path)) return false;
    try {
      await access(this.guard.validate(path));
      return true;
    } catch {
      return false;
    }
  }
}
