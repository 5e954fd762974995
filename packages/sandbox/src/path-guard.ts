import { isAbsolute, parse, relative, resolve, sep } from 'node:path';
import type { IPathGuard } from '@revloop/core';
import { SandboxViolation } from '@revloop/core';

/**
 * Confines paths to a root directory. Containment is decided per path
 * segment with `path.relative`, so `/sandbox-evil` is not inside `/sandbox`
 * while `/sandbox/..notes` is. Paths are compared lexically; symlinks are
 * not followed.
 */
export class PathGuard implements IPathGuard {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  validate(path: string): string {
    if (path.includes('\0')) {
      throw new SandboxViolation(path, this.root);
    }

    const absolute = resolve(path);
    if (!sameFilesystemRoot(absolute, this.root)) {
      throw new SandboxViolation(path, this.root, 'different-root');
    }

    const rel = relative(this.root, absolute);
    if (rel === '') return absolute;
    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new SandboxViolation(path, this.root);
    }
    return absolute;
  }

  contains(path: string): boolean {
    try {
      this.validate(path);
      return true;
    } catch (error) {
      if (error instanceof SandboxViolation) return false;
      throw error;
    }
  }
}

function sameFilesystemRoot(a: string, b: string): boolean {
  const rootA = parse(a).root;
  const rootB = parse(b).root;
  // Drive letters are case-insensitive on Windows
  return process.platform === 'win32'
    ? rootA.toLowerCase() === rootB.toLowerCase()
    : rootA === rootB;
}
