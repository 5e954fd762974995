import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { v4 as uuid } from 'uuid';
import { createLogger, errorMessage } from '@revloop/core';

const log = createLogger('DebouncedJsonWriter');

/**
 * Mirrors a JSON snapshot to one file. Scheduled writes are debounced on the
 * trailing edge; every write, deferred or forced, goes through a single
 * promise chain so two writes to the file never overlap. Each write reads
 * the snapshot when it starts, so a queued write always carries the latest
 * data.
 */
export class DebouncedJsonWriter {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly snapshot: () => unknown,
    private readonly delayMs: number = 500,
  ) {}

  /** Resets the timer on each call */
  schedule(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.enqueue().catch((error: unknown) => {
        log.error(`Deferred write of ${this.filePath} failed: ${errorMessage(error)}`);
      });
    }, this.delayMs);
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Write now, after any write already in flight; drops the pending timer. */
  async flushNow(): Promise<void> {
    this.cancel();
    await this.enqueue();
  }

  get pending(): boolean {
    return this.timer !== null;
  }

  private enqueue(): Promise<void> {
    const write = this.queue.then(() => writeJsonFileAtomic(this.filePath, this.snapshot()));
    // The caller of this write gets its error; later writes still run
    this.queue = write.catch(() => undefined);
    return write;
  }
}

/** Indented JSON written to a temporary sibling, then renamed over the target. */
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${uuid().slice(0, 8)}.tmp`;
  try {
    await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      log.debug(`Could not remove ${tempPath}: ${errorMessage(cleanupError)}`);
    });
    throw error;
  }
}
