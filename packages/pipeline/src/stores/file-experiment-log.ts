import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { v4 as uuid } from 'uuid';
import type { ExperimentEntry, IExperimentLog, NewExperimentEntry } from '@revloop/core';
import { createLogger, errorMessage } from '@revloop/core';
import { DebouncedJsonWriter } from '../utils/debounced-writer.js';

const log = createLogger('ExperimentLog');

export const EXPERIMENT_LOG_FILE = 'experiment_data.json';

function isEntry(value: unknown): value is ExperimentEntry {
  if (typeof value !== 'object' || value === null) return false;
  return 'id' in value && typeof value.id === 'string'
    && 'itemId' in value && typeof value.itemId === 'string'
    && 'action' in value && typeof value.action === 'string';
}

/**
 * Keeps every collaborator interaction in memory and mirrors the full list
 * to `<logDir>/experiment_data.json`, debounced.
 */
export class FileExperimentLog implements IExperimentLog {
  readonly filePath: string;
  private items: ExperimentEntry[] = [];
  private readonly writer: DebouncedJsonWriter;

  constructor(logDir: string, flushDelayMs = 500) {
    this.filePath = join(logDir, EXPERIMENT_LOG_FILE);
    this.writer = new DebouncedJsonWriter(this.filePath, () => this.items, flushDelayMs);
  }

  /** Pick up entries from a previous run so new ones are appended. */
  async load(): Promise<number> {
    try {
      const parsed: unknown = JSON.parse(await readFile(this.filePath, 'utf-8'));
      if (!Array.isArray(parsed)) {
        log.warn(`Ignoring ${this.filePath}: not a JSON array`);
        return 0;
      }
      const previous = parsed.filter(isEntry);
      this.items = [...previous, ...this.items];
      return previous.length;
    } catch (error) {
      log.debug(`No previous experiment log loaded: ${errorMessage(error)}`);
      return 0;
    }
  }

  record(entry: NewExperimentEntry): ExperimentEntry {
    const full: ExperimentEntry = {
      ...entry,
      id: uuid(),
      timestamp: new Date().toISOString(),
    };
    this.items.push(full);
    this.writer.schedule();
    return full;
  }

  entries(): ExperimentEntry[] {
    return [...this.items];
  }

  async flush(): Promise<void> {
    await this.writer.flushNow();
  }
}
