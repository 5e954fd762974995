import type {
  BatchItemResult,
  BatchItemStatus,
  BatchReport,
  IConfinedFileStore,
  IEventBus,
} from '@revloop/core';
import { Events, createLogger, errorMessage, isTerminalStatus } from '@revloop/core';
import type { RevisionMachine } from './revision-machine.js';

const log = createLogger('BatchRunner');

export interface BatchRunOptions {
  signal?: AbortSignal;
}

export function summarizeBatch(items: readonly BatchItemResult[]): BatchReport {
  const counts: Record<BatchItemStatus, number> = {
    success: 0,
    max_iterations: 0,
    abandoned: 0,
    error: 0,
    skipped: 0,
  };
  for (const item of items) counts[item.status] += 1;
  return { items, counts, total: items.length };
}

/**
 * Runs the revision machine over a list of work items. Items are isolated:
 * one item's fault is reported as `error` and the batch carries on. Up to
 * `concurrency` items are in flight at once; results keep input order.
 */
export class BatchRunner {
  constructor(
    private readonly machine: RevisionMachine,
    private readonly store: IConfinedFileStore,
    private readonly eventBus: IEventBus,
    private readonly concurrency = 1,
  ) {}

  async run(itemIds: readonly string[], options: BatchRunOptions = {}): Promise<BatchReport> {
    const results = new Array<BatchItemResult>(itemIds.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < itemIds.length) {
        const index = next++;
        const result = await this.processItem(itemIds[index], options.signal);
        results[index] = result;
        this.eventBus.emit(Events.BATCH_ITEM_FINISHED, { result });
      }
    };

    const workers = Math.max(1, Math.min(this.concurrency, itemIds.length));
    log.info(`Processing ${itemIds.length} item(s) with ${workers} worker(s)`);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    const report = summarizeBatch(results);
    log.info('Batch complete', report.counts);
    this.eventBus.emit(Events.BATCH_COMPLETED, { report });
    return report;
  }

  private async processItem(itemId: string, signal: AbortSignal | undefined): Promise<BatchItemResult> {
    const content = await this.store.read(itemId);
    if (!content) {
      log.warn('Skipping: empty or unreadable file', undefined, itemId);
      return { itemId, status: 'skipped', iterations: 0, reason: 'empty_or_unreadable' };
    }

    try {
      const state = await this.machine.run(itemId, content, { signal });
      if (!isTerminalStatus(state.status)) {
        throw new Error(`Revision stopped in non-terminal status '${state.status}'`);
      }
      return { itemId, status: state.status, iterations: state.iteration };
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Error processing item: ${message}`, undefined, itemId);
      return { itemId, status: 'error', iterations: 0, error: message };
    }
  }
}
