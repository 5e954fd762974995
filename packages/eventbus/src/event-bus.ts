import type { EventHandler, IEventBus } from '@revloop/core';
import { createLogger, errorMessage } from '@revloop/core';

const log = createLogger('EventBus');

/**
 * Synchronous in-process event bus. A throwing handler is logged and does
 * not stop delivery to the remaining handlers.
 */
export class EventBus implements IEventBus {
  private handlers = new Map<string, Set<EventHandler>>();

  emit(event: string, payload: unknown): void {
    const set = this.handlers.get(event);
    if (!set) return;
    // Snapshot so once-handlers can unsubscribe mid-dispatch
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        log.error(`Error in handler for "${event}": ${errorMessage(error)}`);
      }
    }
  }

  on(event: string, handler: EventHandler): () => void {
    let set = this.handlers.get(event);
    if (!set) {
      set = new Set();
      this.handlers.set(event, set);
    }
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  once(event: string, handler: EventHandler): () => void {
    const unsubscribe = this.on(event, (payload) => {
      unsubscribe();
      handler(payload);
    });
    return unsubscribe;
  }

  removeAllListeners(event?: string): void {
    if (event === undefined) {
      this.handlers.clear();
    } else {
      this.handlers.delete(event);
    }
  }

  listenerCount(event: string): number {
    return this.handlers.get(event)?.size ?? 0;
  }
}
