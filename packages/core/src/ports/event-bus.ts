export type EventHandler = (payload: unknown) => void;

export interface IEventBus {
  emit(event: string, payload: unknown): void;
  /** Subscribe; returns the unsubscribe function */
  on(event: string, handler: EventHandler): () => void;
  once(event: string, handler: EventHandler): () => void;
  removeAllListeners(event?: string): void;
}
