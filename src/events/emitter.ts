import type { ReaderEvent } from './types.ts';

export type ListenerErrorHandler<TEvent> = (error: unknown, event: TEvent) => void;

function reportListenerError(error: unknown, event: { type: string }): void {
  console.error(`Error in ${event.type} listener:`, error);
}

/**
 * Synchronous fan-out of typed events. A listener that throws is reported and
 * does not stop delivery to the others.
 */
export class EventEmitter<TEvent extends { type: string }> {
  private readonly listeners = new Set<(event: TEvent) => void>();

  constructor(private readonly onListenerError: ListenerErrorHandler<TEvent> = reportListenerError) {}

  get size(): number {
    return this.listeners.size;
  }

  subscribe(listener: (event: TEvent) => void): () => void {
    // Wrapped so the same function can be subscribed twice and removed once
    const entry = (event: TEvent) => listener(event);
    this.listeners.add(entry);
    return () => {
      this.listeners.delete(entry);
    };
  }

  emit(event: TEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.onListenerError(error, event);
      }
    }
  }
}

export const events = new EventEmitter<ReaderEvent>();
