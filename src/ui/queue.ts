import PQueue from 'p-queue';
import type { ScreenUpdate } from './types.ts';

/**
 * Runs screen updates one at a time, in the order they were pushed, and
 * redraws after each update that reports a change. Nothing is drawn once the
 * queue is closed.
 */
export class UpdateQueue {
  private readonly queue = new PQueue({ concurrency: 1 });
  private closed = false;

  constructor(
    private readonly render: () => void,
    private readonly onError: (error: unknown) => void,
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  push(update: ScreenUpdate): void {
    this.queue
      .add(() => {
        if (update() && !this.closed) {
          this.render();
        }
      })
      .catch((error: unknown) => this.onError(error));
  }

  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  close(): void {
    this.closed = true;
  }
}
