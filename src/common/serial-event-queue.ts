import { Logger } from '@nestjs/common';
import { errorMessage } from './errors';

export type QueueHandler<T> = (item: T) => Promise<void>;

/**
 * FIFO queue drained by exactly one handler call at a time.
 * Producers never wait; a failing handler is logged and the queue moves on.
 */
export class SerialEventQueue<T> {
  private readonly logger: Logger;
  private readonly items: T[] = [];
  private processing = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly handler: QueueHandler<T>,
    name: string = SerialEventQueue.name,
  ) {
    this.logger = new Logger(name);
  }

  get size(): number {
    return this.items.length;
  }

  get busy(): boolean {
    return this.processing;
  }

  push(item: T): void {
    if (this.closed) {
      return;
    }
    this.items.push(item);
    if (!this.processing) {
      // Start on the next tick so producers never run the handler inline
      setImmediate(() => void this.drain());
    }
  }

  /**
   * Stop accepting items and drop anything still waiting
   */
  close(): void {
    this.closed = true;
    this.items.length = 0;
  }

  /**
   * Resolves once every queued item has been handled
   */
  onIdle(): Promise<void> {
    if (!this.processing && this.items.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private async drain(): Promise<void> {
    if (this.processing) {
      return;
    }
    this.processing = true;

    try {
      let item = this.items.shift();
      while (item !== undefined) {
        try {
          await this.handler(item);
        } catch (error) {
          this.logger.error(`Event handler failed: ${errorMessage(error)}`);
        }
        item = this.items.shift();
      }
    } finally {
      this.processing = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }
}
