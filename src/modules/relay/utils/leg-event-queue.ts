/**
 * Leg Event Queue
 * Runs one handler at a time, in arrival order, for a single leg.
 * Stopping the queue drops what is still waiting; the running handler finishes.
 */

import type { Logger } from '@/shared/utils';

export class LegEventQueue<T> {
  private items: T[] = [];
  private processing = false;
  private stopped = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    // eslint-disable-next-line no-unused-vars
    private readonly handler: (item: T) => Promise<void>,
    private readonly maxSize: number,
    private readonly log: Logger
  ) {}

  /**
   * @returns false when the queue is stopped or full
   */
  push(item: T): boolean {
    if (this.stopped) {
      return false;
    }

    if (this.maxSize > 0 && this.items.length >= this.maxSize) {
      this.log.warn('Leg event queue full - dropping event', {
        queueSize: this.items.length,
        maxQueueSize: this.maxSize,
      });
      return false;
    }

    this.items.push(item);
    void this.drain();
    return true;
  }

  /**
   * Stop accepting events and drop pending ones
   * @returns number of dropped events
   */
  stop(): number {
    this.stopped = true;
    const dropped = this.items.length;
    this.items = [];
    if (!this.processing) {
      this.notifyIdle();
    }
    return dropped;
  }

  get size(): number {
    return this.items.length;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Resolves once nothing is queued and no handler is running
   */
  onIdle(): Promise<void> {
    if (!this.processing && this.items.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async drain(): Promise<void> {
    if (this.processing) {
      return;
    }
    this.processing = true;

    try {
      while (!this.stopped) {
        const item = this.items.shift();
        if (item === undefined) {
          break;
        }
        try {
          await this.handler(item);
        } catch (error) {
          this.log.error('Leg event handler failed', error);
        }
      }
    } finally {
      this.processing = false;
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
