/**
 * Operation Queue
 *
 * Runs GATT operations for one link strictly one at a time, in arrival order.
 * A BLE link processes a single request at a time; two overlapping operations
 * on the same link interleave their frames, so every read/write sequence
 * (including multi-frame split transfers) goes through here.
 */

import { thermostatLogger } from './ThermostatLogger';

interface QueuedOperation {
  label: string;
  run: () => Promise<void>;
}

export class OperationQueue {
  private queue: QueuedOperation[] = [];
  private isProcessing = false;
  private currentLabel: string | null = null;

  constructor(private readonly name: string) {}

  /**
   * Queue an operation; resolves or rejects with the operation's own outcome.
   */
  enqueue<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        label,
        run: async () => {
          try {
            resolve(await operation());
          } catch (error) {
            reject(error);
          }
        },
      });
      thermostatLogger.debug(`[OperationQueue] ${this.name}: queued ${label}`, { queueLength: this.queue.length }, 'SESSION');
      void this.processNext();
    });
  }

  private async processNext(): Promise<void> {
    if (this.isProcessing) return;

    const next = this.queue.shift();
    if (!next) return;

    this.isProcessing = true;
    this.currentLabel = next.label;
    try {
      // run() settles the caller's promise and never rejects
      await next.run();
    } finally {
      this.isProcessing = false;
      this.currentLabel = null;
    }

    void this.processNext();
  }

  /**
   * Get current queue status
   */
  getStatus(): { queueLength: number; isProcessing: boolean; current: string | null } {
    return {
      queueLength: this.queue.length,
      isProcessing: this.isProcessing,
      current: this.currentLabel,
    };
  }
}
