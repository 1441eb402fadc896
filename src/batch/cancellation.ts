import type { CancellationSignal } from '../types/cancellation.js';

/**
 * Cooperative cancellation flag shared by a batch and everything it runs.
 * Cancelling is idempotent; the first reason wins.
 */
export class CancellationToken implements CancellationSignal {
  private cancelledReason: string | null = null;
  private readonly listeners: Array<(reason: string) => void> = [];

  get isCancelled(): boolean {
    return this.cancelledReason !== null;
  }

  get reason(): string | null {
    return this.cancelledReason;
  }

  cancel(reason = 'cancelled'): void {
    if (this.cancelledReason !== null) return;
    this.cancelledReason = reason;
    for (const listener of this.listeners) {
      listener(reason);
    }
  }

  onCancel(listener: (reason: string) => void): void {
    if (this.cancelledReason !== null) {
      listener(this.cancelledReason);
      return;
    }
    this.listeners.push(listener);
  }
}
