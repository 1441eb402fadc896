/**
 * Read side of cooperative cancellation. Long-running loops poll
 * `isCancelled` between steps; nothing is interrupted mid-call.
 */
export interface CancellationSignal {
  readonly isCancelled: boolean;
  readonly reason: string | null;
}
