/** Polled between units of work; never interrupts one in flight. */
export interface CancellationToken {
  readonly isCancellationRequested: boolean;
}
