import type { CancellationToken } from "../ports/cancellation";

export class CancellationSource implements CancellationToken {
  private requested = false;

  get isCancellationRequested(): boolean {
    return this.requested;
  }

  cancel(): void {
    this.requested = true;
  }
}

export function tokenFromAbortSignal(signal: AbortSignal): CancellationToken {
  return {
    get isCancellationRequested() {
      return signal.aborted;
    },
  };
}

export const NEVER_CANCELLED: CancellationToken = { isCancellationRequested: false };
