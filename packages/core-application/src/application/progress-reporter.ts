import type { RunPhase } from "@photo-dedupe/core-domain";

import type { Logger } from "../ports/logger";
import type { ProgressSink } from "../ports/progress-sink";

/** Forwards events to the caller's sink; a throwing sink never breaks the run. */
export class ProgressReporter {
  constructor(
    private readonly sink: ProgressSink | undefined,
    private readonly logger: Logger
  ) {}

  emit(phase: RunPhase, processed: number, total: number, status: string): void {
    if (!this.sink) return;
    try {
      this.sink.report({ phase, processed, total, status });
    } catch (err) {
      this.logger.warn("Progress sink threw; event dropped", {
        phase,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
