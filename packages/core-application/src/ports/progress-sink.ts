import type { RunPhase } from "@photo-dedupe/core-domain";

export type ProgressEvent = {
  phase: RunPhase;
  processed: number;
  total: number;
  status: string;
};

export interface ProgressSink {
  report(event: ProgressEvent): void;
}
