import type { ActionPlan } from "./action-plan";
import type { DuplicateGroup } from "./duplicate-group";
import type { FilePath } from "./file-record";

export type ActionMode = "preview" | "move-to-organized-folders" | "export-report";

export type RunStatus = "completed" | "cancelled";

export type RunPhase = "scanning" | "extracting" | "comparing" | "grouping" | "executing";

export type OperationOutcome = "succeeded" | "skipped" | "failed";

export type FileOperation = {
  kind: "move" | "export";
  source: FilePath;
  destination?: FilePath;
  role?: "keeper" | "duplicate";
  groupId?: number;
  dryRun: boolean;
  outcome: OperationOutcome;
  reason?: string;
};

export type ExtractionFailure = {
  path: FilePath;
  code: "UNREADABLE_FILE" | "UNSUPPORTED_FORMAT";
  message: string;
};

/** Size and timestamp of a grouped file, so reports need no second stat. */
export type FileSummary = {
  size: number;
  mtimeMs: number;
};

export type RunStatistics = {
  filesScanned: number;
  filesCompared: number;
  comparisons: number;
  groupCount: number;
  duplicateCount: number;
  potentialSavingsBytes: number;
};

export interface RunResult {
  status: RunStatus;
  /** Last phase that started; where a cancelled run stopped. */
  lastPhase: RunPhase;
  action: ActionMode;
  startedAtIso: string;
  finishedAtIso: string;
  elapsedMs: number;
  groups: DuplicateGroup[];
  files: Record<FilePath, FileSummary>;
  plans: ActionPlan[];
  operations: FileOperation[];
  failures: ExtractionFailure[];
  statistics: RunStatistics;
  reportPath?: FilePath;
}
