import path from "node:path";

import type { ActionMode, ActionPlan, DesignatedPlan, FileOperation } from "@photo-dedupe/core-domain";

import type { CancellationToken } from "../ports/cancellation";
import type { FileMover } from "../ports/file-mover";
import type { Logger } from "../ports/logger";
import type { ReportWriter } from "../ports/report-writer";

export const ORIGINAL_FOLDER = "original";
export const DUPLICATED_FOLDER = "duplicated";

export type ExecuteOptions = {
  mode: Exclude<ActionMode, "export-report">;
  outputFolder?: string;
  cancellation?: CancellationToken;
  onOperation?: (done: number, total: number, op: FileOperation) => void;
};

export type ExecutionOutcome = {
  operations: FileOperation[];
  cancelled: boolean;
};

type PendingMove = {
  plan: DesignatedPlan;
  source: string;
  role: "keeper" | "duplicate";
};

function splitName(filename: string): { stem: string; ext: string } {
  const ext = path.extname(filename);
  return { stem: filename.slice(0, filename.length - ext.length), ext };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Hands out destination names that are free on disk and not already
 * promised to an earlier operation of the same run: name.ext, name_1.ext, ...
 */
export class DestinationResolver {
  private readonly claimed = new Set<string>();

  constructor(private readonly mover: FileMover) {}

  async resolve(folder: string, filename: string): Promise<string> {
    const { stem, ext } = splitName(filename);
    let candidate = path.join(folder, filename);
    let counter = 1;
    while (this.claimed.has(candidate) || (await this.mover.exists(candidate))) {
      candidate = path.join(folder, `${stem}_${counter}${ext}`);
      counter++;
    }
    this.claimed.add(candidate);
    return candidate;
  }
}

function pendingMoves(plans: ActionPlan[]): PendingMove[] {
  const out: PendingMove[] = [];
  for (const plan of plans) {
    if (plan.kind !== "designated") continue;
    out.push({ plan, source: plan.keeper, role: "keeper" });
    for (const dup of plan.duplicates) out.push({ plan, source: dup, role: "duplicate" });
  }
  return out;
}

/**
 * Carries out action plans. Relocation is the only mutation it ever
 * performs: no code path here removes a file.
 */
export class ActionExecutor {
  constructor(
    private readonly deps: {
      mover: FileMover;
      reportWriter: ReportWriter;
      logger: Logger;
    }
  ) {}

  async execute(plans: ActionPlan[], options: ExecuteOptions): Promise<ExecutionOutcome> {
    const { mode, outputFolder, cancellation, onOperation } = options;
    const { logger } = this.deps;

    const moves = pendingMoves(plans);
    const resolver = new DestinationResolver(this.deps.mover);
    const operations: FileOperation[] = [];

    for (const move of moves) {
      if (cancellation?.isCancellationRequested) {
        logger.warn("Execution cancelled", { completed: operations.length, remaining: moves.length - operations.length });
        return { operations, cancelled: true };
      }

      const op =
        mode === "preview"
          ? await this.simulate(move, resolver, outputFolder)
          : await this.relocate(move, resolver, outputFolder);

      operations.push(op);
      onOperation?.(operations.length, moves.length, op);
    }

    return { operations, cancelled: false };
  }

  async exportReport(reportPath: string, document: unknown): Promise<FileOperation> {
    try {
      await this.deps.reportWriter.write(reportPath, document);
      this.deps.logger.info("Report exported", { reportPath });
      return { kind: "export", source: reportPath, destination: reportPath, dryRun: false, outcome: "succeeded" };
    } catch (err) {
      this.deps.logger.error("Report export failed", { reportPath, error: errorMessage(err) });
      return {
        kind: "export",
        source: reportPath,
        destination: reportPath,
        dryRun: false,
        outcome: "failed",
        reason: errorMessage(err),
      };
    }
  }

  private targetFolder(outputFolder: string, role: PendingMove["role"]) {
    return path.join(outputFolder, role === "keeper" ? ORIGINAL_FOLDER : DUPLICATED_FOLDER);
  }

  private async simulate(
    move: PendingMove,
    resolver: DestinationResolver,
    outputFolder: string | undefined
  ): Promise<FileOperation> {
    const destination = outputFolder
      ? await resolver.resolve(this.targetFolder(outputFolder, move.role), path.basename(move.source))
      : undefined;

    return {
      kind: "move",
      source: move.source,
      destination,
      role: move.role,
      groupId: move.plan.groupId,
      dryRun: true,
      outcome: "skipped",
      reason: "preview mode",
    };
  }

  private async relocate(
    move: PendingMove,
    resolver: DestinationResolver,
    outputFolder: string | undefined
  ): Promise<FileOperation> {
    const { mover, logger } = this.deps;
    const base = {
      kind: "move" as const,
      source: move.source,
      role: move.role,
      groupId: move.plan.groupId,
      dryRun: false,
    };

    if (!outputFolder) {
      return { ...base, outcome: "failed", reason: "no output folder configured" };
    }

    if (!(await mover.exists(move.source))) {
      logger.warn("Source vanished before move", { source: move.source });
      return { ...base, outcome: "skipped", reason: "source file no longer exists" };
    }

    const folder = this.targetFolder(outputFolder, move.role);
    let destination: string | undefined;
    try {
      await mover.ensureDir(folder);
      destination = await resolver.resolve(folder, path.basename(move.source));
      await mover.move(move.source, destination);
      logger.info(`Moved ${move.role}`, { source: move.source, destination });
      return { ...base, destination, outcome: "succeeded" };
    } catch (err) {
      logger.warn("Move failed", { source: move.source, destination, error: errorMessage(err) });
      return { ...base, destination, outcome: "failed", reason: errorMessage(err) };
    }
  }
}
