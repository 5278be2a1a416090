import path from "node:path";

import {
  ConfigurationError,
  UnreadableFileError,
  UnsupportedFormatError,
  withFeatures,
  type ActionPlan,
  type DuplicateGroup,
  type ExtractionFailure,
  type FileOperation,
  type FileRecord,
  type FileSummary,
  type RunPhase,
  type RunResult,
  type RunStatus,
} from "@photo-dedupe/core-domain";

import type { CancellationToken } from "../ports/cancellation";
import type { Clock } from "../ports/clock";
import type { FileHasher } from "../ports/file-hasher";
import type { FileMover } from "../ports/file-mover";
import type { FileScanner } from "../ports/file-scanner";
import type { FormatDetector } from "../ports/format-detector";
import type { ImageDecoder } from "../ports/image-decoder";
import type { Logger } from "../ports/logger";
import type { MetadataReader } from "../ports/metadata-reader";
import type { ProgressSink } from "../ports/progress-sink";
import type { ReportWriter } from "../ports/report-writer";

import { NEVER_CANCELLED } from "../application/cancellation";
import { ProgressReporter } from "../application/progress-reporter";
import { validateRunRequest } from "../application/validate-run-request";
import { runPool } from "../application/worker-pool";
import { enabledMethods } from "../value-objects/detection-settings";
import type { RunOptions, RunRequest } from "../value-objects/run-request";

import { ActionExecutor } from "./action-executor";
import { planGroups } from "./action-planner";
import { groupDuplicates } from "./duplicate-grouper";
import { FeatureExtractor } from "./feature-extractor";
import { buildRunReport } from "./run-report";

export type RunHooks = {
  progress?: ProgressSink;
  cancellation?: CancellationToken;
};

export type DedupeServiceDeps = {
  scanner: FileScanner;
  hasher: FileHasher;
  decoder: ImageDecoder;
  metadataReader: MetadataReader;
  formatDetector: FormatDetector;
  mover: FileMover;
  reportWriter: ReportWriter;
  clock: Clock;
  logger: Logger;
};

type Extracted = { ok: true; record: FileRecord } | { ok: false; failure: ExtractionFailure };

/** Mutable bookkeeping of one run; frozen into a RunResult at the end. */
type RunState = {
  phase: RunPhase;
  filesScanned: number;
  compared: FileRecord[];
  comparisons: number;
  failures: ExtractionFailure[];
  groups: DuplicateGroup[];
  plans: ActionPlan[];
  operations: FileOperation[];
  reportPath?: string;
};

function toFailure(err: UnreadableFileError | UnsupportedFormatError): ExtractionFailure {
  return { path: err.path, code: err.code === "UNSUPPORTED_FORMAT" ? "UNSUPPORTED_FORMAT" : "UNREADABLE_FILE", message: err.message };
}

function describeSkipped(options: RunOptions): string[] {
  const skipped: string[] = [];
  if (!options.methods.contentHash.enabled) skipped.push("content hashing disabled");
  if (!options.methods.perceptualHash.enabled) skipped.push("perceptual hashing disabled");
  if (!options.methods.metadata.enabled) skipped.push("EXIF extraction disabled");
  if (!options.methods.filename.enabled) skipped.push("filename comparison disabled");
  if (!options.methods.size.enabled) skipped.push("size comparison disabled");
  return skipped;
}

export class DedupeService {
  private readonly extractor: FeatureExtractor;
  private readonly executor: ActionExecutor;

  constructor(private readonly deps: DedupeServiceDeps) {
    this.extractor = new FeatureExtractor(deps);
    this.executor = new ActionExecutor(deps);
  }

  /**
   * Scans, extracts, compares, groups, plans and executes. Configuration
   * problems throw ConfigurationError before any file is touched; every
   * other problem is recorded in the result.
   */
  async run(request: RunRequest, hooks: RunHooks = {}): Promise<RunResult> {
    const { clock, logger, mover, scanner } = this.deps;
    const options = validateRunRequest(request);

    const root = options.source.rootFolder;
    if (root !== undefined && !(await mover.exists(root))) {
      throw new ConfigurationError([`root folder does not exist: ${root}`]);
    }

    const token = hooks.cancellation ?? NEVER_CANCELLED;
    const progress = new ProgressReporter(hooks.progress, logger);
    const startedAt = clock.now();

    const state: RunState = {
      phase: "scanning",
      filesScanned: 0,
      compared: [],
      comparisons: 0,
      failures: [],
      groups: [],
      plans: [],
      operations: [],
      reportPath: options.reportPath,
    };

    const finish = (status: RunStatus) => this.buildResult(state, options, status, startedAt);

    logger.info("Dedupe run started", {
      methods: enabledMethods(options.methods),
      action: options.action,
      strategy: options.strategy,
    });
    const skipped = describeSkipped(options);
    if (skipped.length > 0) logger.debug(`Performance optimizations: ${skipped.join(", ")}`);

    /* 1) scanning */
    if (token.isCancellationRequested) return finish("cancelled");
    progress.emit("scanning", 0, 0, root !== undefined ? `Scanning ${root}` : "Checking file list");

    const scan = await scanner.scan(options.source, {
      extensions: options.extensions,
      exclude: options.outputFolder ? [options.outputFolder] : [],
    });
    state.failures.push(...scan.failures);
    state.filesScanned = scan.records.length + scan.failures.length;
    progress.emit("scanning", scan.records.length, scan.records.length, `Found ${scan.records.length} candidate files`);

    /* 2) extracting */
    state.phase = "extracting";
    const extracted = await this.extractAll(scan.records, options, token, progress);
    for (const item of extracted.items) {
      if (item === undefined) continue;
      if (item.ok) state.compared.push(item.record);
      else state.failures.push(item.failure);
    }
    if (extracted.cancelled) return finish("cancelled");
    logger.info("Features extracted", { files: state.compared.length, failures: state.failures.length });

    /* 3) comparing */
    state.phase = "comparing";
    const grouping = await groupDuplicates(state.compared, {
      policy: { methods: options.methods, combine: options.combine },
      batchSize: options.comparisonBatchSize,
      cancellation: token,
      onBatch: (done, total) => progress.emit("comparing", done, total, `Compared ${done} of ${total} pairs`),
    });
    state.comparisons = grouping.comparisons;
    state.groups = grouping.groups;
    if (grouping.cancelled) return finish("cancelled");

    /* 4) grouping + planning */
    state.phase = "grouping";
    const byPath = new Map(state.compared.map((r) => [r.path, r]));
    state.plans = planGroups(state.groups, byPath, options.strategy);
    progress.emit("grouping", state.groups.length, state.groups.length, `Found ${state.groups.length} duplicate groups`);
    logger.info("Duplicate groups formed", { groups: state.groups.length, comparisons: state.comparisons });

    /* 5) executing */
    if (token.isCancellationRequested) return finish("cancelled");
    state.phase = "executing";

    if (options.action === "export-report") {
      const reportPath = state.reportPath;
      if (reportPath === undefined) throw new Error("export-report reached execution without a report path");
      const document = buildRunReport(this.buildResult(state, options, "completed", startedAt));
      progress.emit("executing", 0, 1, `Writing report to ${reportPath}`);
      const op = await this.executor.exportReport(reportPath, document);
      state.operations.push(op);
      progress.emit("executing", 1, 1, `Report ${op.outcome}`);
      return finish("completed");
    }

    const execution = await this.executor.execute(state.plans, {
      mode: options.action,
      outputFolder: options.outputFolder,
      cancellation: token,
      onOperation: (done, total, op) =>
        progress.emit("executing", done, total, `${op.outcome}: ${path.basename(op.source)}`),
    });
    state.operations.push(...execution.operations);

    const status: RunStatus = execution.cancelled ? "cancelled" : "completed";
    logger.info(status === "completed" ? "Dedupe run completed" : "Dedupe run cancelled", {
      operations: state.operations.length,
    });
    return finish(status);
  }

  private async extractAll(
    records: FileRecord[],
    options: RunOptions,
    token: CancellationToken,
    progress: ProgressReporter
  ): Promise<{ items: Array<Extracted | undefined>; cancelled: boolean }> {
    const settings = {
      methods: options.methods,
      extensions: options.extensions,
      timeoutMs: options.extractionTimeoutMs,
    };
    let done = 0;
    progress.emit("extracting", 0, records.length, "Extracting features");

    const pool = await runPool(
      records,
      options.concurrency,
      async (record): Promise<Extracted> => {
        try {
          const features = await this.extractor.extract(record, settings);
          return { ok: true, record: withFeatures(record, features) };
        } catch (err) {
          if (err instanceof UnreadableFileError || err instanceof UnsupportedFormatError) {
            this.deps.logger.warn("File excluded from comparison", { path: record.path, reason: err.message });
            return { ok: false, failure: toFailure(err) };
          }
          throw err;
        } finally {
          done++;
          progress.emit("extracting", done, records.length, `Analyzed ${path.basename(record.path)}`);
        }
      },
      token
    );

    return { items: pool.results, cancelled: pool.cancelled };
  }

  private buildResult(state: RunState, options: RunOptions, status: RunStatus, startedAt: Date): RunResult {
    const finishedAt = this.deps.clock.now();
    const files: Record<string, FileSummary> = {};
    const byPath = new Map(state.compared.map((r) => [r.path, r]));
    for (const group of state.groups) {
      for (const p of group.files) {
        const record = byPath.get(p);
        if (record) files[p] = { size: record.size, mtimeMs: record.mtimeMs };
      }
    }

    return {
      status,
      lastPhase: state.phase,
      action: options.action,
      startedAtIso: startedAt.toISOString(),
      finishedAtIso: finishedAt.toISOString(),
      elapsedMs: finishedAt.getTime() - startedAt.getTime(),
      groups: state.groups,
      files,
      plans: state.plans,
      operations: state.operations,
      failures: state.failures,
      statistics: {
        filesScanned: state.filesScanned,
        filesCompared: state.compared.length,
        comparisons: state.comparisons,
        groupCount: state.groups.length,
        duplicateCount: state.groups.reduce((sum, g) => sum + g.files.length - 1, 0),
        potentialSavingsBytes: state.groups.reduce((sum, g) => sum + g.potentialSavingsBytes, 0),
      },
      ...(state.reportPath !== undefined && options.action === "export-report" ? { reportPath: state.reportPath } : {}),
    };
  }
}
