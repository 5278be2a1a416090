import os from "node:os";
import path from "node:path";

import {
  ConfigurationError,
  isPerceptualAlgorithm,
  type ActionMode,
  type KeepStrategy,
} from "@photo-dedupe/core-domain";

import {
  DEFAULT_COMBINE_POLICY,
  enabledMethods,
  resolveMethodSettings,
  type CombinePolicy,
  type MethodSettings,
} from "../value-objects/detection-settings";
import {
  DEFAULT_COMPARISON_BATCH_SIZE,
  DEFAULT_EXTRACTION_TIMEOUT_MS,
  DEFAULT_IMAGE_EXTENSIONS,
  DEFAULT_REPORT_FILENAME,
  type RunOptions,
  type RunRequest,
} from "../value-objects/run-request";

const ACTIONS: readonly ActionMode[] = ["preview", "move-to-organized-folders", "export-report"];
const STRATEGIES: readonly KeepStrategy[] = ["keep-largest", "keep-oldest", "keep-first", "auto", "preview-only"];

function inRange(value: number, min: number, max: number): boolean {
  return Number.isFinite(value) && value >= min && value <= max;
}

function checkMethods(methods: MethodSettings, issues: string[]) {
  const { perceptualHash, filename, size, metadata } = methods;

  if (perceptualHash.enabled) {
    if (!inRange(perceptualHash.threshold, 0.5, 1)) {
      issues.push(`perceptual hash threshold must be between 0.5 and 1.0 (got ${perceptualHash.threshold})`);
    }
    if (perceptualHash.algorithms.length === 0) {
      issues.push("perceptual hash needs at least one algorithm");
    }
    for (const algo of perceptualHash.algorithms) {
      if (!isPerceptualAlgorithm(algo)) issues.push(`unknown perceptual hash algorithm "${algo}"`);
    }
  }

  if (filename.enabled && !inRange(filename.threshold, 0, 1)) {
    issues.push(`filename similarity threshold must be between 0 and 1 (got ${filename.threshold})`);
  }

  if (size.enabled && !inRange(size.tolerance, 0, 1)) {
    issues.push(`size tolerance must be between 0 and 1 (got ${size.tolerance})`);
  }

  if (metadata.enabled && (!Number.isInteger(metadata.minMatchingFields) || metadata.minMatchingFields < 1)) {
    issues.push(`metadata minimum matching fields must be a positive integer (got ${metadata.minMatchingFields})`);
  }
}

/**
 * `countable` is how many methods can match for a pair with different bytes:
 * an equal content hash decides the pair on its own, so it never adds to a count.
 */
function checkCombine(combine: CombinePolicy, countable: number, issues: string[]) {
  switch (combine.mode) {
    case "any":
      return;
    case "at-least":
      if (!Number.isInteger(combine.count) || combine.count < 1 || combine.count > Math.max(1, countable)) {
        issues.push(
          `required matching methods must be an integer between 1 and ${countable} enabled methods besides content hash (got ${combine.count})`
        );
      }
      return;
    case "weighted":
      if (!inRange(combine.threshold, 0, 1)) {
        issues.push(`weighted threshold must be between 0 and 1 (got ${combine.threshold})`);
      }
      for (const [method, weight] of Object.entries(combine.weights ?? {})) {
        if (weight === undefined || !Number.isFinite(weight) || weight < 0) {
          issues.push(`weight for ${method} must be a non-negative number`);
        }
      }
      return;
  }
}

/**
 * Resolves defaults and checks everything that can be checked without I/O.
 * Throws a single ConfigurationError listing every issue found.
 */
export function validateRunRequest(request: RunRequest): RunOptions {
  const issues: string[] = [];

  const methods = resolveMethodSettings(request.methods);
  const enabled = enabledMethods(methods);
  if (enabled.length === 0) issues.push("at least one detection method must be enabled");
  checkMethods(methods, issues);

  const combine = request.combine ?? DEFAULT_COMBINE_POLICY;
  checkCombine(combine, enabled.filter((m) => m !== "contentHash").length, issues);

  const action = request.action ?? "preview";
  if (!ACTIONS.includes(action)) issues.push(`unknown action "${action}"`);

  const strategy = request.strategy ?? "keep-largest";
  if (!STRATEGIES.includes(strategy)) issues.push(`unknown strategy "${strategy}"`);

  const outputFolder = request.outputFolder ? path.resolve(request.outputFolder) : undefined;
  let reportPath = request.reportPath ? path.resolve(request.reportPath) : undefined;

  if (action === "move-to-organized-folders") {
    if (!outputFolder) issues.push("an output folder is required for move-to-organized-folders");
    if (strategy === "preview-only") issues.push("move-to-organized-folders needs a keeper strategy, not preview-only");
  }

  if (action === "export-report" && !reportPath) {
    if (outputFolder) reportPath = path.join(outputFolder, DEFAULT_REPORT_FILENAME);
    else issues.push("export-report needs a report path or an output folder");
  }

  const source = request.source;
  if (source.rootFolder !== undefined) {
    if (source.rootFolder.trim() === "") issues.push("root folder must not be empty");
  } else if (source.files.length === 0) {
    issues.push("the file list to scan is empty");
  }

  const extensions = (request.extensions ?? DEFAULT_IMAGE_EXTENSIONS).map((e) => e.replace(/^\./, "").toLowerCase());
  if (extensions.length === 0) issues.push("at least one image extension is required");

  const concurrency = request.concurrency ?? os.availableParallelism();
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    issues.push(`concurrency must be a positive integer (got ${concurrency})`);
  }

  const extractionTimeoutMs = request.extractionTimeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS;
  if (!Number.isFinite(extractionTimeoutMs) || extractionTimeoutMs <= 0) {
    issues.push(`extraction timeout must be a positive number of milliseconds (got ${extractionTimeoutMs})`);
  }

  const comparisonBatchSize = request.comparisonBatchSize ?? DEFAULT_COMPARISON_BATCH_SIZE;
  if (!Number.isInteger(comparisonBatchSize) || comparisonBatchSize < 1) {
    issues.push(`comparison batch size must be a positive integer (got ${comparisonBatchSize})`);
  }

  if (issues.length > 0) throw new ConfigurationError(issues);

  const resolvedSource =
    source.rootFolder !== undefined
      ? { rootFolder: path.resolve(source.rootFolder) }
      : { files: source.files.map((f) => path.resolve(f)) };

  return {
    source: resolvedSource,
    methods,
    combine,
    action,
    strategy,
    outputFolder,
    reportPath,
    extensions,
    concurrency,
    extractionTimeoutMs,
    comparisonBatchSize,
  };
}
