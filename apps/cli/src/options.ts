import fs from "node:fs/promises";
import path from "node:path";
import yargs from "yargs/yargs";

import {
  ConfigurationError,
  isDetectionMethod,
  isPerceptualAlgorithm,
  type ActionMode,
  type DetectionMethod,
  type KeepStrategy,
  type PerceptualAlgorithm,
} from "@photo-dedupe/core-domain";
import {
  DEFAULT_IMAGE_EXTENSIONS,
  defaultMethodSettings,
  enabledMethods,
  type CombinePolicy,
  type LogLevel,
  type MethodSettingsInput,
  type RunRequest,
  type ScanSource,
} from "@photo-dedupe/core-application";

const ACTIONS: readonly ActionMode[] = ["preview", "move-to-organized-folders", "export-report"];
const STRATEGIES: readonly KeepStrategy[] = ["keep-largest", "keep-oldest", "keep-first", "auto", "preview-only"];
const COMBINE_MODES = ["any", "at-least", "weighted"] as const;
const LOG_LEVELS: readonly (LogLevel | "silent")[] = ["debug", "info", "warn", "error", "silent"];
const DEFAULT_WEIGHTED_THRESHOLD = 0.8;

export type CliOptions = {
  paths: string[];
  request: Omit<RunRequest, "source">;
  json: boolean;
  logLevel: LogLevel | "silent";
};

function list(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function pick<T extends string>(value: string, allowed: readonly T[], flag: string, issues: string[]): T | undefined {
  const match = allowed.find((a) => a === value);
  if (match === undefined) issues.push(`--${flag} must be one of ${allowed.join(", ")} (got "${value}")`);
  return match;
}

function parseMethods(value: string | undefined, issues: string[]): DetectionMethod[] {
  const names = list(value);
  if (names === undefined) return enabledMethods(defaultMethodSettings());
  const methods: DetectionMethod[] = [];
  for (const name of names) {
    if (isDetectionMethod(name)) methods.push(name);
    else issues.push(`unknown detection method "${name}"`);
  }
  return methods;
}

function parseAlgorithms(value: string | undefined, issues: string[]): PerceptualAlgorithm[] | undefined {
  const names = list(value);
  if (names === undefined) return undefined;
  const algorithms: PerceptualAlgorithm[] = [];
  for (const name of names) {
    if (isPerceptualAlgorithm(name)) algorithms.push(name);
    else issues.push(`unknown perceptual hash algorithm "${name}"`);
  }
  return algorithms;
}

type MethodFlags = {
  methods?: string;
  perceptualThreshold?: number;
  perceptualAlgorithms?: string;
  filenameThreshold?: number;
  sizeTolerance?: number;
  metadataMinFields?: number;
};

/** Only the selected methods end up in the input, so the others are disabled. */
export function buildMethodSettings(flags: MethodFlags, issues: string[]): MethodSettingsInput {
  const selected = new Set(parseMethods(flags.methods, issues));
  const algorithms = parseAlgorithms(flags.perceptualAlgorithms, issues);
  const input: MethodSettingsInput = {};

  if (selected.has("contentHash")) input.contentHash = { enabled: true };
  if (selected.has("perceptualHash")) {
    input.perceptualHash = {
      enabled: true,
      ...(flags.perceptualThreshold !== undefined ? { threshold: flags.perceptualThreshold } : {}),
      ...(algorithms !== undefined ? { algorithms } : {}),
    };
  }
  if (selected.has("filename")) {
    input.filename = {
      enabled: true,
      ...(flags.filenameThreshold !== undefined ? { threshold: flags.filenameThreshold } : {}),
    };
  }
  if (selected.has("size")) {
    input.size = {
      enabled: true,
      ...(flags.sizeTolerance !== undefined ? { tolerance: flags.sizeTolerance } : {}),
    };
  }
  if (selected.has("metadata")) {
    input.metadata = {
      enabled: true,
      ...(flags.metadataMinFields !== undefined ? { minMatchingFields: flags.metadataMinFields } : {}),
    };
  }
  return input;
}

export function buildCombinePolicy(
  mode: string,
  minMatches: number | undefined,
  weightedThreshold: number | undefined,
  issues: string[]
): CombinePolicy | undefined {
  switch (pick(mode, COMBINE_MODES, "combine", issues)) {
    case "any":
      return { mode: "any" };
    case "at-least":
      if (minMatches === undefined) {
        issues.push("--combine at-least needs --min-matches");
        return undefined;
      }
      return { mode: "at-least", count: minMatches };
    case "weighted":
      return { mode: "weighted", threshold: weightedThreshold ?? DEFAULT_WEIGHTED_THRESHOLD };
    default:
      return undefined;
  }
}

function cli(argv: string[]) {
  return yargs(argv)
    .scriptName("photo-dedupe")
    .command("$0 <paths..>", "Find duplicate photos in a folder or a list of files", (y) =>
      y.positional("paths", { type: "string", array: true, demandOption: true, describe: "A folder, or image files" })
    )
    .option("methods", {
      type: "string",
      describe: "Comma-separated: contentHash,perceptualHash,filename,size,metadata",
    })
    .option("perceptual-threshold", { type: "number", describe: "Similarity needed (0.5..1)" })
    .option("perceptual-algorithms", { type: "string", describe: "Comma-separated: ahash,dhash,phash" })
    .option("filename-threshold", { type: "number", describe: "Name similarity needed (0..1)" })
    .option("size-tolerance", { type: "number", describe: "Relative size difference allowed (0..1)" })
    .option("metadata-min-fields", { type: "number", describe: "EXIF fields that must agree" })
    .option("combine", { type: "string", default: "any", describe: "any | at-least | weighted" })
    .option("min-matches", { type: "number", describe: "Methods that must match under --combine at-least" })
    .option("weighted-threshold", { type: "number", describe: "Weighted mean needed under --combine weighted" })
    .option("action", { type: "string", default: "preview", describe: ACTIONS.join(" | ") })
    .option("strategy", { type: "string", default: "keep-largest", describe: STRATEGIES.join(" | ") })
    .option("output", { type: "string", describe: "Folder receiving original/ and duplicated/" })
    .option("report", { type: "string", describe: "Where export-report writes the JSON report" })
    .option("ext", { type: "string", default: DEFAULT_IMAGE_EXTENSIONS.join(","), describe: "Extensions to scan" })
    .option("concurrency", { type: "number", describe: "Files analysed in parallel" })
    .option("json", { type: "boolean", default: false, describe: "Print the report JSON instead of a summary" })
    .option("log-level", { type: "string", default: "info", describe: LOG_LEVELS.join(" | ") })
    .strict()
    .exitProcess(false)
    .fail((message: string | undefined, err: Error | undefined) => {
      throw err ?? new ConfigurationError([message ?? "invalid arguments"]);
    });
}

/** `--help` and `--version` are answered by yargs itself. */
export function isInfoRequest(argv: string[]): boolean {
  return argv.includes("--help") || argv.includes("--version");
}

export async function printInfo(argv: string[]): Promise<void> {
  await cli(argv).parseAsync();
}

/** Parses argv (without the node and script entries). */
export async function parseCliOptions(argv: string[]): Promise<CliOptions> {
  const args = await cli(argv).parseAsync();
  const issues: string[] = [];

  const methods = buildMethodSettings(args, issues);
  const combine = buildCombinePolicy(args.combine, args.minMatches, args.weightedThreshold, issues);
  const action = pick(args.action, ACTIONS, "action", issues);
  const strategy = pick(args.strategy, STRATEGIES, "strategy", issues);
  const logLevel = pick(args.logLevel, LOG_LEVELS, "log-level", issues);
  const paths = Array.isArray(args.paths) ? args.paths.map(String) : [];
  if (paths.length === 0) issues.push("at least one path is required");

  if (issues.length > 0 || action === undefined || strategy === undefined || logLevel === undefined) {
    throw new ConfigurationError(issues);
  }

  return {
    paths,
    json: args.json,
    logLevel,
    request: {
      methods,
      combine,
      action,
      strategy,
      outputFolder: args.output,
      reportPath: args.report,
      extensions: list(args.ext),
      concurrency: args.concurrency,
    },
  };
}

/**
 * A single folder is scanned recursively; anything else is an explicit file
 * list. A single missing path without an extension is taken as a folder so
 * the run reports it as a missing root folder.
 */
export async function resolveSource(paths: string[]): Promise<ScanSource> {
  if (paths.length === 1) {
    const only = path.resolve(paths[0]);
    const stat = await fs.stat(only).catch(() => null);
    if (stat?.isDirectory()) return { rootFolder: only };
    if (stat === null && path.extname(only) === "") return { rootFolder: only };
  }
  return { files: paths.map((p) => path.resolve(p)) };
}
