import type { ActionMode, KeepStrategy } from "@photo-dedupe/core-domain";
import type { ScanSource } from "../ports/file-scanner";
import type { CombinePolicy, MethodSettings, MethodSettingsInput } from "./detection-settings";

export const DEFAULT_IMAGE_EXTENSIONS = ["jpg", "jpeg", "png", "bmp", "tiff", "tif", "webp", "gif", "avif", "heic"];

export const DEFAULT_EXTRACTION_TIMEOUT_MS = 15_000;
export const DEFAULT_COMPARISON_BATCH_SIZE = 500;
export const DEFAULT_REPORT_FILENAME = "dedupe-report.json";

export type RunRequest = {
  source: ScanSource;
  methods?: MethodSettingsInput;
  combine?: CombinePolicy;
  action?: ActionMode;
  strategy?: KeepStrategy;
  outputFolder?: string;
  reportPath?: string;
  extensions?: string[];
  concurrency?: number;
  extractionTimeoutMs?: number;
  comparisonBatchSize?: number;
};

/** A validated request with every default filled in and paths made absolute. */
export type RunOptions = {
  source: ScanSource;
  methods: MethodSettings;
  combine: CombinePolicy;
  action: ActionMode;
  strategy: KeepStrategy;
  outputFolder?: string;
  reportPath?: string;
  extensions: string[];
  concurrency: number;
  extractionTimeoutMs: number;
  comparisonBatchSize: number;
};
