import type { ExtractionFailure, FileRecord } from "@photo-dedupe/core-domain";

export type ScanSource =
  | { rootFolder: string; files?: never }
  | { files: string[]; rootFolder?: never };

export type ScanOptions = {
  /** Lowercase extensions without the dot. */
  extensions: readonly string[];
  /** Absolute folders whose contents are never picked up (e.g. the output folder). */
  exclude?: readonly string[];
};

export type ScanResult = {
  records: FileRecord[];
  failures: ExtractionFailure[];
};

export interface FileScanner {
  scan(source: ScanSource, options: ScanOptions): Promise<ScanResult>;
}
