import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";

import { compareByPath, type ExtractionFailure, type FileRecord } from "@photo-dedupe/core-domain";
import type { FileScanner, ScanOptions, ScanResult, ScanSource } from "../ports/file-scanner";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/** True when `candidate` is `folder` itself or lives anywhere below it. */
export function isInside(candidate: string, folder: string): boolean {
  const rel = path.relative(folder, candidate);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

export class FastGlobFileScanner implements FileScanner {
  async scan(source: ScanSource, options: ScanOptions): Promise<ScanResult> {
    const exclude = (options.exclude ?? []).map((p) => path.resolve(p));
    const candidates =
      source.rootFolder !== undefined
        ? await this.walk(path.resolve(source.rootFolder), options.extensions)
        : [...new Set(source.files.map((f) => path.resolve(f)))];

    const records: FileRecord[] = [];
    const failures: ExtractionFailure[] = [];
    const wanted = new Set(options.extensions);

    for (const abs of candidates) {
      if (exclude.some((folder) => isInside(abs, folder))) continue;

      if (!wanted.has(extensionOf(abs))) {
        failures.push({ path: abs, code: "UNSUPPORTED_FORMAT", message: `Unsupported extension: ${path.basename(abs)}` });
        continue;
      }

      try {
        const stat = await fs.stat(abs);
        if (!stat.isFile()) {
          failures.push({ path: abs, code: "UNREADABLE_FILE", message: `Not a regular file: ${abs}` });
          continue;
        }
        records.push({ path: abs, size: stat.size, mtimeMs: stat.mtimeMs });
      } catch (err) {
        failures.push({ path: abs, code: "UNREADABLE_FILE", message: errorMessage(err) });
      }
    }

    records.sort(compareByPath);
    return { records, failures };
  }

  /** Recursive, case-insensitive on extensions, hidden entries skipped. */
  private async walk(root: string, extensions: readonly string[]): Promise<string[]> {
    const patterns = extensions.map((ext) => `**/*.${fg.escapePath(ext)}`);
    const found = await fg(patterns, {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      caseSensitiveMatch: false,
      dot: false,
      suppressErrors: true,
    });
    return found.map((p) => path.resolve(p));
  }
}
