import type { FeatureSet } from "./feature-set";

export type FilePath = string;

export interface FileRecord {
  readonly path: FilePath;
  readonly size: number;
  readonly mtimeMs: number;
  readonly features?: FeatureSet;
}

/** Records are never mutated; attaching features yields a new record. */
export function withFeatures(record: FileRecord, features: FeatureSet): FileRecord {
  return { ...record, features };
}

export function compareByPath(a: { path: FilePath }, b: { path: FilePath }): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}
