import type { DetectionMethod } from "../value-objects/detection-method";
import type { FilePath } from "./file-record";

export type DuplicateKind = "exact" | "likely_exact" | "visually_similar" | "similar";

/** What a reviewer would do with a group of this kind, absent an explicit strategy. */
export type RecommendedStrategy = "keep-largest" | "keep-first" | "manual-review";

export function recommendStrategy(kind: DuplicateKind): RecommendedStrategy {
  switch (kind) {
    case "exact":
      return "keep-largest";
    case "likely_exact":
      return "keep-first";
    case "visually_similar":
    case "similar":
      return "manual-review";
  }
}

export type MethodScores = Partial<Record<DetectionMethod, number>>;

export interface DuplicateGroup {
  id: number;
  /** Sorted by path; always two or more entries. */
  files: FilePath[];
  triggeredMethods: DetectionMethod[];
  kind: DuplicateKind;
  recommendedStrategy: RecommendedStrategy;
  /** Best combined score over the edges that built the group. */
  score: number;
  /** Best per-method score each member reached against another member. */
  memberScores: Record<FilePath, MethodScores>;
  totalBytes: number;
  potentialSavingsBytes: number;
}
