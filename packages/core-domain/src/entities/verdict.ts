import type { DetectionMethod } from "../value-objects/detection-method";
import type { FilePath } from "./file-record";

/** One method's opinion about a pair of files. */
export type PairVerdict = {
  method: DetectionMethod;
  matched: boolean;
  /** Normalized similarity in [0, 1]. */
  score: number;
};

export type CombinedVerdict = {
  a: FilePath;
  b: FilePath;
  /** Only methods that could participate for this pair. */
  verdicts: PairVerdict[];
  matchedMethods: DetectionMethod[];
  /** Identical content hashes short-circuit every other signal. */
  exact: boolean;
  isDuplicate: boolean;
  /** Max of the participating scores, 0 when nothing participated. */
  score: number;
};
