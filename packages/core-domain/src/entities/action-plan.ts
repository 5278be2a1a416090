import type { FilePath } from "./file-record";

/** `auto` follows each group's recommended strategy; `preview-only` designates nothing. */
export type KeepStrategy = "keep-largest" | "keep-oldest" | "keep-first" | "auto" | "preview-only";

export type KeeperStrategy = Exclude<KeepStrategy, "auto" | "preview-only">;

export type DesignatedPlan = {
  kind: "designated";
  groupId: number;
  strategy: KeeperStrategy;
  keeper: FilePath;
  duplicates: FilePath[];
  rationale: string;
};

export type ReviewPlan = {
  kind: "review";
  groupId: number;
  strategy: "preview-only" | "auto";
  files: FilePath[];
  rationale: string;
};

export type ActionPlan = DesignatedPlan | ReviewPlan;
