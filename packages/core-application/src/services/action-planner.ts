import {
  compareByPath,
  type ActionPlan,
  type DuplicateGroup,
  type FilePath,
  type FileRecord,
  type KeepStrategy,
  type KeeperStrategy,
} from "@photo-dedupe/core-domain";

import { formatBytes } from "../utils/format";

type Ranking = (a: FileRecord, b: FileRecord) => number;

const largestFirst: Ranking = (a, b) => b.size - a.size || a.mtimeMs - b.mtimeMs || compareByPath(a, b);

const oldestFirst: Ranking = (a, b) => a.mtimeMs - b.mtimeMs || b.size - a.size || compareByPath(a, b);

function rank(members: FileRecord[], ranking: Ranking): FileRecord[] {
  return [...members].sort(ranking);
}

function resolveMembers(group: DuplicateGroup, records: ReadonlyMap<FilePath, FileRecord>): FileRecord[] {
  return group.files.map((p) => {
    const record = records.get(p);
    if (!record) throw new Error(`Group ${group.id} references unknown file ${p}`);
    return record;
  });
}

function chooseKeeper(
  members: FileRecord[],
  strategy: KeeperStrategy
): { keeper: FileRecord; rationale: string } {
  switch (strategy) {
    case "keep-largest": {
      const keeper = rank(members, largestFirst)[0];
      return { keeper, rationale: `kept largest (${formatBytes(keeper.size)})` };
    }
    case "keep-oldest": {
      const keeper = rank(members, oldestFirst)[0];
      return { keeper, rationale: `kept oldest (modified ${new Date(keeper.mtimeMs).toISOString()})` };
    }
    case "keep-first":
      return { keeper: rank(members, compareByPath)[0], rationale: "kept first by path" };
  }
}

function reviewPlan(group: DuplicateGroup, strategy: "preview-only" | "auto"): ActionPlan {
  return {
    kind: "review",
    groupId: group.id,
    strategy,
    files: [...group.files],
    rationale: `review ${group.files.length} files (${group.kind}, matched by ${group.triggeredMethods.join(", ")})`,
  };
}

/**
 * Picks the keeper of a group. Pure: no file is touched here.
 * `preview-only` yields a review plan without a keeper; `auto` follows the
 * group's recommended strategy and leaves manual-review groups as review plans.
 */
export function planGroup(
  group: DuplicateGroup,
  records: ReadonlyMap<FilePath, FileRecord>,
  strategy: KeepStrategy
): ActionPlan {
  if (strategy === "preview-only") return reviewPlan(group, strategy);

  let keeperStrategy: KeeperStrategy;
  let prefix = "";
  if (strategy === "auto") {
    if (group.recommendedStrategy === "manual-review") return reviewPlan(group, strategy);
    keeperStrategy = group.recommendedStrategy;
    prefix = `recommended for ${group.kind}: `;
  } else {
    keeperStrategy = strategy;
  }

  const { keeper, rationale } = chooseKeeper(resolveMembers(group, records), keeperStrategy);

  return {
    kind: "designated",
    groupId: group.id,
    strategy: keeperStrategy,
    keeper: keeper.path,
    duplicates: group.files.filter((p) => p !== keeper.path),
    rationale: prefix + rationale,
  };
}

export function planGroups(
  groups: DuplicateGroup[],
  records: ReadonlyMap<FilePath, FileRecord>,
  strategy: KeepStrategy
): ActionPlan[] {
  return groups.map((g) => planGroup(g, records, strategy));
}
