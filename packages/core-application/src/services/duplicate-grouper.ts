import { setImmediate as yieldToEventLoop } from "node:timers/promises";

import {
  DETECTION_METHODS,
  compareByPath,
  recommendStrategy,
  type CombinedVerdict,
  type DetectionMethod,
  type DuplicateGroup,
  type DuplicateKind,
  type FileRecord,
  type MethodScores,
} from "@photo-dedupe/core-domain";

import type { CancellationToken } from "../ports/cancellation";
import { enabledMethods, type CombinePolicy } from "../value-objects/detection-settings";
import { UnionFind } from "../utils/union-find";
import { scorePair, type ScoringPolicy } from "./similarity-scorer";

export type GroupingOptions = {
  policy: ScoringPolicy;
  batchSize: number;
  cancellation?: CancellationToken;
  onBatch?: (done: number, total: number) => void;
};

export type GroupingOutcome = {
  groups: DuplicateGroup[];
  comparisons: number;
  cancelled: boolean;
};

type CandidatePlan = {
  total: number;
  pairs: () => Generator<[number, number]>;
};

/* ---------------- candidate generation ---------------- */

function requiredMatches(combine: CombinePolicy): number {
  return combine.mode === "at-least" ? combine.count : 1;
}

/**
 * Size is a necessary condition when no non-exact verdict can reach the
 * required number of matches without it. Content hash never matches on a
 * pair outside its own bucket, so it does not count here.
 */
export function sizeIsNecessary(policy: ScoringPolicy): boolean {
  const fuzzy = enabledMethods(policy.methods).filter((m) => m !== "contentHash");
  if (!fuzzy.includes("size")) return false;
  return requiredMatches(policy.combine) > fuzzy.length - 1;
}

function hashBuckets(records: FileRecord[]): Map<string, number[]> {
  const buckets = new Map<string, number[]>();
  records.forEach((r, i) => {
    const hash = r.features?.contentHash?.value;
    if (hash === undefined) return;
    const bucket = buckets.get(hash);
    if (bucket) bucket.push(i);
    else buckets.set(hash, [i]);
  });
  return buckets;
}

function planCandidates(records: FileRecord[], policy: ScoringPolicy): CandidatePlan {
  const methods = enabledMethods(policy.methods);
  const n = records.length;

  const sameContent = (i: number, j: number) => {
    const a = records[i].features?.contentHash?.value;
    return a !== undefined && a === records[j].features?.contentHash?.value;
  };

  if (methods.length === 1 && methods[0] === "contentHash") {
    return { total: 0, pairs: function* (): Generator<[number, number]> {} };
  }

  if (sizeIsNecessary(policy)) {
    const tolerance = policy.methods.size.tolerance;
    const bySize = records
      .map((r, i) => ({ i, size: r.size }))
      .sort((x, y) => x.size - y.size || x.i - y.i);

    const sweep = function* (): Generator<[number, number]> {
      for (let p = 0; p < bySize.length; p++) {
        for (let q = p + 1; q < bySize.length; q++) {
          const small = bySize[p].size;
          const large = bySize[q].size;
          if (large - small > tolerance * large) break;
          const i = Math.min(bySize[p].i, bySize[q].i);
          const j = Math.max(bySize[p].i, bySize[q].i);
          if (!sameContent(i, j)) yield [i, j];
        }
      }
    };

    let total = 0;
    for (const _pair of sweep()) total++;
    return { total, pairs: sweep };
  }

  let intraBucket = 0;
  for (const bucket of hashBuckets(records).values()) {
    intraBucket += (bucket.length * (bucket.length - 1)) / 2;
  }

  return {
    total: (n * (n - 1)) / 2 - intraBucket,
    pairs: function* (): Generator<[number, number]> {
      for (let i = 0; i < n; i++) {
        for (let j = i + 1; j < n; j++) {
          if (!sameContent(i, j)) yield [i, j];
        }
      }
    },
  };
}

/* ---------------- group assembly ---------------- */

function classify(edges: CombinedVerdict[]): DuplicateKind {
  const exactEdges = edges.filter((e) => e.exact).length;
  if (exactEdges === edges.length) return "exact";

  const nearIdentical = edges.some((e) =>
    e.verdicts.some((v) => v.method === "perceptualHash" && v.score >= 0.98)
  );
  if (exactEdges > 0 || nearIdentical) return "likely_exact";

  if (edges.some((e) => e.matchedMethods.includes("perceptualHash"))) return "visually_similar";
  return "similar";
}

function buildGroup(id: number, members: FileRecord[], edges: CombinedVerdict[]): DuplicateGroup {
  const triggered = new Set<DetectionMethod>();
  const memberScores: Record<string, MethodScores> = {};
  for (const m of members) memberScores[m.path] = {};

  let score = 0;
  for (const edge of edges) {
    score = Math.max(score, edge.score);
    for (const method of edge.matchedMethods) triggered.add(method);
    for (const v of edge.verdicts) {
      for (const p of [edge.a, edge.b]) {
        const current = memberScores[p][v.method];
        if (current === undefined || v.score > current) memberScores[p][v.method] = v.score;
      }
    }
  }

  const sizes = members.map((m) => m.size);
  const totalBytes = sizes.reduce((sum, s) => sum + s, 0);
  const kind = classify(edges);

  return {
    id,
    files: members.map((m) => m.path),
    triggeredMethods: DETECTION_METHODS.filter((m) => triggered.has(m)),
    kind,
    recommendedStrategy: recommendStrategy(kind),
    score,
    memberScores,
    totalBytes,
    potentialSavingsBytes: totalBytes - Math.max(...sizes),
  };
}

/**
 * Clusters records into duplicate groups: duplicate verdicts are edges,
 * groups are the connected components with two or more members. Output
 * depends only on the input set and the policy, never on input order.
 */
export async function groupDuplicates(input: FileRecord[], options: GroupingOptions): Promise<GroupingOutcome> {
  const { policy, batchSize, cancellation, onBatch } = options;
  const records = [...input].sort(compareByPath);
  const uf = new UnionFind(records.length);
  const edges: { i: number; verdict: CombinedVerdict }[] = [];

  if (policy.methods.contentHash.enabled) {
    for (const bucket of hashBuckets(records).values()) {
      const [first, ...rest] = bucket;
      for (const other of rest) {
        uf.union(first, other);
        edges.push({ i: first, verdict: scorePair(records[first], records[other], policy) });
      }
    }
  }

  const plan = planCandidates(records, policy);
  let comparisons = 0;
  let cancelled = false;

  for (const [i, j] of plan.pairs()) {
    if (comparisons % batchSize === 0 && comparisons > 0) {
      onBatch?.(comparisons, plan.total);
      await yieldToEventLoop();
    }
    if (comparisons % batchSize === 0 && cancellation?.isCancellationRequested) {
      cancelled = true;
      break;
    }

    const verdict = scorePair(records[i], records[j], policy);
    comparisons++;
    if (verdict.isDuplicate) {
      uf.union(i, j);
      edges.push({ i, verdict });
    }
  }
  if (!cancelled) onBatch?.(comparisons, plan.total);

  const components = uf.components(2);
  const edgesByRoot = new Map<number, CombinedVerdict[]>();
  for (const { i, verdict } of edges) {
    const root = uf.find(i);
    const list = edgesByRoot.get(root);
    if (list) list.push(verdict);
    else edgesByRoot.set(root, [verdict]);
  }

  const groups = components.map((members, idx) =>
    buildGroup(
      idx + 1,
      members.map((m) => records[m]),
      edgesByRoot.get(uf.find(members[0])) ?? []
    )
  );

  return { groups, comparisons, cancelled };
}
