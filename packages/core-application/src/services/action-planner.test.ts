import { describe, it, expect } from "vitest";
import { recommendStrategy, type DuplicateGroup, type DuplicateKind, type FileRecord } from "@photo-dedupe/core-domain";
import { planGroup, planGroups } from "./action-planner";

function rec(path: string, size: number, mtimeMs: number): FileRecord {
  return { path, size, mtimeMs };
}

function group(id: number, members: FileRecord[], kind: DuplicateKind = "exact"): DuplicateGroup {
  const totalBytes = members.reduce((s, m) => s + m.size, 0);
  return {
    id,
    files: members.map((m) => m.path).sort(),
    triggeredMethods: ["contentHash"],
    kind,
    recommendedStrategy: recommendStrategy(kind),
    score: 1,
    memberScores: {},
    totalBytes,
    potentialSavingsBytes: totalBytes - Math.max(...members.map((m) => m.size)),
  };
}

function index(records: FileRecord[]) {
  return new Map(records.map((r) => [r.path, r]));
}

describe("action-planner", () => {
  const a = rec("/p/a.jpg", 100, 5);
  const b = rec("/p/b.jpg", 300, 9);
  const c = rec("/p/c.jpg", 300, 1);
  const records = index([a, b, c]);
  const g = group(1, [a, b, c]);

  it("keeps the largest file, older first on equal size", () => {
    expect(planGroup(g, records, "keep-largest")).toEqual({
      kind: "designated",
      groupId: 1,
      strategy: "keep-largest",
      keeper: "/p/c.jpg",
      duplicates: ["/p/a.jpg", "/p/b.jpg"],
      rationale: "kept largest (300 B)",
    });
  });

  it("falls back to path order when size and age tie", () => {
    const x = rec("/p/x.jpg", 300, 1);
    const y = rec("/p/y.jpg", 300, 1);
    const plan = planGroup(group(2, [y, x]), index([x, y]), "keep-largest");
    expect(plan.kind === "designated" && plan.keeper).toBe("/p/x.jpg");
  });

  it("keeps the oldest file", () => {
    const plan = planGroup(g, records, "keep-oldest");
    expect(plan).toMatchObject({
      keeper: "/p/c.jpg",
      duplicates: ["/p/a.jpg", "/p/b.jpg"],
      rationale: "kept oldest (modified 1970-01-01T00:00:00.001Z)",
    });
  });

  it("keeps the first path", () => {
    expect(planGroup(g, records, "keep-first")).toMatchObject({
      keeper: "/p/a.jpg",
      duplicates: ["/p/b.jpg", "/p/c.jpg"],
      rationale: "kept first by path",
    });
  });

  it("produces review plans without a keeper under preview-only", () => {
    expect(planGroup(g, records, "preview-only")).toEqual({
      kind: "review",
      groupId: 1,
      strategy: "preview-only",
      files: ["/p/a.jpg", "/p/b.jpg", "/p/c.jpg"],
      rationale: "review 3 files (exact, matched by contentHash)",
    });
  });

  it("follows the recommendation of each group under auto", () => {
    expect(planGroup(g, records, "auto")).toEqual({
      kind: "designated",
      groupId: 1,
      strategy: "keep-largest",
      keeper: "/p/c.jpg",
      duplicates: ["/p/a.jpg", "/p/b.jpg"],
      rationale: "recommended for exact: kept largest (300 B)",
    });
    expect(planGroup(group(3, [a, b, c], "likely_exact"), records, "auto")).toMatchObject({
      strategy: "keep-first",
      keeper: "/p/a.jpg",
      rationale: "recommended for likely_exact: kept first by path",
    });
  });

  it("leaves groups that need a manual review without a keeper under auto", () => {
    expect(planGroup(group(4, [a, b], "visually_similar"), records, "auto")).toEqual({
      kind: "review",
      groupId: 4,
      strategy: "auto",
      files: ["/p/a.jpg", "/p/b.jpg"],
      rationale: "review 2 files (visually_similar, matched by contentHash)",
    });
  });

  it("plans every group in order", () => {
    const x = rec("/q/x.jpg", 10, 0);
    const y = rec("/q/y.jpg", 20, 0);
    const plans = planGroups([g, group(2, [x, y])], index([a, b, c, x, y]), "keep-largest");
    expect(plans.map((p) => p.groupId)).toEqual([1, 2]);
    expect(plans[1]).toMatchObject({ keeper: "/q/y.jpg", duplicates: ["/q/x.jpg"] });
  });

  it("refuses a group that references an unknown file", () => {
    expect(() => planGroup(g, index([a, b]), "keep-first")).toThrow("Group 1 references unknown file /p/c.jpg");
  });
});
