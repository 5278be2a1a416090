import { describe, it, expect } from "vitest";
import { UnionFind } from "./union-find";

describe("union-find", () => {
  it("merges transitively and lists components by their smallest member", () => {
    const uf = new UnionFind(6);
    uf.union(3, 4);
    uf.union(0, 3);
    uf.union(2, 1);

    expect(uf.components(2)).toEqual([
      [0, 3, 4],
      [1, 2],
    ]);
    expect(uf.components()).toEqual([[0, 3, 4], [1, 2], [5]]);
  });

  it("reports whether a union joined two sets", () => {
    const uf = new UnionFind(3);
    expect(uf.union(0, 1)).toBe(true);
    expect(uf.union(1, 0)).toBe(false);
    expect(uf.find(1)).toBe(uf.find(0));
  });
});
