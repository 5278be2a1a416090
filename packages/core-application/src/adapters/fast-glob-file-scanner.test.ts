import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { FastGlobFileScanner, isInside } from "./fast-glob-file-scanner";

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "scanner-"));
  const files: Record<string, string> = {
    "a.jpg": "aaaa",
    "B.JPG": "bb",
    "sub/c.png": "c",
    "notes.txt": "n",
    ".hidden.jpg": "h",
    "out/d.jpg": "d",
  };
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content);
  }
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("FastGlobFileScanner", () => {
  it("walks the folder for image extensions in any case, skipping excluded folders", async () => {
    const result = await new FastGlobFileScanner().scan(
      { rootFolder: root },
      { extensions: ["jpg", "png"], exclude: [path.join(root, "out")] }
    );

    expect(result.failures).toEqual([]);
    expect(result.records.map((r) => [path.relative(root, r.path), r.size])).toEqual([
      ["B.JPG", 2],
      ["a.jpg", 4],
      [path.join("sub", "c.png"), 1],
    ]);
  });

  it("checks an explicit file list and reports what it cannot use", async () => {
    const a = path.join(root, "a.jpg");
    const missing = path.join(root, "missing.jpg");
    const notes = path.join(root, "notes.txt");

    const result = await new FastGlobFileScanner().scan({ files: [a, missing, notes, a] }, { extensions: ["jpg"] });

    expect(result.records.map((r) => r.path)).toEqual([a]);
    expect(result.failures.map((f) => [f.path, f.code])).toEqual([
      [missing, "UNREADABLE_FILE"],
      [notes, "UNSUPPORTED_FORMAT"],
    ]);
    expect(result.failures[1].message).toBe("Unsupported extension: notes.txt");
  });
});

describe("isInside", () => {
  it("matches the folder and its descendants only", () => {
    expect(isInside("/data/out/x.jpg", "/data/out")).toBe(true);
    expect(isInside("/data/out", "/data/out")).toBe(true);
    expect(isInside("/data/output/x.jpg", "/data/out")).toBe(false);
    expect(isInside("/data/x.jpg", "/data/out")).toBe(false);
  });
});
