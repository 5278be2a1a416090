import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { ConfigurationError } from "@photo-dedupe/core-domain";
import { SILENT_LOGGER } from "../adapters/console-logger";
import { createNodeDedupeService } from "../adapters/node-dedupe-service";
import { CancellationSource } from "../application/cancellation";
import type { Clock } from "../ports/clock";
import type { ProgressEvent } from "../ports/progress-sink";
import type { RunRequest } from "../value-objects/run-request";

const SIDE = 64;

/** 8x8 blocks of either dark or light grey; never close to the mean. */
function blockPattern(invert = false): Buffer {
  const pixels = Buffer.alloc(SIDE * SIDE);
  for (let y = 0; y < SIDE; y++) {
    for (let x = 0; x < SIDE; x++) {
      const block = (y >> 3) * 8 + (x >> 3);
      const dark = (block * 7 + 3) % 5 < 2;
      pixels[y * SIDE + x] = dark !== invert ? 40 : 215;
    }
  }
  return pixels;
}

function pattern(invert = false) {
  return sharp(blockPattern(invert), { raw: { width: SIDE, height: SIDE, channels: 1 } });
}

class SteppingClock implements Clock {
  private ms = Date.parse("2024-01-01T00:00:00.000Z");
  now(): Date {
    const current = new Date(this.ms);
    this.ms += 500;
    return current;
  }
}

let root: string;
let photos: string;
let out: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "dedupe-service-"));
  photos = path.join(root, "photos");
  out = path.join(root, "out");
  await fs.mkdir(photos, { recursive: true });

  await pattern().png().toFile(path.join(photos, "a.png"));
  await fs.copyFile(path.join(photos, "a.png"), path.join(photos, "a_copy.png"));
  await pattern().resize(SIDE * 2, SIDE * 2, { kernel: "nearest" }).png().toFile(path.join(photos, "big.png"));
  await pattern(true).png().toFile(path.join(photos, "other.png"));
  await fs.writeFile(path.join(photos, "broken.jpg"), "not really a jpeg");
  await fs.writeFile(path.join(photos, "notes.txt"), "shopping list");
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

function service() {
  return createNodeDedupeService({ logger: SILENT_LOGGER, clock: new SteppingClock() });
}

function request(overrides: Partial<RunRequest> = {}): RunRequest {
  return {
    source: { rootFolder: photos },
    methods: { contentHash: {}, perceptualHash: { algorithms: ["ahash"], threshold: 0.9 } },
    strategy: "keep-first",
    concurrency: 2,
    ...overrides,
  };
}

async function listFiles(dir: string): Promise<string[]> {
  const found: string[] = [];
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const abs = path.join(dir, entry.name);
    if (entry.isDirectory()) found.push(...(await listFiles(abs)));
    else found.push(path.relative(root, abs));
  }
  return found.sort();
}

const p = (name: string) => path.join(photos, name);

describe("DedupeService", () => {
  it("finds exact and visually identical copies in preview without touching files", async () => {
    const events: ProgressEvent[] = [];
    const result = await service().run(request(), { progress: { report: (e) => events.push(e) } });

    expect(result.status).toBe("completed");
    expect(result.lastPhase).toBe("executing");
    expect(result.elapsedMs).toBe(500);
    expect(result.groups).toHaveLength(1);
    expect(result.groups[0]).toMatchObject({
      id: 1,
      files: [p("a.png"), p("a_copy.png"), p("big.png")],
      kind: "likely_exact",
      recommendedStrategy: "keep-first",
      triggeredMethods: ["contentHash", "perceptualHash"],
    });
    expect(result.plans).toEqual([
      {
        kind: "designated",
        groupId: 1,
        strategy: "keep-first",
        keeper: p("a.png"),
        duplicates: [p("a_copy.png"), p("big.png")],
        rationale: "kept first by path",
      },
    ]);
    expect(result.operations.map((o) => [o.source, o.dryRun, o.outcome])).toEqual([
      [p("a.png"), true, "skipped"],
      [p("a_copy.png"), true, "skipped"],
      [p("big.png"), true, "skipped"],
    ]);
    expect(result.failures.map((f) => [f.path, f.code])).toEqual([[p("broken.jpg"), "UNSUPPORTED_FORMAT"]]);
    expect(result.statistics).toMatchObject({
      filesScanned: 5,
      filesCompared: 4,
      comparisons: 5,
      groupCount: 1,
      duplicateCount: 2,
    });
    expect(Object.keys(result.files)).toEqual([p("a.png"), p("a_copy.png"), p("big.png")]);
    expect([...new Set(events.map((e) => e.phase))]).toEqual(["scanning", "extracting", "comparing", "grouping", "executing"]);
    expect(await listFiles(root)).toHaveLength(6);
  });

  it("gives the same groups on a second run", async () => {
    const first = await service().run(request());
    const second = await service().run(request());
    expect(second.groups).toEqual(first.groups);
  });

  it("keeps only byte-identical files together when perceptual hashing is off", async () => {
    const result = await service().run(request({ methods: { contentHash: {} } }));
    expect(result.groups.map((g) => [g.files, g.kind])).toEqual([[[p("a.png"), p("a_copy.png")], "exact"]]);
    expect(result.statistics.comparisons).toBe(0);
  });

  it("moves keepers and duplicates into the output folder and deletes nothing", async () => {
    const result = await service().run(request({ action: "move-to-organized-folders", outputFolder: out }));

    expect(result.operations.map((o) => o.outcome)).toEqual(["succeeded", "succeeded", "succeeded"]);
    expect(await listFiles(root)).toEqual([
      path.join("out", "duplicated", "a_copy.png"),
      path.join("out", "duplicated", "big.png"),
      path.join("out", "original", "a.png"),
      path.join("photos", "broken.jpg"),
      path.join("photos", "notes.txt"),
      path.join("photos", "other.png"),
    ]);
  });

  it("never scans its own output folder", async () => {
    const inside = path.join(photos, "sorted");
    await service().run(request({ action: "move-to-organized-folders", outputFolder: inside }));
    const again = await service().run(request({ outputFolder: inside }));

    expect(again.groups).toEqual([]);
    expect(again.statistics.filesScanned).toBe(2);
  });

  it("exports a report without touching the scanned files", async () => {
    const result = await service().run(request({ action: "export-report", outputFolder: out }));
    const reportPath = path.join(out, "dedupe-report.json");

    expect(result.reportPath).toBe(reportPath);
    expect(result.operations).toEqual([
      { kind: "export", source: reportPath, destination: reportPath, dryRun: false, outcome: "succeeded" },
    ]);
    const report = JSON.parse(await fs.readFile(reportPath, "utf-8"));
    expect(report.reportPath).toBe(reportPath);
    expect(report.groups[0].files.map((f: { path: string }) => f.path)).toEqual([
      p("a.png"),
      p("a_copy.png"),
      p("big.png"),
    ]);
    expect(await listFiles(photos)).toHaveLength(6);
  });

  it("scans an explicit file list and records files it cannot use", async () => {
    const missing = p("missing.jpg");
    const result = await service().run(request({ source: { files: [p("a.png"), p("a_copy.png"), missing] } }));

    expect(result.groups.map((g) => g.files)).toEqual([[p("a.png"), p("a_copy.png")]]);
    expect(result.failures.map((f) => [f.path, f.code])).toEqual([[missing, "UNREADABLE_FILE"]]);
  });

  it("returns a cancelled result when cancelled before starting", async () => {
    const source = new CancellationSource();
    source.cancel();
    const result = await service().run(request(), { cancellation: source });

    expect(result.status).toBe("cancelled");
    expect(result.lastPhase).toBe("scanning");
    expect(result.groups).toEqual([]);
    expect(result.operations).toEqual([]);
  });

  it("stops during extraction once cancelled", async () => {
    const source = new CancellationSource();
    const result = await service().run(request({ concurrency: 1 }), {
      cancellation: source,
      progress: {
        report: (e) => {
          if (e.phase === "extracting" && e.processed === 1) source.cancel();
        },
      },
    });

    expect(result.status).toBe("cancelled");
    expect(result.lastPhase).toBe("extracting");
    expect(result.statistics.filesCompared).toBe(1);
  });

  it("refuses a missing root folder before doing any work", async () => {
    const missing = path.join(root, "nope");
    const err = await service()
      .run(request({ source: { rootFolder: missing } }))
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({ issues: [`root folder does not exist: ${missing}`] });
  });
});
