import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { MoveFailedError } from "@photo-dedupe/core-domain";
import { NodeFileMover } from "./node-file-mover";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "mover-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("NodeFileMover", () => {
  const mover = new NodeFileMover();

  it("renames the file into an existing folder", async () => {
    const source = path.join(dir, "a.jpg");
    const destination = path.join(dir, "dest", "a.jpg");
    await fs.writeFile(source, "A");
    await mover.ensureDir(path.dirname(destination));

    await mover.move(source, destination);

    expect(await mover.exists(source)).toBe(false);
    expect(await fs.readFile(destination, "utf-8")).toBe("A");
  });

  it("refuses to overwrite and leaves both files alone", async () => {
    const source = path.join(dir, "a.jpg");
    const destination = path.join(dir, "b.jpg");
    await fs.writeFile(source, "A");
    await fs.writeFile(destination, "B");

    const err = await mover.move(source, destination).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MoveFailedError);
    expect(err).toMatchObject({ message: `Cannot move ${source}: destination already exists`, destination });
    expect(await fs.readFile(source, "utf-8")).toBe("A");
    expect(await fs.readFile(destination, "utf-8")).toBe("B");
  });

  it("explains a missing source", async () => {
    const source = path.join(dir, "gone.jpg");
    await expect(mover.move(source, path.join(dir, "x.jpg"))).rejects.toThrow(
      `Cannot move ${source}: source file no longer exists`
    );
  });
});
