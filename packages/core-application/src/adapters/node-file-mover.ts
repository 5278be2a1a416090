import fs from "node:fs/promises";

import { MoveFailedError } from "@photo-dedupe/core-domain";
import type { FileMover } from "../ports/file-mover";

function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function describeFailure(code: string | undefined, err: unknown): string {
  switch (code) {
    case "EXDEV":
      return "destination is on a different device";
    case "EACCES":
    case "EPERM":
      return "permission denied";
    case "ENAMETOOLONG":
      return "destination path is too long";
    case "ENOENT":
      return "source file no longer exists";
    case "EEXIST":
      return "destination already exists";
    default:
      return err instanceof Error ? err.message : String(err);
  }
}

/**
 * Moves with rename(2). Never copies and never deletes: a move the
 * filesystem cannot do in one step fails with MoveFailedError.
 */
export class NodeFileMover implements FileMover {
  async exists(absolutePath: string): Promise<boolean> {
    try {
      await fs.access(absolutePath);
      return true;
    } catch {
      return false;
    }
  }

  async ensureDir(absolutePath: string): Promise<void> {
    await fs.mkdir(absolutePath, { recursive: true });
  }

  async move(source: string, destination: string): Promise<void> {
    if (await this.exists(destination)) {
      throw new MoveFailedError(source, destination, `Cannot move ${source}: destination already exists`);
    }

    try {
      await fs.rename(source, destination);
    } catch (err) {
      const code = errnoCode(err);
      throw new MoveFailedError(source, destination, `Cannot move ${source}: ${describeFailure(code, err)}`, err);
    }
  }
}
