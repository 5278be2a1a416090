import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { ContentHash } from "@photo-dedupe/core-domain";
import type { FileHasher } from "../ports/file-hasher";

export class NodeFileHasher implements FileHasher {
  async hashFile(absolutePath: string): Promise<ContentHash> {
    const algo: ContentHash["algorithm"] = "sha256";

    return new Promise((resolve, reject) => {
      const hash = createHash(algo);
      const stream = createReadStream(absolutePath);

      stream.on("data", (chunk) => hash.update(chunk));
      stream.on("error", reject);
      stream.on("end", () => {
        resolve({ algorithm: algo, value: hash.digest("hex") });
      });
    });
  }
}
