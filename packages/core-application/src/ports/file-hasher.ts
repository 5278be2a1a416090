import type { ContentHash } from "@photo-dedupe/core-domain";

export interface FileHasher {
  hashFile(absolutePath: string): Promise<ContentHash>;
}
