import type { ExifSummary } from "@photo-dedupe/core-domain";

export interface MetadataReader {
  /** Resolves to an empty summary when the file carries no EXIF block. */
  readExif(absolutePath: string): Promise<ExifSummary>;
}
