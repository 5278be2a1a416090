import path from "node:path";

import {
  UnreadableFileError,
  UnsupportedFormatError,
  isDedupeError,
  type ExifSummary,
  type FeatureSet,
  type FileRecord,
  type PerceptualHash,
} from "@photo-dedupe/core-domain";

import type { FileHasher } from "../ports/file-hasher";
import type { FormatDetector } from "../ports/format-detector";
import type { ImageDecoder } from "../ports/image-decoder";
import type { Logger } from "../ports/logger";
import type { MetadataReader } from "../ports/metadata-reader";
import { withTimeout } from "../application/with-timeout";
import type { MethodSettings } from "../value-objects/detection-settings";
import { normalizeName } from "../utils/name-similarity";
import { computePerceptualHash, sampleSize } from "../utils/perceptual-hash";

export type ExtractionSettings = {
  methods: MethodSettings;
  /** Lowercase, without the dot. */
  extensions: readonly string[];
  timeoutMs: number;
};

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Computes only the signals whose method is enabled. Hashing and decoding
 * dominate the cost, so a run with those disabled never opens a file.
 */
export class FeatureExtractor {
  constructor(
    private readonly deps: {
      hasher: FileHasher;
      decoder: ImageDecoder;
      metadataReader: MetadataReader;
      formatDetector: FormatDetector;
      logger: Logger;
    }
  ) {}

  /** @throws UnreadableFileError | UnsupportedFormatError */
  async extract(record: FileRecord, settings: ExtractionSettings): Promise<FeatureSet> {
    try {
      return await withTimeout(this.extractUnbounded(record, settings), settings.timeoutMs, "Feature extraction");
    } catch (err) {
      if (isDedupeError(err)) throw err;
      throw new UnreadableFileError(record.path, `Could not read ${record.path}: ${describe(err)}`, err);
    }
  }

  private async extractUnbounded(record: FileRecord, settings: ExtractionSettings): Promise<FeatureSet> {
    const { methods } = settings;
    const ext = path.extname(record.path).slice(1).toLowerCase();
    if (!settings.extensions.includes(ext)) {
      throw new UnsupportedFormatError(record.path, `Extension ".${ext}" is not a recognised image type`);
    }

    const readsContent = methods.contentHash.enabled || methods.perceptualHash.enabled || methods.metadata.enabled;
    if (readsContent) await this.assertImage(record.path);

    const features: FeatureSet = {};

    if (methods.contentHash.enabled) {
      features.contentHash = await this.deps.hasher.hashFile(record.path);
    }
    if (methods.perceptualHash.enabled) {
      features.perceptualHashes = await this.perceptualHashes(record.path, methods);
    }
    if (methods.metadata.enabled) {
      features.exifSummary = await this.exifSummary(record.path);
    }
    if (methods.filename.enabled) {
      features.normalizedName = normalizeName(record.path);
    }
    if (methods.size.enabled) {
      features.sizeBytes = record.size;
    }

    return features;
  }

  private async assertImage(absolutePath: string): Promise<void> {
    const format = await this.deps.formatDetector.detect(absolutePath);
    if (!format || !format.mime.startsWith("image/")) {
      throw new UnsupportedFormatError(
        absolutePath,
        format ? `Content is ${format.mime}, not an image` : "Content is not a recognised image format"
      );
    }
  }

  private async perceptualHashes(absolutePath: string, methods: MethodSettings): Promise<PerceptualHash[]> {
    const hashes: PerceptualHash[] = [];
    for (const algorithm of methods.perceptualHash.algorithms) {
      const { width, height } = sampleSize(algorithm);
      try {
        const image = await this.deps.decoder.decodeGreyscale(absolutePath, width, height);
        hashes.push(computePerceptualHash(algorithm, image));
      } catch (err) {
        throw new UnreadableFileError(absolutePath, `Could not decode ${absolutePath}: ${describe(err)}`, err);
      }
    }
    return hashes;
  }

  /** Best-effort: a file without EXIF gets an empty summary. */
  private async exifSummary(absolutePath: string): Promise<ExifSummary> {
    let summary: ExifSummary = {};
    try {
      summary = await this.deps.metadataReader.readExif(absolutePath);
    } catch (err) {
      this.deps.logger.debug("EXIF extraction failed", { path: absolutePath, error: describe(err) });
    }

    if (summary.width === undefined || summary.height === undefined) {
      try {
        const dims = await this.deps.decoder.readDimensions(absolutePath);
        if (dims) summary = { ...summary, width: dims.width, height: dims.height };
      } catch (err) {
        this.deps.logger.debug("Could not read image dimensions", { path: absolutePath, error: describe(err) });
      }
    }
    return summary;
  }
}
