import { describe, it, expect } from "vitest";
import { UnreadableFileError, UnsupportedFormatError, type ContentHash, type ExifSummary, type FileRecord } from "@photo-dedupe/core-domain";
import { SILENT_LOGGER } from "../adapters/console-logger";
import type { DetectedFormat, FormatDetector } from "../ports/format-detector";
import type { FileHasher } from "../ports/file-hasher";
import type { GreyscaleImage, ImageDecoder, ImageDimensions } from "../ports/image-decoder";
import type { MetadataReader } from "../ports/metadata-reader";
import { resolveMethodSettings, type MethodSettingsInput } from "../value-objects/detection-settings";
import { FeatureExtractor, type ExtractionSettings } from "./feature-extractor";

class FakeHasher implements FileHasher {
  calls: string[] = [];
  constructor(private readonly impl: (p: string) => Promise<ContentHash> = async (p) => ({ algorithm: "sha256", value: `h:${p}` })) {}
  hashFile(p: string) {
    this.calls.push(p);
    return this.impl(p);
  }
}

class FakeDecoder implements ImageDecoder {
  calls: Array<[number, number]> = [];
  dimensionCalls = 0;
  constructor(private readonly fail = false) {}
  async decodeGreyscale(_p: string, width: number, height: number): Promise<GreyscaleImage> {
    this.calls.push([width, height]);
    if (this.fail) throw new Error("corrupt JPEG data");
    return { width, height, pixels: new Uint8Array(width * height).fill(128) };
  }
  async readDimensions(): Promise<ImageDimensions | null> {
    this.dimensionCalls++;
    return { width: 640, height: 480 };
  }
}

class FakeDetector implements FormatDetector {
  calls = 0;
  constructor(private readonly format: DetectedFormat | null = { ext: "jpg", mime: "image/jpeg" }) {}
  async detect() {
    this.calls++;
    return this.format;
  }
}

function reader(impl: () => Promise<ExifSummary>): MetadataReader {
  return { readExif: impl };
}

const record: FileRecord = { path: "/p/IMG_0042.jpg", size: 2048, mtimeMs: 0 };

function settings(methods: MethodSettingsInput, timeoutMs = 1000): ExtractionSettings {
  return { methods: resolveMethodSettings(methods), extensions: ["jpg", "png"], timeoutMs };
}

function extractor(parts: {
  hasher?: FileHasher;
  decoder?: ImageDecoder;
  metadataReader?: MetadataReader;
  formatDetector?: FormatDetector;
}) {
  return new FeatureExtractor({
    hasher: parts.hasher ?? new FakeHasher(),
    decoder: parts.decoder ?? new FakeDecoder(),
    metadataReader: parts.metadataReader ?? reader(async () => ({})),
    formatDetector: parts.formatDetector ?? new FakeDetector(),
    logger: SILENT_LOGGER,
  });
}

async function failure(work: Promise<unknown>): Promise<unknown> {
  return work.then(
    () => {
      throw new Error("expected a rejection");
    },
    (err: unknown) => err
  );
}

describe("feature-extractor", () => {
  it("computes name and size without opening the file", async () => {
    const hasher = new FakeHasher();
    const decoder = new FakeDecoder();
    const detector = new FakeDetector();

    const features = await extractor({ hasher, decoder, formatDetector: detector }).extract(
      record,
      settings({ filename: {}, size: {} })
    );

    expect(features).toEqual({ normalizedName: "img0042", sizeBytes: 2048 });
    expect(hasher.calls).toEqual([]);
    expect(decoder.calls).toEqual([]);
    expect(detector.calls).toBe(0);
  });

  it("hashes content and decodes one bitmap per algorithm", async () => {
    const hasher = new FakeHasher();
    const decoder = new FakeDecoder();

    const features = await extractor({ hasher, decoder }).extract(
      record,
      settings({ contentHash: {}, perceptualHash: { algorithms: ["ahash", "dhash"] } })
    );

    expect(features.contentHash).toEqual({ algorithm: "sha256", value: "h:/p/IMG_0042.jpg" });
    expect(decoder.calls).toEqual([
      [8, 8],
      [9, 8],
    ]);
    expect(features.perceptualHashes).toEqual([
      { algorithm: "ahash", bits: 64, hex: "0000000000000000" },
      { algorithm: "dhash", bits: 64, hex: "0000000000000000" },
    ]);
  });

  it("rejects an extension outside the configured list", async () => {
    const err = await failure(
      extractor({}).extract({ ...record, path: "/p/notes.txt" }, settings({ filename: {} }))
    );
    expect(err).toBeInstanceOf(UnsupportedFormatError);
    expect(err).toMatchObject({ code: "UNSUPPORTED_FORMAT", path: "/p/notes.txt" });
  });

  it("rejects content that is not an image", async () => {
    const err = await failure(
      extractor({ formatDetector: new FakeDetector({ ext: "pdf", mime: "application/pdf" }) }).extract(
        record,
        settings({ contentHash: {} })
      )
    );
    expect(err).toBeInstanceOf(UnsupportedFormatError);
    expect(err).toMatchObject({ message: "Content is application/pdf, not an image" });
  });

  it("rejects content no signature recognises", async () => {
    const err = await failure(extractor({ formatDetector: new FakeDetector(null) }).extract(record, settings({ contentHash: {} })));
    expect(err).toMatchObject({ code: "UNSUPPORTED_FORMAT", message: "Content is not a recognised image format" });
  });

  it("reports an image that cannot be decoded as unreadable", async () => {
    const err = await failure(
      extractor({ decoder: new FakeDecoder(true) }).extract(record, settings({ perceptualHash: { algorithms: ["phash"] } }))
    );
    expect(err).toBeInstanceOf(UnreadableFileError);
    expect(err).toMatchObject({ message: "Could not decode /p/IMG_0042.jpg: corrupt JPEG data" });
  });

  it("wraps unexpected read errors", async () => {
    const hasher = new FakeHasher(async () => {
      throw new Error("EIO");
    });
    const err = await failure(extractor({ hasher }).extract(record, settings({ contentHash: {} })));
    expect(err).toBeInstanceOf(UnreadableFileError);
    expect(err).toMatchObject({ code: "UNREADABLE_FILE", message: "Could not read /p/IMG_0042.jpg: EIO" });
  });

  it("gives up on a file that takes too long", async () => {
    const hasher = new FakeHasher(() => new Promise<ContentHash>(() => {}));
    const err = await failure(extractor({ hasher }).extract(record, settings({ contentHash: {} }, 20)));
    expect(err).toBeInstanceOf(UnreadableFileError);
    expect(err).toMatchObject({
      message: "Could not read /p/IMG_0042.jpg: Feature extraction timed out after 20 ms",
    });
  });

  it("falls back to decoded dimensions when EXIF is unavailable", async () => {
    const decoder = new FakeDecoder();
    const features = await extractor({
      decoder,
      metadataReader: reader(async () => {
        throw new Error("Unknown file format");
      }),
    }).extract(record, settings({ metadata: {} }));

    expect(features.exifSummary).toEqual({ width: 640, height: 480 });
    expect(decoder.dimensionCalls).toBe(1);
  });

  it("keeps EXIF dimensions when present", async () => {
    const decoder = new FakeDecoder();
    const summary = { make: "Canon", width: 4000, height: 3000 };
    const features = await extractor({ decoder, metadataReader: reader(async () => summary) }).extract(
      record,
      settings({ metadata: {} })
    );

    expect(features.exifSummary).toEqual(summary);
    expect(decoder.dimensionCalls).toBe(0);
  });
});
