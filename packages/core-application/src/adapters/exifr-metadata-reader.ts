import { parse as parseExif } from "exifr";
import type { ExifSummary } from "@photo-dedupe/core-domain";
import type { MetadataReader } from "../ports/metadata-reader";

const TAGS = [
  "Make",
  "Model",
  "ExifImageWidth",
  "ExifImageHeight",
  "FocalLength",
  "ISO",
  "ExposureTime",
  "FNumber",
  "Flash",
  "Orientation",
  "DateTimeOriginal",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function text(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.replace(/\0/g, "").trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function timestamp(value: unknown): string | undefined {
  if (value instanceof Date && !Number.isNaN(value.getTime())) return value.toISOString();
  return text(value);
}

/** Maps raw (untranslated) exifr tag values onto an ExifSummary. */
export function toExifSummary(raw: unknown): ExifSummary {
  if (!isRecord(raw)) return {};

  return {
    make: text(raw.Make),
    model: text(raw.Model),
    width: num(raw.ExifImageWidth),
    height: num(raw.ExifImageHeight),
    focalLength: num(raw.FocalLength),
    iso: num(raw.ISO),
    exposureTime: num(raw.ExposureTime),
    fNumber: num(raw.FNumber),
    flash: num(raw.Flash),
    orientation: num(raw.Orientation),
    capturedAtIso: timestamp(raw.DateTimeOriginal),
  };
}

export class ExifrMetadataReader implements MetadataReader {
  async readExif(absolutePath: string): Promise<ExifSummary> {
    const raw: unknown = await parseExif(absolutePath, { pick: TAGS, translateValues: false });
    return toExifSummary(raw);
  }
}
