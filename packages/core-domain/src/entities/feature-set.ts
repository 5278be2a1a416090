import type { PerceptualAlgorithm } from "../value-objects/detection-method";

export type ContentHash = {
  algorithm: "sha256";
  value: string;
};

export type PerceptualHash = {
  algorithm: PerceptualAlgorithm;
  /** Bit width of the fingerprint (64 for every built-in algorithm). */
  bits: number;
  /** Hex encoding, most significant bit first. */
  hex: string;
};

export type ExifSummary = {
  make?: string;
  model?: string;
  width?: number;
  height?: number;
  focalLength?: number;
  iso?: number;
  exposureTime?: number;
  fNumber?: number;
  flash?: number;
  orientation?: number;
  capturedAtIso?: string;
};

/**
 * Signals extracted for one file. A field is present only when the
 * matching detection method was enabled for the run.
 */
export type FeatureSet = {
  contentHash?: ContentHash;
  perceptualHashes?: PerceptualHash[];
  exifSummary?: ExifSummary;
  normalizedName?: string;
  sizeBytes?: number;
};
