import {
  PERCEPTUAL_ALGORITHMS,
  type DetectionMethod,
  type PerceptualAlgorithm,
} from "@photo-dedupe/core-domain";

export type MethodSettings = {
  contentHash: { enabled: boolean };
  perceptualHash: { enabled: boolean; threshold: number; algorithms: PerceptualAlgorithm[] };
  filename: { enabled: boolean; threshold: number };
  size: { enabled: boolean; tolerance: number };
  metadata: { enabled: boolean; minMatchingFields: number };
};

/**
 * Caller-facing shape. When given, only the methods listed are enabled
 * (unless a listed entry says `enabled: false`); missing values fall back
 * to the defaults below.
 */
export type MethodSettingsInput = {
  [K in keyof MethodSettings]?: Partial<MethodSettings[K]>;
};

export type CombinePolicy =
  | { mode: "any" }
  | { mode: "at-least"; count: number }
  | { mode: "weighted"; threshold: number; weights?: Partial<Record<DetectionMethod, number>> };

export const DEFAULT_PERCEPTUAL_THRESHOLD = 0.9;
export const DEFAULT_FILENAME_THRESHOLD = 0.8;
export const DEFAULT_SIZE_TOLERANCE = 0.02;
export const DEFAULT_METADATA_MIN_FIELDS = 3;

export const DEFAULT_COMBINE_POLICY: CombinePolicy = { mode: "any" };

export function defaultMethodSettings(): MethodSettings {
  return {
    contentHash: { enabled: true },
    perceptualHash: {
      enabled: true,
      threshold: DEFAULT_PERCEPTUAL_THRESHOLD,
      algorithms: [...PERCEPTUAL_ALGORITHMS],
    },
    filename: { enabled: false, threshold: DEFAULT_FILENAME_THRESHOLD },
    size: { enabled: false, tolerance: DEFAULT_SIZE_TOLERANCE },
    metadata: { enabled: false, minMatchingFields: DEFAULT_METADATA_MIN_FIELDS },
  };
}

export function resolveMethodSettings(input?: MethodSettingsInput): MethodSettings {
  const defaults = defaultMethodSettings();
  if (!input) return defaults;

  return {
    contentHash: { ...defaults.contentHash, enabled: input.contentHash?.enabled ?? input.contentHash !== undefined },
    perceptualHash: {
      ...defaults.perceptualHash,
      ...input.perceptualHash,
      enabled: input.perceptualHash?.enabled ?? input.perceptualHash !== undefined,
    },
    filename: {
      ...defaults.filename,
      ...input.filename,
      enabled: input.filename?.enabled ?? input.filename !== undefined,
    },
    size: {
      ...defaults.size,
      ...input.size,
      enabled: input.size?.enabled ?? input.size !== undefined,
    },
    metadata: {
      ...defaults.metadata,
      ...input.metadata,
      enabled: input.metadata?.enabled ?? input.metadata !== undefined,
    },
  };
}

export function enabledMethods(settings: MethodSettings): DetectionMethod[] {
  const out: DetectionMethod[] = [];
  if (settings.contentHash.enabled) out.push("contentHash");
  if (settings.perceptualHash.enabled) out.push("perceptualHash");
  if (settings.filename.enabled) out.push("filename");
  if (settings.size.enabled) out.push("size");
  if (settings.metadata.enabled) out.push("metadata");
  return out;
}
