import {
  DETECTION_METHODS,
  type CombinedVerdict,
  type DetectionMethod,
  type ExifSummary,
  type FeatureSet,
  type FileRecord,
  type PairVerdict,
} from "@photo-dedupe/core-domain";

import type { CombinePolicy, MethodSettings } from "../value-objects/detection-settings";
import { nameSimilarity } from "../utils/name-similarity";
import { perceptualSimilarity } from "../utils/perceptual-hash";

export type ScoringPolicy = {
  methods: MethodSettings;
  combine: CombinePolicy;
};

/** Returns null when the method cannot participate for this pair. */
type Comparator = (a: FeatureSet, b: FeatureSet, settings: MethodSettings) => PairVerdict | null;

/* ---------------- metadata ---------------- */

type ExifField = {
  name: string;
  read: (s: ExifSummary) => string | number | undefined;
};

const EXIF_FIELDS: ExifField[] = [
  { name: "make", read: (s) => s.make },
  { name: "model", read: (s) => s.model },
  {
    name: "dimensions",
    read: (s) => (s.width !== undefined && s.height !== undefined ? `${s.width}x${s.height}` : undefined),
  },
  { name: "focalLength", read: (s) => s.focalLength },
  { name: "iso", read: (s) => s.iso },
  { name: "exposureTime", read: (s) => s.exposureTime },
  { name: "fNumber", read: (s) => s.fNumber },
  { name: "capturedAt", read: (s) => s.capturedAtIso },
];

export function compareExif(a: ExifSummary, b: ExifSummary): { comparable: number; agreeing: string[] } {
  let comparable = 0;
  const agreeing: string[] = [];
  for (const field of EXIF_FIELDS) {
    const va = field.read(a);
    const vb = field.read(b);
    if (va === undefined || vb === undefined) continue;
    comparable++;
    if (va === vb) agreeing.push(field.name);
  }
  return { comparable, agreeing };
}

/* ---------------- comparators ---------------- */

const COMPARATORS: Record<DetectionMethod, Comparator> = {
  contentHash: (a, b) => {
    if (!a.contentHash || !b.contentHash) return null;
    const matched =
      a.contentHash.algorithm === b.contentHash.algorithm && a.contentHash.value === b.contentHash.value;
    return { method: "contentHash", matched, score: matched ? 1 : 0 };
  },

  perceptualHash: (a, b, settings) => {
    if (!a.perceptualHashes || !b.perceptualHashes) return null;
    const score = perceptualSimilarity(a.perceptualHashes, b.perceptualHashes);
    if (score === null) return null;
    return { method: "perceptualHash", matched: score >= settings.perceptualHash.threshold, score };
  },

  filename: (a, b, settings) => {
    if (a.normalizedName === undefined || b.normalizedName === undefined) return null;
    const score = nameSimilarity(a.normalizedName, b.normalizedName);
    return { method: "filename", matched: score >= settings.filename.threshold, score };
  },

  size: (a, b, settings) => {
    if (a.sizeBytes === undefined || b.sizeBytes === undefined) return null;
    const larger = Math.max(a.sizeBytes, b.sizeBytes);
    const diff = Math.abs(a.sizeBytes - b.sizeBytes);
    const score = larger === 0 ? 1 : 1 - diff / larger;
    return { method: "size", matched: diff <= settings.size.tolerance * larger, score };
  },

  metadata: (a, b, settings) => {
    if (!a.exifSummary || !b.exifSummary) return null;
    const { comparable, agreeing } = compareExif(a.exifSummary, b.exifSummary);
    if (comparable === 0) return null;
    return {
      method: "metadata",
      matched: agreeing.length >= settings.metadata.minMatchingFields,
      score: agreeing.length / comparable,
    };
  },
};

/* ---------------- combination ---------------- */

function accepts(policy: CombinePolicy, verdicts: PairVerdict[]): boolean {
  const matched = verdicts.filter((v) => v.matched).length;
  switch (policy.mode) {
    case "any":
      return matched >= 1;
    case "at-least":
      return matched >= policy.count;
    case "weighted": {
      let weighted = 0;
      let totalWeight = 0;
      // an equal content hash short-circuits before this point, so a content
      // hash verdict here only ever scores 0
      for (const v of verdicts) {
        if (v.method === "contentHash") continue;
        const w = policy.weights?.[v.method] ?? 1;
        weighted += w * v.score;
        totalWeight += w;
      }
      // a pair where no method matched is never a duplicate, whatever the mean
      return matched >= 1 && totalWeight > 0 && weighted / totalWeight >= policy.threshold;
    }
  }
}

function isEnabled(method: DetectionMethod, settings: MethodSettings): boolean {
  return settings[method].enabled;
}

/**
 * Scores a pair under every enabled method. Identical content hashes
 * short-circuit: the pair is a duplicate with score 1 and nothing else runs.
 */
export function scorePair(a: FileRecord, b: FileRecord, policy: ScoringPolicy): CombinedVerdict {
  const fa = a.features ?? {};
  const fb = b.features ?? {};
  const { methods } = policy;

  if (isEnabled("contentHash", methods)) {
    const verdict = COMPARATORS.contentHash(fa, fb, methods);
    if (verdict?.matched) {
      return {
        a: a.path,
        b: b.path,
        verdicts: [verdict],
        matchedMethods: ["contentHash"],
        exact: true,
        isDuplicate: true,
        score: 1,
      };
    }
  }

  const verdicts: PairVerdict[] = [];
  for (const method of DETECTION_METHODS) {
    if (!isEnabled(method, methods)) continue;
    const verdict = COMPARATORS[method](fa, fb, methods);
    if (verdict) verdicts.push(verdict);
  }

  const matchedMethods = verdicts.filter((v) => v.matched).map((v) => v.method);
  const score = verdicts.reduce((max, v) => Math.max(max, v.score), 0);

  return {
    a: a.path,
    b: b.path,
    verdicts,
    matchedMethods,
    exact: false,
    isDuplicate: verdicts.length > 0 && accepts(policy.combine, verdicts),
    score,
  };
}
