/**
 * Every similarity signal the engine knows about. The scorer and the
 * extractor iterate this list instead of branching on loose flags.
 */
export const DETECTION_METHODS = ["contentHash", "perceptualHash", "filename", "size", "metadata"] as const;

export type DetectionMethod = (typeof DETECTION_METHODS)[number];

export const PERCEPTUAL_ALGORITHMS = ["ahash", "dhash", "phash"] as const;

export type PerceptualAlgorithm = (typeof PERCEPTUAL_ALGORITHMS)[number];

export function isDetectionMethod(value: string): value is DetectionMethod {
  return (DETECTION_METHODS as readonly string[]).includes(value);
}

export function isPerceptualAlgorithm(value: string): value is PerceptualAlgorithm {
  return (PERCEPTUAL_ALGORITHMS as readonly string[]).includes(value);
}
