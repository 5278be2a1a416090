export type DetectedFormat = {
  ext: string;
  mime: string;
};

export interface FormatDetector {
  /** Sniffs the leading bytes; null when the content is not recognised. */
  detect(absolutePath: string): Promise<DetectedFormat | null>;
}
