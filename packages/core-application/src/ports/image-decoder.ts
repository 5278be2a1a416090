export type GreyscaleImage = {
  width: number;
  height: number;
  /** Row-major, one byte per pixel. */
  pixels: Uint8Array;
};

export type ImageDimensions = {
  width: number;
  height: number;
};

export interface ImageDecoder {
  /** Decodes and resizes (ignoring aspect ratio) to a greyscale bitmap. */
  decodeGreyscale(absolutePath: string, width: number, height: number): Promise<GreyscaleImage>;
  readDimensions(absolutePath: string): Promise<ImageDimensions | null>;
}
