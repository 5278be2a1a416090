import sharp from "sharp";
import type { GreyscaleImage, ImageDecoder, ImageDimensions } from "../ports/image-decoder";

export class SharpImageDecoder implements ImageDecoder {
  async decodeGreyscale(absolutePath: string, width: number, height: number): Promise<GreyscaleImage> {
    const { data, info } = await sharp(absolutePath, { failOn: "error" })
      .removeAlpha()
      .greyscale()
      .resize(width, height, { fit: "fill" })
      .raw()
      .toBuffer({ resolveWithObject: true });

    const pixelCount = info.width * info.height;
    if (info.channels === 1) {
      return { width: info.width, height: info.height, pixels: new Uint8Array(data.subarray(0, pixelCount)) };
    }

    // some inputs keep their colour channels through greyscale(); take the first
    const pixels = new Uint8Array(pixelCount);
    for (let i = 0; i < pixelCount; i++) pixels[i] = data[i * info.channels];
    return { width: info.width, height: info.height, pixels };
  }

  async readDimensions(absolutePath: string): Promise<ImageDimensions | null> {
    const meta = await sharp(absolutePath).metadata();
    if (meta.width === undefined || meta.height === undefined) return null;
    return { width: meta.width, height: meta.height };
  }
}
