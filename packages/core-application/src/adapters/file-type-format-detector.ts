import fs from "node:fs/promises";
import { fileTypeFromBuffer } from "file-type";
import type { DetectedFormat, FormatDetector } from "../ports/format-detector";

/** Enough leading bytes for every signature file-type recognises. */
const SNIFF_BYTES = 4100;

export class FileTypeFormatDetector implements FormatDetector {
  async detect(absolutePath: string): Promise<DetectedFormat | null> {
    const handle = await fs.open(absolutePath, "r");
    try {
      const buffer = Buffer.alloc(SNIFF_BYTES);
      const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
      const result = await fileTypeFromBuffer(buffer.subarray(0, bytesRead));
      return result ? { ext: result.ext, mime: result.mime } : null;
    } finally {
      await handle.close();
    }
  }
}
