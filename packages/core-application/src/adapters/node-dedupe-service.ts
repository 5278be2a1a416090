import type { Clock } from "../ports/clock";
import type { Logger } from "../ports/logger";
import { DedupeService } from "../services/dedupe-service";

import { ConsoleLogger } from "./console-logger";
import { ExifrMetadataReader } from "./exifr-metadata-reader";
import { FastGlobFileScanner } from "./fast-glob-file-scanner";
import { FileTypeFormatDetector } from "./file-type-format-detector";
import { NodeFileHasher } from "./node-file-hasher";
import { NodeFileMover } from "./node-file-mover";
import { NodeReportWriter } from "./node-report-writer";
import { SharpImageDecoder } from "./sharp-image-decoder";
import { SystemClock } from "./system-clock";

export type NodeDedupeServiceOptions = {
  logger?: Logger;
  clock?: Clock;
};

/** Wires the service to the local filesystem, sharp, exifr and file-type. */
export function createNodeDedupeService(options: NodeDedupeServiceOptions = {}): DedupeService {
  return new DedupeService({
    scanner: new FastGlobFileScanner(),
    hasher: new NodeFileHasher(),
    decoder: new SharpImageDecoder(),
    metadataReader: new ExifrMetadataReader(),
    formatDetector: new FileTypeFormatDetector(),
    mover: new NodeFileMover(),
    reportWriter: new NodeReportWriter(),
    clock: options.clock ?? new SystemClock(),
    logger: options.logger ?? new ConsoleLogger(),
  });
}
