import fs from "node:fs/promises";
import path from "node:path";

import type { ReportWriter } from "../ports/report-writer";

export class NodeReportWriter implements ReportWriter {
  async write(absolutePath: string, document: unknown): Promise<void> {
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.writeFile(absolutePath, JSON.stringify(document, null, 2), "utf-8");
  }
}
