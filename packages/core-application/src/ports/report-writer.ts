export interface ReportWriter {
  write(absolutePath: string, document: unknown): Promise<void>;
}
