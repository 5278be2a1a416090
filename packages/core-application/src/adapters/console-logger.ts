import type { LogLevel, LogMeta, Logger } from "../ports/logger";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type ConsoleLoggerOptions = {
  level?: LogLevel | "silent";
  prefix?: string;
  timestamps?: boolean;
  /** Where lines go; stderr by default so stdout stays free for results. */
  write?: (line: string) => void;
};

/**
 * Line-oriented logger: `[iso] LEVEL prefix message {meta}`.
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly prefix: string;
  private readonly timestamps: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LEVEL_ORDER[options.level ?? "info"];
    this.prefix = options.prefix ?? "";
    this.timestamps = options.timestamps ?? true;
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }

  private log(level: LogLevel, message: string, meta: LogMeta | undefined): void {
    if (LEVEL_ORDER[level] < this.threshold) return;

    const parts: string[] = [];
    if (this.timestamps) parts.push(`[${new Date().toISOString()}]`);
    parts.push(level.toUpperCase());
    if (this.prefix) parts.push(this.prefix);
    parts.push(message);
    if (meta && Object.keys(meta).length > 0) parts.push(JSON.stringify(meta));

    this.write(parts.join(" "));
  }
}

/** For tests and embedders that want no output. */
export const SILENT_LOGGER: Logger = new ConsoleLogger({ level: "silent" });
