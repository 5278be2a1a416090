import { hideBin } from "yargs/helpers";

import { isDedupeError } from "@photo-dedupe/core-domain";
import {
  ConsoleLogger,
  buildRunReport,
  createNodeDedupeService,
  formatRunSummary,
  tokenFromAbortSignal,
  type ProgressEvent,
  type ProgressSink,
} from "@photo-dedupe/core-application";

import { isInfoRequest, parseCliOptions, printInfo, resolveSource } from "./options";

const EXIT_COMPLETED = 0;
const EXIT_FAILED = 1;
const EXIT_CONFIGURATION = 2;
const EXIT_CANCELLED = 130;

/** One stderr line per phase change and per finished phase. */
function stderrProgress(): ProgressSink {
  let lastPhase: string | undefined;
  return {
    report(event: ProgressEvent) {
      const finished = event.total > 0 && event.processed === event.total;
      if (event.phase === lastPhase && !finished) return;
      lastPhase = event.phase;
      const counter = event.total > 0 ? ` ${event.processed}/${event.total}` : "";
      process.stderr.write(`[${event.phase}]${counter} ${event.status}\n`);
    },
  };
}

async function main(argv: string[]): Promise<number> {
  if (isInfoRequest(argv)) {
    await printInfo(argv);
    return EXIT_COMPLETED;
  }

  const options = await parseCliOptions(argv);
  const logger = new ConsoleLogger({ level: options.logLevel });
  const service = createNodeDedupeService({ logger });

  const abort = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted; finishing the current step (press Ctrl+C again to quit)");
    abort.abort();
    process.once("SIGINT", () => process.exit(EXIT_CANCELLED));
  });

  const source = await resolveSource(options.paths);
  const result = await service.run(
    { ...options.request, source },
    { progress: options.json ? undefined : stderrProgress(), cancellation: tokenFromAbortSignal(abort.signal) }
  );

  if (options.json) process.stdout.write(`${JSON.stringify(buildRunReport(result), null, 2)}\n`);
  else process.stdout.write(`${formatRunSummary(result)}\n`);

  return result.status === "cancelled" ? EXIT_CANCELLED : EXIT_COMPLETED;
}

main(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (isDedupeError(err) && err.code === "INVALID_CONFIGURATION") {
      process.stderr.write(`${err.message}\n`);
      process.exitCode = EXIT_CONFIGURATION;
      return;
    }
    process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exitCode = EXIT_FAILED;
  });
