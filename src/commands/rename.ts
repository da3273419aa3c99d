import { basename, resolve } from "node:path";
import { BatchProcessor, type ProgressEvent, type RunSummary } from "../core/batch.js";
import { loadConfig, logsDir } from "../core/config.js";
import { errorMessage } from "../core/errors.js";
import { writeReport } from "../core/report.js";
import { RunLogger } from "../core/run-logger.js";
import type { PdfTextSource } from "../parsers/types.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface RenameCommandOptions {
  output?: string;
  inPlace?: boolean;
  dryRun?: boolean;
  report?: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  /** Injected by tests; defaults to pdfjs */
  source?: PdfTextSource;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n !== 1 ? "s" : ""}`;
}

/** One line per file for the live log */
export function formatProgress(event: ProgressEvent): string {
  const counter = `[${event.index}/${event.total}]`;
  const dest = event.outcome.destination ? basename(event.outcome.destination) : "";

  switch (event.status) {
    case "renamed":
    case "copied":
      return `  ✅ ${counter} ${event.file} → ${dest}`;
    case "skipped":
      return `  ⏭️  ${counter} ${event.file} — ${event.message ?? "skipped"}`;
    case "failed":
      return `  ❌ ${counter} ${event.file} — ${event.outcome.error}: ${event.message ?? "failed"}`;
  }
}

export function formatSummary(summary: RunSummary): string {
  const verb = summary.dryRun ? "Would succeed" : "Succeeded";
  const parts = [
    `${verb}: ${summary.succeeded}`,
    `Failed: ${summary.failed}`,
    `Skipped: ${summary.skipped}`,
  ];
  let line = `Done. ${parts.join(", ")} (${plural(summary.processed, "file")} processed)`;
  if (summary.cancelled) {
    line += ` — stopped early, ${summary.total - summary.processed} left untouched`;
  }
  return line;
}

/**
 * `rename <input>` — returns the process exit code: 1 when the run could not
 * start or any file failed, 0 otherwise.
 */
export async function renameCommand(input: string, opts: RenameCommandOptions = {}): Promise<number> {
  if (opts.inPlace && opts.output) {
    console.error("Error: --in-place and --output cannot be combined");
    return 1;
  }
  if (!opts.inPlace && !opts.output) {
    console.error("Error: Choose an output folder with --output <dir>, or pass --in-place");
    return 1;
  }

  const inputDir = resolve(input);
  const outputDir = opts.inPlace ? inputDir : resolve(opts.output ?? input);
  const config = loadConfig();
  let logger: RunLogger;
  try {
    logger = new RunLogger({
      level: config.logLevel,
      logDir: config.logToFile ? logsDir() : null,
      echo: opts.verbose ?? false,
    });
  } catch (err) {
    console.error(`Error: Cannot open the run log: ${errorMessage(err)}`);
    return 1;
  }
  const textMode = !opts.json;

  if (textMode) {
    const mode = outputDir === inputDir ? "In-place rename" : "Copy and rename";
    console.log(`${BOLD}Scanning:${RESET} ${inputDir}`);
    console.log(`${BOLD}Output:${RESET}   ${outputDir}`);
    console.log(`${BOLD}Mode:${RESET}     ${mode}${opts.dryRun ? " (dry run)" : ""}`);
  }

  // First Ctrl-C stops after the current file, the second one quits
  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) process.exit(130);
    controller.abort();
    console.error("\nStopping after the current file… (Ctrl-C again to quit)");
  };
  process.on("SIGINT", onSigint);

  const processor = new BatchProcessor({
    source: opts.source,
    logger,
    onProgress: (event) => {
      if (textMode && !opts.quiet) console.log(formatProgress(event));
    },
  });

  let summary: RunSummary;
  try {
    summary = await processor.run({
      inputDir,
      outputDir,
      mode: opts.inPlace ? "rename" : "copy",
      signal: controller.signal,
      dryRun: opts.dryRun,
      maxFilenameLength: config.maxFilenameLength,
    });
  } catch (err) {
    logger.error(errorMessage(err));
    console.error(`Error: ${errorMessage(err)}`);
    return 1;
  } finally {
    process.off("SIGINT", onSigint);
  }

  if (opts.json) {
    process.stdout.write(JSON.stringify(summary) + "\n");
  } else if (summary.total === 0) {
    console.log(`No PDF files found in ${inputDir}`);
  } else {
    console.log(formatSummary(summary));
    if (logger.path) console.log(`${DIM}Log: ${logger.path}${RESET}`);
  }

  if (opts.report) {
    try {
      const saved = await writeReport(summary, opts.report);
      console.error(`Report saved: ${saved}`);
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      return 1;
    }
  }

  return summary.failed > 0 ? 1 : 0;
}
