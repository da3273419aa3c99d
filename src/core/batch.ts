import { constants, existsSync, statSync } from "node:fs";
import { copyFile, mkdir, readdir, rename, rm, stat, utimes } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { basename, dirname, extname, join, resolve } from "node:path";
import { pdfjsTextSource } from "../parsers/pdf.js";
import type { PdfTextSource } from "../parsers/types.js";
import { CollisionResolver } from "./collision.js";
import { BatchSetupError, RenameError, describeFsError, errorMessage, type FailureKind } from "./errors.js";
import { silentLogger, type Logger } from "./run-logger.js";
import { DEFAULT_MAX_FILENAME_LENGTH, PDF_EXTENSION, toCandidateName } from "./sanitizer.js";
import { extractTitle } from "./title.js";

/** rename: move files inside their own folder. copy: write renamed copies to the output folder. */
export type RunMode = "rename" | "copy";

export type OutcomeStatus = "renamed" | "copied" | "skipped" | "failed";

export interface BatchOutcome {
  source: string;              // absolute path of the input PDF
  destination: string | null;  // absolute path written (or that would be written on a dry run)
  status: OutcomeStatus;
  title?: string;              // raw title as found on page 1
  error?: FailureKind;
  message?: string;
}

export interface ProgressEvent {
  index: number;  // 1-based
  total: number;
  file: string;   // source filename
  status: OutcomeStatus;
  message?: string;
  outcome: BatchOutcome;
}

export type ProgressObserver = (event: ProgressEvent) => void;

export interface BatchOptions {
  inputDir: string;
  /** Same as inputDir for in-place runs */
  outputDir: string;
  mode: RunMode;
  /** Checked between files, never mid-file */
  signal?: AbortSignal;
  /** Resolve names and report, touch nothing */
  dryRun?: boolean;
  maxFilenameLength?: number;
}

export interface BatchDependencies {
  source?: PdfTextSource;
  logger?: Logger;
  onProgress?: ProgressObserver;
}

export interface RunSummary {
  inputDir: string;
  outputDir: string;
  mode: RunMode;
  dryRun: boolean;
  cancelled: boolean;
  total: number;       // PDFs found
  processed: number;   // outcomes recorded (< total when cancelled)
  succeeded: number;
  failed: number;
  skipped: number;
  outcomes: BatchOutcome[];
}

interface RunContext {
  outputDir: string;
  action: RunMode;
  dryRun: boolean;
  maxFilenameLength: number;
  resolver: CollisionResolver;
}

/** PDF files directly inside `dir` (case-insensitive extension), sorted by name */
export async function listPdfFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && extname(e.name).toLowerCase() === PDF_EXTENSION)
    .map((e) => e.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => join(resolve(dir), name));
}

/** Copy through a hidden temp file and rename it into place, so a failed copy leaves nothing behind */
async function copyIntoPlace(source: string, destination: string): Promise<void> {
  const tmp = join(dirname(destination), `.${basename(destination)}.${randomUUID().slice(0, 8)}.partial`);
  try {
    await copyFile(source, tmp, constants.COPYFILE_EXCL);
    const st = await stat(source);
    await utimes(tmp, st.atime, st.mtime);
    await rename(tmp, destination);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

function failed(source: string, kind: FailureKind, message: string, title?: string): BatchOutcome {
  return { source, destination: null, status: "failed", title, error: kind, message };
}

/**
 * Runs one pass over a folder: extract → sanitize → resolve → rename/copy,
 * strictly one file at a time. A file's failure is recorded on its outcome
 * and never stops the run.
 */
export class BatchProcessor {
  private readonly source: PdfTextSource;
  private readonly logger: Logger;
  private readonly onProgress?: ProgressObserver;

  constructor(deps: BatchDependencies = {}) {
    this.source = deps.source ?? pdfjsTextSource;
    this.logger = deps.logger ?? silentLogger;
    this.onProgress = deps.onProgress;
  }

  async run(options: BatchOptions): Promise<RunSummary> {
    const inputDir = resolve(options.inputDir);
    const outputDir = resolve(options.outputDir);
    const dryRun = options.dryRun ?? false;
    const sameDir = inputDir === outputDir;

    this.checkInputDir(inputDir);
    if (!sameDir && !dryRun) await this.prepareOutputDir(outputDir);

    const ctx: RunContext = {
      outputDir,
      // Output folder == input folder means in place; any other folder gets copies
      action: sameDir ? "rename" : "copy",
      dryRun,
      maxFilenameLength: options.maxFilenameLength ?? DEFAULT_MAX_FILENAME_LENGTH,
      resolver: new CollisionResolver(),
    };

    const files = await listPdfFiles(inputDir);
    this.logger.info(`Found ${files.length} PDF file${files.length !== 1 ? "s" : ""}`, {
      inputDir,
      outputDir,
      mode: ctx.action,
      dryRun,
    });

    const outcomes: BatchOutcome[] = [];
    let cancelled = false;

    for (const [i, file] of files.entries()) {
      if (options.signal?.aborted) {
        cancelled = true;
        this.logger.warn(`Stopped after ${outcomes.length} of ${files.length} files`);
        break;
      }

      const outcome = await this.processFile(file, ctx);
      outcomes.push(outcome);
      this.emit({
        index: i + 1,
        total: files.length,
        file: basename(file),
        status: outcome.status,
        message: outcome.message,
        outcome,
      });
    }

    const count = (status: OutcomeStatus) => outcomes.filter((o) => o.status === status).length;
    const summary: RunSummary = {
      inputDir,
      outputDir,
      mode: ctx.action,
      dryRun,
      cancelled,
      total: files.length,
      processed: outcomes.length,
      succeeded: count("renamed") + count("copied"),
      failed: count("failed"),
      skipped: count("skipped"),
      outcomes,
    };

    this.logger.info("Run complete", {
      processed: summary.processed,
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
      cancelled,
    });
    return summary;
  }

  private checkInputDir(inputDir: string): void {
    if (!existsSync(inputDir)) {
      throw new BatchSetupError(`Input folder does not exist: ${inputDir}`);
    }
    if (!statSync(inputDir).isDirectory()) {
      throw new BatchSetupError(`Input path is not a directory: ${inputDir}`);
    }
  }

  private async prepareOutputDir(outputDir: string): Promise<void> {
    if (existsSync(outputDir) && !statSync(outputDir).isDirectory()) {
      throw new BatchSetupError(`Output path is not a directory: ${outputDir}`);
    }
    try {
      await mkdir(outputDir, { recursive: true });
    } catch (err) {
      throw new BatchSetupError(`Cannot create output folder ${outputDir}: ${describeFsError(err)}`, { cause: err });
    }
  }

  private async processFile(source: string, ctx: RunContext): Promise<BatchOutcome> {
    const name = basename(source);

    const extraction = await extractTitle(source, this.source);
    if (!extraction.ok) {
      this.logger.warn(`Skipping '${name}': ${extraction.message}`, { kind: extraction.kind });
      return failed(source, extraction.kind, extraction.message);
    }

    const { title } = extraction;
    const candidate = toCandidateName(title, ctx.maxFilenameLength);

    let destination: string;
    try {
      destination = ctx.resolver.resolve(candidate, ctx.outputDir, ctx.action === "rename" ? source : undefined);
    } catch (err) {
      const kind = err instanceof RenameError ? err.kind : "FilesystemFault";
      this.logger.error(`Cannot name '${name}': ${errorMessage(err)}`, { kind });
      return failed(source, kind, errorMessage(err), title);
    }

    if (ctx.action === "rename" && destination === source) {
      this.logger.info(`Skipping '${name}': already correctly named`);
      return { source, destination, status: "skipped", title, message: "Already correctly named" };
    }

    const status: OutcomeStatus = ctx.action === "rename" ? "renamed" : "copied";

    if (!ctx.dryRun) {
      try {
        if (ctx.action === "rename") {
          await rename(source, destination);
        } else {
          await copyIntoPlace(source, destination);
        }
      } catch (err) {
        ctx.resolver.release(destination);
        const reason = describeFsError(err);
        this.logger.error(`Cannot ${ctx.action} '${name}': ${reason}`, { destination });
        return failed(source, "FilesystemFault", reason, title);
      }
    }

    this.logger.info(`${status === "renamed" ? "Renamed" : "Copied"} '${name}' -> '${basename(destination)}'`, {
      dryRun: ctx.dryRun,
    });
    return { source, destination, status, title };
  }

  private emit(event: ProgressEvent): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(event);
    } catch (err) {
      this.logger.error(`Progress observer failed: ${errorMessage(err)}`);
    }
  }
}
