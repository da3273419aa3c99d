export { BatchProcessor, listPdfFiles } from "./core/batch.js";
export type {
  BatchDependencies,
  BatchOptions,
  BatchOutcome,
  OutcomeStatus,
  ProgressEvent,
  ProgressObserver,
  RunMode,
  RunSummary,
} from "./core/batch.js";
export { CollisionResolver } from "./core/collision.js";
export { BatchSetupError, RenameError, FAILURE_KINDS } from "./core/errors.js";
export type { FailureKind } from "./core/errors.js";
export { sanitizeTitle, toCandidateName, FALLBACK_NAME } from "./core/sanitizer.js";
export { extractTitle, findTitle } from "./core/title.js";
export type { ExtractionResult } from "./core/title.js";
export { writeReport } from "./core/report.js";
export { RunLogger, silentLogger } from "./core/run-logger.js";
export type { Logger, LogLevel } from "./core/run-logger.js";
export { loadConfig, saveConfig } from "./core/config.js";
export type { RenamerConfig } from "./core/config.js";
export { readFirstPage, pdfjsTextSource } from "./parsers/pdf.js";
export type { FirstPage, PdfTextSource } from "./parsers/types.js";
