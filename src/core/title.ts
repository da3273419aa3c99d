import { pdfjsTextSource } from "../parsers/pdf.js";
import type { FirstPage, PdfTextSource } from "../parsers/types.js";
import { RenameError, errorMessage, type FailureKind } from "./errors.js";

const TITLE_MARKER = "title";

export type ExtractionFailureKind = Extract<FailureKind, "UnreadablePdf" | "NoPages" | "NoTitleFound">;

export type ExtractionResult =
  | { ok: true; title: string }
  | { ok: false; kind: ExtractionFailureKind; message: string };

/**
 * Find the title in page text: the first non-empty line after the first line
 * that contains "title" (any case). Returns null when there is no such pair.
 */
export function findTitle(lines: readonly string[]): string | null {
  const nonEmpty = lines.map((l) => l.trim()).filter((l) => l.length > 0);
  const markerIndex = nonEmpty.findIndex((l) => l.toLowerCase().includes(TITLE_MARKER));
  if (markerIndex === -1) return null;
  return nonEmpty[markerIndex + 1] ?? null;
}

function isExtractionKind(kind: FailureKind): kind is ExtractionFailureKind {
  return kind === "UnreadablePdf" || kind === "NoPages" || kind === "NoTitleFound";
}

/** Extract the visible title from page 1 of a PDF. Never throws. */
export async function extractTitle(
  inputPath: string,
  source: PdfTextSource = pdfjsTextSource
): Promise<ExtractionResult> {
  let page: FirstPage;
  try {
    page = await source.readFirstPage(inputPath);
  } catch (err) {
    const kind = err instanceof RenameError && isExtractionKind(err.kind) ? err.kind : "UnreadablePdf";
    return { ok: false, kind, message: errorMessage(err) };
  }

  if (page.pages === 0) {
    return { ok: false, kind: "NoPages", message: "Document has no pages" };
  }

  const title = findTitle(page.lines);
  if (title === null) {
    return {
      ok: false,
      kind: "NoTitleFound",
      message: "Could not find a 'Title' line followed by text on page 1",
    };
  }

  return { ok: true, title };
}
