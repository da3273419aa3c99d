import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import { basename, dirname, join } from "node:path";
import { getDocument, VerbosityLevel } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { TextContent, TextItem } from "pdfjs-dist/types/src/display/api.js";
import { RenameError, errorMessage } from "../core/errors.js";
import type { FirstPage, PdfTextSource, PositionedText } from "./types.js";

// pdfjs reads the standard 14 fonts from disk in Node; the path needs a trailing separator
const STANDARD_FONTS = join(
  dirname(createRequire(import.meta.url).resolve("pdfjs-dist/package.json")),
  "standard_fonts",
  "/"
);

// Baselines closer than this (in PDF units) belong to the same line
const SAME_LINE_TOLERANCE = 1;

/**
 * Rebuild text lines from positioned runs. A run ends its line when pdfjs
 * flags an end-of-line, or when the next run sits on a different baseline.
 */
export function joinTextItems(items: PositionedText[]): string[] {
  const lines: string[] = [];
  let current = "";
  let lastY: number | null = null;

  const flush = () => {
    const line = current.trim();
    if (line) lines.push(line);
    current = "";
  };

  for (const item of items) {
    if (lastY !== null && item.str && Math.abs(item.y - lastY) > SAME_LINE_TOLERANCE) {
      flush();
    }
    current += item.str;
    if (item.str) lastY = item.y;
    if (item.hasEOL) flush();
  }
  flush();

  return lines;
}

function toPositioned(content: TextContent): PositionedText[] {
  return content.items
    .filter((it): it is TextItem => "str" in it)
    .map((it) => ({ str: it.str, y: Number(it.transform[5]), hasEOL: it.hasEOL }));
}

/**
 * Read page 1 of a PDF. Throws RenameError("UnreadablePdf") when the file is
 * missing or pdfjs cannot open it; later pages are never touched.
 */
export async function readFirstPage(inputPath: string): Promise<FirstPage> {
  if (!existsSync(inputPath)) {
    throw new RenameError("UnreadablePdf", `File not found: ${inputPath}`);
  }

  let data: Uint8Array;
  try {
    data = new Uint8Array(await readFile(inputPath));
  } catch (err) {
    throw new RenameError("UnreadablePdf", `Cannot read file: ${errorMessage(err)}`, { cause: err });
  }

  const task = getDocument({
    data,
    standardFontDataUrl: STANDARD_FONTS,
    verbosity: VerbosityLevel.ERRORS,
    isEvalSupported: false,
    disableFontFace: true,
  });

  try {
    const doc = await task.promise.catch((err: unknown) => {
      throw new RenameError("UnreadablePdf", `Not a readable PDF: ${errorMessage(err)}`, { cause: err });
    });

    if (doc.numPages === 0) {
      return { source: basename(inputPath), pages: 0, lines: [] };
    }

    try {
      const page = await doc.getPage(1);
      const content = await page.getTextContent();
      return {
        source: basename(inputPath),
        pages: doc.numPages,
        lines: joinTextItems(toPositioned(content)),
      };
    } catch (err) {
      throw new RenameError("UnreadablePdf", `Cannot extract text from page 1: ${errorMessage(err)}`, { cause: err });
    }
  } finally {
    await task.destroy();
  }
}

/** Default text source backed by pdfjs-dist */
export const pdfjsTextSource: PdfTextSource = { readFirstPage };
