export interface FirstPage {
  source: string;   // original filename (e.g., "scan_0041.pdf")
  pages: number;    // page count of the whole document
  lines: string[];  // trimmed, non-empty text lines of page 1 (empty when pages === 0)
}

/** Anything that can hand back the first page's text of a PDF */
export interface PdfTextSource {
  readFirstPage(inputPath: string): Promise<FirstPage>;
}

/** A text run with its baseline, as laid out on the page */
export interface PositionedText {
  str: string;
  y: number;
  hasEOL: boolean;
}
