/**
 * Shared test helpers: temp folders, a tiny PDF writer and a fake text source.
 */
import { mkdtempSync, writeFileSync, unlinkSync } from "node:fs";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { RenameError } from "../../src/core/errors.js";
import type { FirstPage, PdfTextSource } from "../../src/parsers/types.js";

export function makeTempDir(prefix = "renamer-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

function escapePdfText(s: string): string {
  return s.replace(/[\\()]/g, (c) => `\\${c}`);
}

/**
 * Build a minimal PDF: one Helvetica text line per entry, 18pt apart from
 * the top of a Letter page. Empty entries leave a gap.
 */
export function buildPdf(pages: string[][]): Buffer {
  const bodies: string[] = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    "", // page tree, filled in once the page objects are numbered
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>",
  ];

  const kids: string[] = [];
  for (const lines of pages) {
    const pageNum = bodies.length + 1;
    const contentNum = pageNum + 1;
    kids.push(`${pageNum} 0 R`);

    const ops = lines
      .map((line, i) => (line.trim() ? `BT /F1 12 Tf 72 ${720 - i * 18} Td (${escapePdfText(line)}) Tj ET` : ""))
      .filter(Boolean)
      .join("\n");

    bodies.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${contentNum} 0 R >>`
    );
    bodies.push(`<< /Length ${Buffer.byteLength(ops, "latin1")} >>\nstream\n${ops}\nendstream`);
  }
  bodies[1] = `<< /Type /Pages /Kids [${kids.join(" ")}] /Count ${pages.length} >>`;

  let out = "%PDF-1.4\n";
  const offsets: number[] = [];
  bodies.forEach((body, i) => {
    offsets.push(Buffer.byteLength(out, "latin1"));
    out += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = Buffer.byteLength(out, "latin1");
  out += `xref\n0 ${bodies.length + 1}\n0000000000 65535 f \n`;
  for (const off of offsets) {
    out += `${String(off).padStart(10, "0")} 00000 n \n`;
  }
  out += `trailer\n<< /Size ${bodies.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(out, "latin1");
}

/** Write a PDF built from `pages` into dir/name and return its path */
export function writePdf(dir: string, name: string, pages: string[][]): string {
  const path = join(dir, name);
  writeFileSync(path, buildPdf(pages));
  return path;
}

/** Write placeholder files (content is irrelevant to FakeTextSource) */
export function writeFiles(dir: string, names: string[]): void {
  for (const name of names) {
    writeFileSync(join(dir, name), `%PDF-placeholder ${name}\n`);
  }
}

/** What the fake returns for a filename */
export type FakePage =
  | string[]                 // first-page lines of a one-page document
  | "unreadable"             // throws like a corrupt PDF
  | "no-pages"               // zero-page document
  | { lines: string[]; vanish: true }; // deletes the file after reading it

/** PdfTextSource keyed by filename, recording every path it was asked for */
export class FakeTextSource implements PdfTextSource {
  readonly calls: string[] = [];

  constructor(private readonly pages: Record<string, FakePage>) {}

  async readFirstPage(inputPath: string): Promise<FirstPage> {
    const name = basename(inputPath);
    this.calls.push(name);
    const page = this.pages[name];

    if (page === undefined || page === "unreadable") {
      throw new RenameError("UnreadablePdf", `Not a readable PDF: ${name}`);
    }
    if (page === "no-pages") {
      return { source: name, pages: 0, lines: [] };
    }
    if (Array.isArray(page)) {
      return { source: name, pages: 1, lines: page };
    }
    unlinkSync(inputPath);
    return { source: name, pages: 1, lines: page.lines };
  }
}
