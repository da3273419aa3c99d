import { existsSync, statSync } from "node:fs";
import { basename, resolve } from "node:path";
import { listPdfFiles } from "../core/batch.js";
import { loadConfig } from "../core/config.js";
import { toCandidateName } from "../core/sanitizer.js";
import { extractTitle } from "../core/title.js";
import type { PdfTextSource } from "../parsers/types.js";

export interface ScanEntry {
  file: string;
  title: string | null;
  candidate: string | null;
  error?: string;
  message?: string;
}

export interface ScanCommandOptions {
  json?: boolean;
  source?: PdfTextSource;
}

/** `scan <input>` — list the PDFs in a folder and the title each one carries. Read-only. */
export async function scanCommand(input: string, opts: ScanCommandOptions = {}): Promise<number> {
  const dir = resolve(input);

  if (!existsSync(dir)) {
    console.error(`Error: Input folder does not exist: ${dir}`);
    return 1;
  }
  if (!statSync(dir).isDirectory()) {
    console.error(`Error: Input path is not a directory: ${dir}`);
    return 1;
  }

  const { maxFilenameLength } = loadConfig();
  const files = await listPdfFiles(dir);
  const entries: ScanEntry[] = [];

  for (const file of files) {
    const result = await extractTitle(file, opts.source);
    entries.push(
      result.ok
        ? { file: basename(file), title: result.title, candidate: toCandidateName(result.title, maxFilenameLength) }
        : { file: basename(file), title: null, candidate: null, error: result.kind, message: result.message }
    );
  }

  if (opts.json) {
    process.stdout.write(JSON.stringify(entries) + "\n");
    return 0;
  }

  console.log(`${files.length} PDF file${files.length !== 1 ? "s" : ""} found in ${dir}`);
  for (const e of entries) {
    if (e.candidate) {
      console.log(`  ${e.file.padEnd(30)} → ${e.candidate}`);
    } else {
      console.log(`  ${e.file.padEnd(30)} — ${e.error}: ${e.message}`);
    }
  }
  return 0;
}
