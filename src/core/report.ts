import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, extname, resolve } from "node:path";
import ExcelJS from "exceljs";
import Papa from "papaparse";
import type { RunSummary } from "./batch.js";

export const REPORT_FORMATS = [".json", ".csv", ".xlsx"] as const;

const CSV_COLUMNS = ["index", "source", "destination", "status", "error", "message"];

interface ReportRow {
  index: number;
  source: string;
  destination: string;
  status: string;
  error: string;
  message: string;
}

function toRows(summary: RunSummary): ReportRow[] {
  return summary.outcomes.map((o, i) => ({
    index: i + 1,
    source: o.source,
    destination: o.destination ?? "",
    status: o.status,
    error: o.error ?? "",
    message: o.message ?? "",
  }));
}

async function writeXlsx(summary: RunSummary, dest: string): Promise<void> {
  const wb = new ExcelJS.Workbook();

  const outcomes = wb.addWorksheet("Outcomes");
  outcomes.columns = [
    { header: "#", key: "index", width: 6 },
    { header: "Source", key: "source", width: 48 },
    { header: "Destination", key: "destination", width: 48 },
    { header: "Status", key: "status", width: 10 },
    { header: "Error", key: "error", width: 18 },
    { header: "Message", key: "message", width: 48 },
  ];
  toRows(summary).forEach((r) => outcomes.addRow(r));

  const totals = wb.addWorksheet("Summary");
  totals.columns = [
    { header: "Field", key: "field", width: 14 },
    { header: "Value", key: "value", width: 48 },
  ];
  totals.addRow({ field: "Input", value: summary.inputDir });
  totals.addRow({ field: "Output", value: summary.outputDir });
  totals.addRow({ field: "Mode", value: summary.mode });
  totals.addRow({ field: "Dry run", value: summary.dryRun });
  totals.addRow({ field: "Cancelled", value: summary.cancelled });
  totals.addRow({ field: "Total", value: summary.total });
  totals.addRow({ field: "Succeeded", value: summary.succeeded });
  totals.addRow({ field: "Failed", value: summary.failed });
  totals.addRow({ field: "Skipped", value: summary.skipped });

  await wb.xlsx.writeFile(dest);
}

/**
 * Save a finished run. Format follows the extension: .json, .csv or .xlsx.
 * Returns the absolute path written.
 */
export async function writeReport(summary: RunSummary, outputPath: string): Promise<string> {
  const dest = resolve(outputPath);
  const ext = extname(dest).toLowerCase();

  if (!REPORT_FORMATS.some((f) => f === ext)) {
    throw new Error(`Unsupported report format '${ext || outputPath}'. Supported: ${REPORT_FORMATS.join(", ")}`);
  }

  const dir = dirname(dest);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

  if (ext === ".json") {
    writeFileSync(dest, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  } else if (ext === ".csv") {
    const csv = Papa.unparse(toRows(summary), {
      columns: CSV_COLUMNS,
      quotes: true, // paths may hold commas
    });
    writeFileSync(dest, csv, "utf-8");
  } else {
    await writeXlsx(summary, dest);
  }

  return dest;
}
