import Papa from "papaparse";
import ExcelJS from "exceljs";
import { writeFile } from "node:fs/promises";
import { extname } from "node:path";
import type { RunSummary } from "./types.js";

export const EXPORT_FORMATS = ["csv", "xlsx", "json"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface PlanRow {
  status: "matched" | "failed";
  file: string;
  source: string;
  destination: string;
  category: string;
  reason: string;
}

const COLUMNS: (keyof PlanRow)[] = ["status", "file", "source", "destination", "category", "reason"];

/** Matched rows first, then failed, each in walk order */
export function planRows(summary: RunSummary): PlanRow[] {
  return [
    ...summary.matched.map((f): PlanRow => ({
      status: "matched",
      file: f.name,
      source: f.path,
      destination: f.targetPath,
      category: "",
      reason: "",
    })),
    ...summary.failed.map((f): PlanRow => ({
      status: "failed",
      file: f.name,
      source: f.path,
      destination: "",
      category: f.category,
      reason: f.reason,
    })),
  ];
}

/** Format from the output file's extension, or null if unsupported */
export function exportFormatFor(file: string): ExportFormat | null {
  const ext = extname(file).slice(1).toLowerCase();
  return EXPORT_FORMATS.find((f) => f === ext) ?? null;
}

export function planToCsv(summary: RunSummary): string {
  return Papa.unparse(planRows(summary), { columns: COLUMNS });
}

export function planToJson(summary: RunSummary): string {
  return JSON.stringify(
    {
      totals: {
        scanned: summary.totalScanned,
        matched: summary.matched.length,
        failed: summary.failed.length,
        skipped: summary.skipped,
      },
      rows: planRows(summary),
    },
    null,
    2
  );
}

async function writeXlsx(summary: RunSummary, outputPath: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Plan");
  sheet.columns = COLUMNS.map((key) => ({ header: key, key, width: key === "reason" ? 60 : 30 }));
  sheet.getRow(1).font = { bold: true };
  for (const row of planRows(summary)) {
    sheet.addRow(row);
  }
  await workbook.xlsx.writeFile(outputPath);
}

/** Write the match plan; the format comes from the file extension. */
export async function exportPlan(summary: RunSummary, outputPath: string): Promise<ExportFormat> {
  const format = exportFormatFor(outputPath);
  if (format === null) {
    throw new Error(
      `Unsupported export format '${extname(outputPath)}'. Supported: ${EXPORT_FORMATS.map((f) => `.${f}`).join(", ")}`
    );
  }

  switch (format) {
    case "csv":
      await writeFile(outputPath, planToCsv(summary) + "\n", "utf-8");
      break;
    case "json":
      await writeFile(outputPath, planToJson(summary) + "\n", "utf-8");
      break;
    case "xlsx":
      await writeXlsx(summary, outputPath);
      break;
  }
  return format;
}
