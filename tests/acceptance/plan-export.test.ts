import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import ExcelJS from "exceljs";
import { runMatches } from "../../src/core/match-engine.js";
import { exportPlan, exportFormatFor, planRows, planToCsv } from "../../src/core/plan-export.js";
import type { RunSummary } from "../../src/core/types.js";
import { makeRoot, makeTree, cleanup, scenarioConfig } from "./helpers.js";

describe("Plan export", () => {
  let root: string;
  let summary: RunSummary;

  beforeEach(() => {
    root = makeRoot();
    makeTree(root, ["inbox/ACME-2023-a.pdf", "inbox/xyz-2023.pdf", "inbox/report.pdf", "clients/acme/2023/"]);
    summary = runMatches(scenarioConfig(root));
  });
  afterEach(() => cleanup(root));

  it("picks the format from the extension", () => {
    expect(exportFormatFor("plan.CSV")).toBe("csv");
    expect(exportFormatFor("out/plan.xlsx")).toBe("xlsx");
    expect(exportFormatFor("plan.json")).toBe("json");
    expect(exportFormatFor("plan.txt")).toBeNull();
  });

  it("lists matched rows before failed rows", () => {
    const rows = planRows(summary);
    expect(rows).toEqual([
      {
        status: "matched",
        file: "ACME-2023-a.pdf",
        source: join(root, "inbox", "ACME-2023-a.pdf"),
        destination: join(root, "clients", "acme", "2023", "ACME-2023-a.pdf"),
        category: "",
        reason: "",
      },
      {
        status: "failed",
        file: "xyz-2023.pdf",
        source: join(root, "inbox", "xyz-2023.pdf"),
        destination: "",
        category: "InvalidFileName",
        reason: summary.failed[0].reason,
      },
    ]);
  });

  it("renders CSV with a header row", () => {
    const lines = planToCsv(summary).split("\r\n");
    expect(lines[0]).toBe("status,file,source,destination,category,reason");
    expect(lines[1]).toBe(
      `matched,ACME-2023-a.pdf,${join(root, "inbox", "ACME-2023-a.pdf")},` +
        `${join(root, "clients", "acme", "2023", "ACME-2023-a.pdf")},,`
    );
    expect(lines).toHaveLength(3);
  });

  it("writes JSON with totals", async () => {
    const file = join(root, "plan.json");
    expect(await exportPlan(summary, file)).toBe("json");

    const parsed = JSON.parse(readFileSync(file, "utf-8"));
    expect(parsed.totals).toEqual({ scanned: 3, matched: 1, failed: 1, skipped: 1 });
    expect(parsed.rows).toHaveLength(2);
  });

  it("writes an XLSX workbook with a Plan sheet", async () => {
    const file = join(root, "plan.xlsx");
    expect(await exportPlan(summary, file)).toBe("xlsx");

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(file);
    const sheet = workbook.getWorksheet("Plan");
    expect(sheet?.getRow(1).getCell(1).value).toBe("status");
    expect(sheet?.getRow(2).getCell(2).value).toBe("ACME-2023-a.pdf");
    expect(sheet?.getRow(3).getCell(5).value).toBe("InvalidFileName");
  });

  it("rejects an unsupported extension", async () => {
    const file = join(root, "plan.txt");
    await expect(exportPlan(summary, file)).rejects.toThrow("Unsupported export format '.txt'");
    expect(existsSync(file)).toBe(false);
  });
});
