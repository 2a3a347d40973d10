import { basename, dirname, join, relative, sep } from "node:path";
import { describeFormat } from "./filename-parser.js";
import type { FailureCategory, FieldRule, RunSummary } from "./types.js";

const LABEL_WIDTH = 15;
export const RULE = "-".repeat(80);

/** Deepest directory shared by two absolute paths */
export function commonPath(a: string, b: string): string {
  const left = a.split(sep);
  const right = b.split(sep);
  const shared: string[] = [];
  for (let i = 0; i < Math.min(left.length, right.length) && left[i] === right[i]; i++) {
    shared.push(left[i]);
  }
  return shared.join(sep) || sep;
}

/** Source directory and target file, both shown as ../<common>/... */
export function shortPaths(sourcePath: string, targetPath: string): { from: string; to: string } {
  const common = commonPath(sourcePath, targetPath);
  const anchor = basename(common);
  return {
    from: join("..", anchor, relative(common, dirname(sourcePath))),
    to: join("..", anchor, relative(common, targetPath)),
  };
}

export function matchedMessage(name: string, sourcePath: string, targetPath: string): string {
  const { from, to } = shortPaths(sourcePath, targetPath);
  return [
    `${"[[ MATCHED ]]".padEnd(LABEL_WIDTH)}"${name}"`,
    `${"   From:".padEnd(LABEL_WIDTH)}${from}`,
    `${"   To:".padEnd(LABEL_WIDTH)}${to}`,
  ].join("\n");
}

const CATEGORY_LABELS: Record<FailureCategory, string> = {
  InvalidFileName: "Invalid File",
  InvalidMatch: "Invalid Match",
};

export function failedMessage(name: string, category: FailureCategory, reason: string): string {
  return [
    `${"-- FAILED  --".padEnd(LABEL_WIDTH)}"${name}"`,
    `${"   Reason:".padEnd(LABEL_WIDTH)}${CATEGORY_LABELS[category]}: ${reason}`,
  ].join("\n");
}

/** Summary block printed after the per-file messages */
export function summaryLines(summary: RunSummary, rules: readonly FieldRule[]): string[] {
  const lines = [
    RULE,
    `SUCCESSFULLY MATCHED: ${summary.matched.length} file(s)`,
    `FAILED TO MATCH     : ${summary.failed.length} file(s)`,
  ];
  if (summary.skipped > 0) {
    lines.push(
      "",
      `Skipped ${summary.skipped} file(s) due to insufficient field entries.`,
      `Required format: ${describeFormat(rules)}`
    );
  }
  lines.push(RULE);
  return lines;
}

/** "report.pdf ........ DONE" */
export function transferLine(name: string, ok: boolean): string {
  return `${`${name}  `.padEnd(74, ".")} ${ok ? "DONE" : "FAILED!"}`;
}
