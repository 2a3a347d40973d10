import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { userInfo } from "node:os";

export const DEFAULT_LOG_FILE = "autofile.log.jsonl";

export interface RunLogEntry {
  type: "run_start" | "dir_skipped" | "run_totals" | "transfer" | "transfer_failed" | "error" | "run_end";
  timestamp: string;
  user: string;
  [key: string]: unknown;
}

function currentUser(): string {
  try {
    return userInfo().username;
  } catch {
    return process.env.USER ?? process.env.USERNAME ?? "unknown";
  }
}

/**
 * RunLogger: appends JSONL run events to a single log file.
 * Each write is appendFileSync so a crash mid-transfer keeps every line.
 */
export class RunLogger {
  private filepath: string;
  private user: string;

  constructor(file: string = DEFAULT_LOG_FILE) {
    this.filepath = resolve(file);
    const dir = dirname(this.filepath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    this.user = currentUser();
  }

  get path(): string {
    return this.filepath;
  }

  private append(type: RunLogEntry["type"], fields: Record<string, unknown> = {}): void {
    const entry: RunLogEntry = { type, timestamp: new Date().toISOString(), user: this.user, ...fields };
    appendFileSync(this.filepath, JSON.stringify(entry) + "\n", "utf-8");
  }

  logStart(configPath: string): void {
    this.append("run_start", { configPath });
  }

  logSkippedDirectory(dir: string, reason: string): void {
    this.append("dir_skipped", { dir, reason });
  }

  logTotals(totals: { scanned: number; matched: number; failed: number; skipped: number }): void {
    this.append("run_totals", totals);
  }

  logTransfer(file: { name: string; from: string; to: string }): void {
    this.append("transfer", file);
  }

  logTransferFailure(file: { name: string; from: string; to: string }, error: string): void {
    this.append("transfer_failed", { ...file, error });
  }

  logError(message: string, detail?: string): void {
    this.append("error", { message, detail: detail ?? null });
  }

  logEnd(outcome: string): void {
    this.append("run_end", { outcome });
  }
}
