import { copyFileSync, existsSync, renameSync, unlinkSync } from "node:fs";
import { errorMessage } from "./errors.js";
import type { RunLogger } from "./run-logger.js";
import type { MatchedFile } from "./types.js";

export type FileMover = (from: string, to: string) => void;

export interface TransferResult {
  file: MatchedFile;
  ok: boolean;
  error: string | null;
}

export interface TransferReport {
  proceeded: boolean;
  transferred: number;
  failed: number;
  results: TransferResult[];
}

export interface TransferOptions {
  /** Explicit go/no-go from the caller; false moves nothing */
  proceed: boolean;
  mover?: FileMover;
  logger?: RunLogger;
  onResult?: (result: TransferResult) => void;
}

/** rename, falling back to copy + unlink across filesystems */
export function moveFile(from: string, to: string): void {
  try {
    renameSync(from, to);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EXDEV") {
      copyFileSync(from, to);
      unlinkSync(from);
      return;
    }
    throw error;
  }
}

/**
 * Move each matched file to its target path. Every file is independent:
 * a failure is recorded and the batch carries on. Nothing is rolled back.
 */
export function transferFiles(matched: readonly MatchedFile[], opts: TransferOptions): TransferReport {
  const report: TransferReport = { proceeded: opts.proceed, transferred: 0, failed: 0, results: [] };
  if (!opts.proceed) return report;

  const mover = opts.mover ?? moveFile;

  for (const file of matched) {
    const entry = { name: file.name, from: file.directory, to: file.targetSubDir };
    let result: TransferResult;

    try {
      // The destination may have appeared since matching; never overwrite
      if (existsSync(file.targetPath)) {
        throw new Error(`Destination already exists: ${file.targetPath}`);
      }
      mover(file.path, file.targetPath);
      result = { file, ok: true, error: null };
      report.transferred++;
      opts.logger?.logTransfer(entry);
    } catch (error) {
      result = { file, ok: false, error: errorMessage(error) };
      report.failed++;
      opts.logger?.logTransferFailure(entry, errorMessage(error));
    }

    report.results.push(result);
    opts.onResult?.(result);
  }

  return report;
}
