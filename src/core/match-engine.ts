import { readdirSync, type Dirent } from "node:fs";
import { join } from "node:path";
import { parseFilename, describeParseError } from "./filename-parser.js";
import { resolveParent, resolveSub, describeMatchError } from "./resolver.js";
import { buildTargetIndex, isDirectoryEntry } from "./target-index.js";
import { matchedMessage, failedMessage } from "./report.js";
import type { AutoFileConfig } from "./config.js";
import type { RunLogger } from "./run-logger.js";
import type {
  FailedFile,
  FailureCategory,
  FieldRule,
  FieldValues,
  FileOutcome,
  MatchError,
  ParseError,
  RunSummary,
  SourceFile,
  TargetIndex,
} from "./types.js";

export interface WalkOptions {
  recursive: boolean;
  ignore: readonly string[];
  /** Called for a sub-directory that cannot be listed; the walk goes on without it */
  onUnreadable?: (dir: string, error: NodeJS.ErrnoException) => void;
}

const UNREADABLE = new Set(["EACCES", "EPERM"]);

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Collect files under `root`, depth-first with entries sorted by name.
 * Directories whose path contains an ignore substring are pruned whole.
 * Anything that isn't a directory (symlinks followed) counts as a file;
 * symlinked directories are not descended into.
 */
export function walkSource(root: string, opts: WalkOptions): SourceFile[] {
  const files: SourceFile[] = [];

  const list = (dir: string): Dirent[] | null => {
    try {
      return readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      if (dir === root || !isErrnoException(error) || !UNREADABLE.has(error.code ?? "")) throw error;
      opts.onUnreadable?.(dir, error);
      return null;
    }
  };

  const visit = (dir: string): void => {
    if (opts.ignore.some((pattern) => dir.includes(pattern))) return;

    const entries = list(dir);
    if (entries === null) return;
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (!isDirectoryEntry(dir, entry)) {
        files.push({ name: entry.name, directory: dir, path: join(dir, entry.name) });
      }
    }
    if (!opts.recursive) return;
    for (const entry of entries) {
      if (entry.isDirectory()) visit(join(dir, entry.name));
    }
  };

  visit(root);
  return files;
}

export interface MatchContext {
  rules: readonly FieldRule[];
  index: TargetIndex;
  parentField: string;
  subField: string;
}

function failure(
  file: SourceFile,
  fields: FieldValues | null,
  category: FailureCategory,
  error: ParseError | MatchError,
  reason: string
): FileOutcome {
  const failed: FailedFile = {
    ...file,
    fields,
    category,
    error,
    reason,
    message: failedMessage(file.name, category, reason),
  };
  return { status: "failed", file: failed };
}

/** Run one file through name check, parent and sub-folder resolution. */
export function classifyFile(file: SourceFile, ctx: MatchContext): FileOutcome {
  const parsed = parseFilename(file.name, ctx.rules);
  if (!parsed.ok) {
    if (parsed.error.kind === "InsufficientFields") {
      return { status: "skipped", file, error: parsed.error };
    }
    return failure(file, null, "InvalidFileName", parsed.error, describeParseError(parsed.error));
  }
  const fields = parsed.value;

  const parent = resolveParent(fields, ctx.parentField, ctx.index);
  if (!parent.ok) return failure(file, fields, "InvalidMatch", parent.error, describeMatchError(parent.error));

  const sub = resolveSub(fields, ctx.subField, parent.value, file.name);
  if (!sub.ok) return failure(file, fields, "InvalidMatch", sub.error, describeMatchError(sub.error));

  const targetPath = join(sub.value, file.name);
  return {
    status: "matched",
    file: {
      ...file,
      fields,
      targetParentDir: parent.value.path,
      targetSubDir: sub.value,
      targetPath,
      message: matchedMessage(file.name, file.path, targetPath),
    },
  };
}

/**
 * Match every file in the source tree against the target tree.
 * Per-file problems become failed/skipped outcomes; anything else throws.
 */
export function runMatches(config: AutoFileConfig, opts?: { logger?: RunLogger }): RunSummary {
  const ctx: MatchContext = {
    rules: config.fields,
    index: buildTargetIndex(config.target.path, { ignore: config.target.ignore }),
    parentField: config.target.parentField,
    subField: config.target.subField,
  };

  const summary: RunSummary = { totalScanned: 0, matched: [], failed: [], skipped: 0 };

  const walk: WalkOptions = {
    ...config.source,
    onUnreadable: (dir, error) => opts?.logger?.logSkippedDirectory(dir, error.code ?? error.message),
  };

  for (const file of walkSource(config.source.path, walk)) {
    summary.totalScanned++;
    const outcome = classifyFile(file, ctx);
    switch (outcome.status) {
      case "matched":
        summary.matched.push(outcome.file);
        break;
      case "failed":
        summary.failed.push(outcome.file);
        break;
      case "skipped":
        summary.skipped++;
        break;
    }
  }

  opts?.logger?.logTotals({
    scanned: summary.totalScanned,
    matched: summary.matched.length,
    failed: summary.failed.length,
    skipped: summary.skipped,
  });

  return summary;
}
