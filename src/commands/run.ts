import { loadConfig, DEFAULT_CONFIG_FILE } from "../core/config.js";
import { errorMessage, ConfigError } from "../core/errors.js";
import { runMatches } from "../core/match-engine.js";
import { exportPlan } from "../core/plan-export.js";
import { confirm, type Ask } from "../core/prompt.js";
import { summaryLines, transferLine, RULE } from "../core/report.js";
import { RunLogger, DEFAULT_LOG_FILE } from "../core/run-logger.js";
import { transferFiles } from "../core/transfer.js";

const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface RunOptions {
  config?: string;
  yes?: boolean;
  dryRun?: boolean;
  output?: string;
  log?: string;
}

export type RunOutcome = "no_matches" | "dry_run" | "declined" | "transferred" | "partial";

/**
 * Match, report, confirm, transfer. Returns the outcome instead of
 * exiting so the caller decides the exit code. Fatal errors throw.
 */
export async function runFiling(opts: RunOptions, askFn?: Ask): Promise<RunOutcome> {
  const logger = new RunLogger(opts.log ?? DEFAULT_LOG_FILE);

  try {
    const config = loadConfig(opts.config ?? DEFAULT_CONFIG_FILE);
    logger.logStart(config.configPath);

    console.log("\nStarting match...\n");
    const summary = runMatches(config, { logger });

    for (const f of summary.matched) console.log(f.message + "\n");
    for (const f of summary.failed) console.log(f.message + "\n");
    for (const line of summaryLines(summary, config.fields)) console.log(line);

    if (opts.output) {
      const format = await exportPlan(summary, opts.output);
      console.error(`${DIM}Saved ${format.toUpperCase()} plan: ${opts.output}${RESET}`);
    }

    if (summary.matched.length === 0) {
      console.log("\nNo files to transfer. Stopping operation.");
      logger.logEnd("no_matches");
      return "no_matches";
    }

    if (opts.dryRun) {
      console.log("\nDry run: no files moved.");
      logger.logEnd("dry_run");
      return "dry_run";
    }

    const proceed =
      opts.yes === true ||
      (await confirm(`\nProceed with transferring the ${summary.matched.length} file(s)?`, askFn));

    if (!proceed) {
      console.log("\nStopping operation.");
      logger.logEnd("declined");
      return "declined";
    }

    console.log("\nStarting file transfer...");
    const report = transferFiles(summary.matched, {
      proceed,
      logger,
      onResult: (r) => console.log(transferLine(r.file.name, r.ok)),
    });

    console.log(RULE);
    console.log(`TRANSFERRED: ${report.transferred} file(s)`);
    if (report.failed > 0) console.log(`FAILED     : ${report.failed} file(s)`);
    console.log(RULE);

    const outcome: RunOutcome = report.failed > 0 ? "partial" : "transferred";
    logger.logEnd(outcome);
    return outcome;
  } catch (error) {
    const detail = error instanceof ConfigError ? error.code : error instanceof Error ? error.stack : undefined;
    logger.logError(errorMessage(error), detail);
    logger.logEnd("error");
    throw error;
  }
}

export async function run(opts: RunOptions): Promise<void> {
  try {
    const outcome = await runFiling(opts);
    if (outcome === "partial") process.exit(1);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }
}
