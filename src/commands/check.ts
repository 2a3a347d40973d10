import { loadConfig, DEFAULT_CONFIG_FILE, type AutoFileConfig } from "../core/config.js";
import { errorMessage } from "../core/errors.js";
import { describeFormat } from "../core/filename-parser.js";
import { buildTargetIndex } from "../core/target-index.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const YELLOW = "\x1b[33m";
const RESET = "\x1b[0m";

export async function check(opts: { config?: string }): Promise<void> {
  let config: AutoFileConfig;
  try {
    config = loadConfig(opts.config ?? DEFAULT_CONFIG_FILE);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }

  console.log(`${BOLD}autofile configuration${RESET}`);
  console.log(`${DIM}${config.configPath}${RESET}\n`);

  console.log(`  Format:  ${describeFormat(config.fields)}`);
  for (const rule of config.fields) {
    const allowed = rule.allowedValues.length > 0 ? rule.allowedValues.join(", ") : "(any)";
    console.log(`    ${rule.name.padEnd(14)} ${allowed}`);
  }

  const recursive = config.source.recursive ? "recursive" : "top level only";
  console.log(`  Source:  ${config.source.path} (${recursive})`);
  if (config.source.ignore.length > 0) {
    console.log(`           ignoring: ${config.source.ignore.join(", ")}`);
  }
  console.log(`  Target:  ${config.target.path}`);
  console.log(`           parent folder by ${config.target.parentField}, sub folder by ${config.target.subField}`);

  const index = buildTargetIndex(config.target.path, { ignore: config.target.ignore });
  console.log(`\n  ${index.length} target folder${index.length !== 1 ? "s" : ""}:`);
  for (const folder of index) {
    console.log(`    ${folder.name}`);
  }

  for (const warning of config.warnings) {
    console.error(`\n${YELLOW}Warning:${RESET} ${warning}`);
  }
}
