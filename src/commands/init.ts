import { writeSampleConfig, DEFAULT_CONFIG_FILE } from "../core/config.js";

export async function init(opts: { config?: string; force?: boolean }): Promise<void> {
  const file = opts.config ?? DEFAULT_CONFIG_FILE;

  if (!writeSampleConfig(file, opts.force ?? false)) {
    console.error(`${file} already exists. Use --force to overwrite.`);
    process.exit(1);
  }
  console.log(`Wrote ${file}. Edit the source and target paths, then run: autofile check`);
}
