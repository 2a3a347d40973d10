/**
 * Shared test helpers: temp source/target trees on disk.
 */
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { parseConfig, type AutoFileConfig } from "../../src/core/config.js";

/** Create a fresh temp root; remove it with `cleanup` */
export function makeRoot(): string {
  return mkdtempSync(join(tmpdir(), "autofile-test-"));
}

export function cleanup(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

/**
 * Lay out files and folders under `root`.
 * Paths ending in "/" are directories, everything else is a file.
 */
export function makeTree(root: string, paths: string[]): void {
  for (const p of paths) {
    const full = join(root, p);
    if (p.endsWith("/")) {
      mkdirSync(full, { recursive: true });
    } else {
      mkdirSync(dirname(full), { recursive: true });
      writeFileSync(full, `contents of ${p}`, "utf-8");
    }
  }
}

/** client: [ACME, GLOBEX], year: any, inbox/ → clients/ */
export function scenarioConfig(
  root: string,
  overrides?: { sourceIgnore?: string[]; targetIgnore?: string[]; recursive?: boolean }
): AutoFileConfig {
  return parseConfig(
    {
      fields_config: [{ client: ["ACME", "GLOBEX"] }, { year: [] }],
      source: {
        path: "inbox",
        recursive: overrides?.recursive ?? true,
        ignore: overrides?.sourceIgnore ?? [],
      },
      target: {
        path: "clients",
        ignore: overrides?.targetIgnore ?? [],
        parent_dir: "client",
        sub_dir: "year",
      },
    },
    join(root, "autofile.yml")
  );
}
