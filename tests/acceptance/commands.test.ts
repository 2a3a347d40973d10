import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { check } from "../../src/commands/check.js";
import { init } from "../../src/commands/init.js";
import { SAMPLE_CONFIG } from "../../src/core/config.js";
import { makeRoot, makeTree, cleanup } from "./helpers.js";

const CONFIG_YAML = `
fields_config:
  - client: [ACME, GLOBEX]
  - year:
source:
  path: inbox
  recursive: true
  ignore: []
target:
  path: clients
  recursive: true
  ignore: [zz_]
  parent_dir: client
  sub_dir: year
`;

describe("CLI commands", () => {
  let root: string;
  let out: string[];
  let errors: string[];
  let exit: MockInstance<typeof process.exit>;

  beforeEach(() => {
    root = makeRoot();
    makeTree(root, ["inbox/", "clients/acme/2023/", "clients/globex/", "clients/zz_old/", "clients/notes.txt"]);

    out = [];
    errors = [];
    vi.spyOn(console, "log").mockImplementation((line?: unknown) => {
      out.push(String(line));
    });
    vi.spyOn(console, "error").mockImplementation((line?: unknown) => {
      errors.push(String(line));
    });
    exit = vi.spyOn(process, "exit").mockImplementation((code?: string | number | null): never => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanup(root);
  });

  describe("check", () => {
    it("lists the indexed target folders and warns about ignored keys", async () => {
      const file = join(root, "autofile.yml");
      writeFileSync(file, CONFIG_YAML, "utf-8");

      await check({ config: file });

      expect(out).toContain("  Format:  [client] - [year]");
      expect(out).toContain(`  Source:  ${join(root, "inbox")} (recursive)`);
      const count = out.indexOf("\n  2 target folders:");
      expect(count).toBeGreaterThan(-1);
      expect(out.slice(count + 1)).toEqual(["    acme", "    globex"]);
      expect(errors).toEqual([
        "\n\x1b[33mWarning:\x1b[0m target.recursive has no effect: target folders are always matched one level deep",
      ]);
      expect(exit).not.toHaveBeenCalled();
    });

    it("exits with 1 when the config file is missing", async () => {
      const file = join(root, "missing.yml");

      await expect(check({ config: file })).rejects.toThrow("process.exit(1)");

      expect(exit).toHaveBeenCalledWith(1);
      expect(errors).toEqual([`Error: Configuration file cannot be found: ${file}`]);
      expect(out).toEqual([]);
    });
  });

  describe("init", () => {
    it("writes the sample config", async () => {
      const file = join(root, "new.yml");

      await init({ config: file });

      expect(readFileSync(file, "utf-8")).toBe(SAMPLE_CONFIG);
      expect(out).toEqual([`Wrote ${file}. Edit the source and target paths, then run: autofile check`]);
    });

    it("refuses to overwrite an existing file without --force", async () => {
      const file = join(root, "autofile.yml");
      writeFileSync(file, "# mine\n", "utf-8");

      await expect(init({ config: file })).rejects.toThrow("process.exit(1)");

      expect(exit).toHaveBeenCalledWith(1);
      expect(errors).toEqual([`${file} already exists. Use --force to overwrite.`]);
      expect(readFileSync(file, "utf-8")).toBe("# mine\n");
    });

    it("overwrites with --force", async () => {
      const file = join(root, "autofile.yml");
      writeFileSync(file, "# mine\n", "utf-8");

      await init({ config: file, force: true });

      expect(readFileSync(file, "utf-8")).toBe(SAMPLE_CONFIG);
      expect(exit).not.toHaveBeenCalled();
    });
  });
});
