import { readFileSync, writeFileSync, existsSync, statSync } from "node:fs";
import { dirname, resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { FieldRule } from "./types.js";

export const DEFAULT_CONFIG_FILE = "autofile.yml";

export interface AutoFileConfig {
  configPath: string;
  fields: FieldRule[];
  source: {
    path: string;
    recursive: boolean;
    ignore: string[];
  };
  target: {
    path: string;
    ignore: string[];
    parentField: string;
    subField: string;
  };
  /** Keys that were accepted but have no effect */
  warnings: string[];
}

// `- year: []`, `- year:` and `- client: [ACME, 42]` are all valid entries
const AllowedValues = z
  .array(z.union([z.string(), z.number()]))
  .nullish()
  .transform((v) => (v ?? []).map((x) => String(x).trim().toUpperCase()));

const FieldEntry = z
  .record(z.string(), AllowedValues)
  .refine((entry) => Object.keys(entry).length === 1, {
    message: "each field entry must map exactly one field name to its allowed values",
  });

const ConfigSchema = z
  .object({
    fields_config: z.array(FieldEntry).min(1),
    source: z.object({
      path: z.string().min(1),
      recursive: z.boolean(),
      ignore: z.array(z.string()),
    }),
    target: z.object({
      path: z.string().min(1),
      recursive: z.boolean().optional(),
      ignore: z.array(z.string()),
      parent_dir: z.string().min(1),
      sub_dir: z.string().min(1),
    }),
  })
  .superRefine((cfg, ctx) => {
    const names = cfg.fields_config.flatMap((entry) => Object.keys(entry));

    const seen = new Set<string>();
    for (const name of names) {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fields_config"],
          message: `duplicate field name "${name}"`,
        });
      }
      seen.add(name);
    }

    for (const key of ["parent_dir", "sub_dir"] as const) {
      if (!names.includes(cfg.target[key])) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["target", key],
          message: `"${cfg.target[key]}" is not a field in fields_config (fields: ${names.join(", ")})`,
        });
      }
    }
  });

/**
 * Validate an already-parsed config document. Relative paths resolve
 * against `baseDir` (the config file's directory).
 */
export function parseConfig(raw: unknown, configPath: string, baseDir = dirname(configPath)): AutoFileConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(
      "invalid_schema",
      configPath,
      `Configuration file format is invalid: ${configPath}\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      issues
    );
  }

  const cfg = parsed.data;
  const warnings: string[] = [];
  if (cfg.target.recursive !== undefined) {
    warnings.push("target.recursive has no effect: target folders are always matched one level deep");
  }

  return {
    configPath,
    fields: cfg.fields_config.map((entry) => {
      const [name, allowedValues] = Object.entries(entry)[0];
      return { name, allowedValues };
    }),
    source: {
      path: resolve(baseDir, cfg.source.path),
      recursive: cfg.source.recursive,
      ignore: cfg.source.ignore,
    },
    target: {
      path: resolve(baseDir, cfg.target.path),
      ignore: cfg.target.ignore,
      parentField: cfg.target.parent_dir,
      subField: cfg.target.sub_dir,
    },
    warnings,
  };
}

function assertDirectory(configPath: string, label: string, dir: string): void {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new ConfigError("invalid_path", configPath, `${label} path is not a directory: ${dir}`);
  }
}

/** Read, validate and check a YAML config file. Throws ConfigError. */
export function loadConfig(file: string = DEFAULT_CONFIG_FILE): AutoFileConfig {
  const configPath = resolve(file);

  if (!existsSync(configPath)) {
    throw new ConfigError("not_found", configPath, `Configuration file cannot be found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(configPath, "utf-8"));
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.reason : String(error);
    throw new ConfigError("invalid_yaml", configPath, `Configuration file is not valid YAML: ${configPath} (${reason})`);
  }

  const config = parseConfig(raw, configPath);
  assertDirectory(configPath, "Source", config.source.path);
  assertDirectory(configPath, "Target", config.target.path);
  return config;
}

export const SAMPLE_CONFIG = `# autofile configuration
#
# Files are named  FIELD1 - FIELD2 - ...  e.g. "ACME-2023-invoice.pdf".
# Each entry maps a field name to its allowed values; an empty list
# accepts any value.
fields_config:
  - client: [ACME, GLOBEX]
  - year: []
  - description:

source:
  path: ./inbox
  recursive: true
  # directories whose path contains any of these are not scanned
  ignore: [archive]

target:
  path: ./clients
  # top-level target folders whose name contains any of these are not matched
  ignore: []
  # field used to find the top-level folder, then the sub-folder inside it
  parent_dir: client
  sub_dir: year
`;

/** Write the sample config. Returns false if the file exists and `force` is off. */
export function writeSampleConfig(file: string = DEFAULT_CONFIG_FILE, force = false): boolean {
  const configPath = resolve(file);
  if (existsSync(configPath) && !force) return false;
  writeFileSync(configPath, SAMPLE_CONFIG, "utf-8");
  return true;
}
