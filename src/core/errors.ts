export type ConfigErrorCode = "not_found" | "invalid_yaml" | "invalid_schema" | "invalid_path";

/**
 * Fatal configuration problem. Aborts the run before any file is matched.
 * `issues` holds one line per schema violation when `code` is invalid_schema.
 */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  readonly configPath: string;
  readonly issues: string[];

  constructor(code: ConfigErrorCode, configPath: string, message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
    this.configPath = configPath;
    this.issues = issues;
  }
}

/** Message for any thrown value, without the stack. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
