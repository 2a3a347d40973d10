import { extname, basename } from "node:path";
import {
  ok,
  err,
  type FieldRule,
  type FieldValues,
  type ParseError,
  type Result,
} from "./types.js";

/** Filename without its final extension ("a-b.tar.gz" → "a-b.tar") */
export function fileStem(filename: string): string {
  return basename(filename, extname(filename));
}

/**
 * Split a filename stem on "-" and check each segment against its rule.
 * Surplus segments beyond the declared fields are ignored.
 */
export function parseFilename(
  filename: string,
  rules: readonly FieldRule[]
): Result<FieldValues, ParseError> {
  const segments = fileStem(filename).split("-").map((s) => s.trim());

  if (segments.length < rules.length) {
    return err({ kind: "InsufficientFields", expected: rules.length, found: segments.length });
  }

  const fields: FieldValues = {};
  for (const [i, rule] of rules.entries()) {
    const value = segments[i];
    if (rule.allowedValues.length > 0 && !rule.allowedValues.includes(value.toUpperCase())) {
      return err({
        kind: "InvalidFieldValue",
        field: rule.name,
        position: i + 1,
        value,
        allowed: rule.allowedValues,
      });
    }
    fields[rule.name] = value;
  }

  return ok(fields);
}

export function describeParseError(error: ParseError): string {
  switch (error.kind) {
    case "InsufficientFields":
      return `Expected ${error.expected} fields, found ${error.found}`;
    case "InvalidFieldValue":
      return (
        `Wrong name/value: "${error.value}" for field: ${error.field.toUpperCase()} ` +
        `in position ${error.position}. Should be one of the following: [${error.allowed.join(", ")}]`
      );
  }
}

/** Expected naming format, e.g. "[client] - [year] - [description]" */
export function describeFormat(rules: readonly FieldRule[]): string {
  return rules.map((r) => `[${r.name}]`).join(" - ");
}
