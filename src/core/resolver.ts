import { existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import { normalizeName } from "./target-index.js";
import {
  ok,
  err,
  type FieldValues,
  type MatchError,
  type Result,
  type TargetFolder,
  type TargetIndex,
} from "./types.js";

function fieldValue(fields: FieldValues, field: string): string {
  const value = fields[field];
  if (value === undefined) {
    // Config validation guarantees both resolver fields are declared
    throw new Error(`Field "${field}" is not defined in fields_config`);
  }
  return value;
}

/**
 * Find the single top-level target folder whose normalized name contains
 * the normalized field value.
 */
export function resolveParent(
  fields: FieldValues,
  parentField: string,
  index: TargetIndex
): Result<TargetFolder, MatchError> {
  const value = fieldValue(fields, parentField);
  const needle = normalizeName(value);
  const candidates = index.filter((folder) => folder.key.includes(needle));

  if (candidates.length > 1) {
    return err({
      kind: "AmbiguousParentMatch",
      field: parentField,
      candidates: candidates.map((c) => c.name),
    });
  }
  if (candidates.length === 0) {
    return err({ kind: "NoParentMatch", field: parentField, value });
  }
  return ok(candidates[0]);
}

/**
 * Find the single sub-folder of `parent` whose name contains the field
 * value (case-insensitive), and make sure `fileName` isn't already there.
 */
export function resolveSub(
  fields: FieldValues,
  subField: string,
  parent: TargetFolder,
  fileName: string
): Result<string, MatchError> {
  const value = fieldValue(fields, subField);
  const needle = value.toLowerCase();

  // files count as candidates too
  const candidates = readdirSync(parent.path)
    .filter((name) => name.toLowerCase().includes(needle))
    .sort();

  if (candidates.length === 0) {
    return err({ kind: "NoSubMatch", field: subField, value, parentFolder: parent.name });
  }
  if (candidates.length > 1) {
    return err({
      kind: "AmbiguousSubMatch",
      field: subField,
      value,
      parentFolder: parent.name,
      candidates,
    });
  }

  const subDir = join(parent.path, candidates[0]);
  const existing = join(subDir, fileName);
  if (existsSync(existing) && statSync(existing).isFile()) {
    return err({ kind: "DestinationCollision", parentFolder: parent.name, subFolder: candidates[0] });
  }

  return ok(subDir);
}

export function describeMatchError(error: MatchError): string {
  switch (error.kind) {
    case "NoParentMatch":
      return `Could not find folder for ${error.field}: "${error.value}"`;
    case "AmbiguousParentMatch":
      return (
        `Found multiple matching ${error.field} folders: [${error.candidates.join(", ")}]. ` +
        "File name may need more detail"
      );
    case "NoSubMatch":
      return `No ${error.field} folder matching "${error.value}" in ../${error.parentFolder}`;
    case "AmbiguousSubMatch":
      return (
        `Found multiple matching sub folders for: "${error.value}" in ../${error.parentFolder}: ` +
        `[${error.candidates.join(", ")}]`
      );
    case "DestinationCollision":
      return `Same filename already exists in ../${error.parentFolder}/${error.subFolder}`;
  }
}
