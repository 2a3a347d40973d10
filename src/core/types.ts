export interface FieldRule {
  name: string;
  allowedValues: readonly string[]; // uppercased; empty = any value
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type FieldValues = Record<string, string>;

export type ParseError =
  | { kind: "InsufficientFields"; expected: number; found: number }
  | {
      kind: "InvalidFieldValue";
      field: string;
      position: number; // 1-based
      value: string;
      allowed: readonly string[];
    };

export type MatchError =
  | { kind: "NoParentMatch"; field: string; value: string }
  | { kind: "AmbiguousParentMatch"; field: string; candidates: string[] }
  | { kind: "NoSubMatch"; field: string; value: string; parentFolder: string }
  | {
      kind: "AmbiguousSubMatch";
      field: string;
      value: string;
      parentFolder: string;
      candidates: string[];
    }
  | { kind: "DestinationCollision"; parentFolder: string; subFolder: string };

export type FailureCategory = "InvalidFileName" | "InvalidMatch";

export interface SourceFile {
  name: string;
  directory: string;
  path: string;
}

export interface NameCheckedFile extends SourceFile {
  fields: FieldValues;
}

export interface MatchedFile extends NameCheckedFile {
  targetParentDir: string;
  targetSubDir: string;
  targetPath: string;
  message: string;
}

export interface FailedFile extends SourceFile {
  fields: FieldValues | null; // null when the name check itself failed
  category: FailureCategory;
  error: ParseError | MatchError;
  reason: string;
  message: string;
}

export type FileOutcome =
  | { status: "matched"; file: MatchedFile }
  | { status: "failed"; file: FailedFile }
  | { status: "skipped"; file: SourceFile; error: ParseError };

export interface RunSummary {
  totalScanned: number;
  matched: MatchedFile[];
  failed: FailedFile[];
  skipped: number;
}

/** A top-level folder of the target tree. `key` is the normalized name. */
export interface TargetFolder {
  key: string;
  name: string;
  path: string;
}

export type TargetIndex = readonly TargetFolder[];
