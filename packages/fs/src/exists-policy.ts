/* =============================================================================
 * EXISTS POLICY
 * -----------------------------------------------------------------------------
 * Bit flags telling move/copy what to do when a target is already present.
 * Two independent axes, exactly one bit per axis:
 *
 *   directory: FAIL | MERGE
 *   file:      FAIL | SKIP | OVERWRITE | OVERWRITE_IF_NEWER
 * ============================================================================= */

import { PathError, PathErrorCode, debug } from "@treekit/paths";

export const ExistsPolicy = {
  DIRECTORY_FAIL: 1,
  DIRECTORY_MERGE: 2,
  FILE_FAIL: 4,
  FILE_SKIP: 8,
  FILE_OVERWRITE: 16,
  FILE_OVERWRITE_IF_NEWER: 32,

  FAIL: 1 | 4,
  MERGE_AND_SKIP: 2 | 8,
  MERGE_AND_OVERWRITE: 2 | 16,
  MERGE_AND_OVERWRITE_IF_NEWER: 2 | 32,
} as const;

/** A combination of {@link ExistsPolicy} bits. */
export type ExistsPolicyFlags = number;

export type FilePolicy = "fail" | "skip" | "overwrite" | "overwrite-if-newer";
export type DirectoryPolicy = "fail" | "merge";

/**
 * Outcome of a file conflict:
 * - `fail`: raise ALREADY_EXISTS
 * - `skip`: leave both files, report the source
 * - `overwrite`: replace the target
 * - `keep-target`: the target is at least as new, leave it and report it
 */
export type FileConflictAction = "fail" | "skip" | "overwrite" | "keep-target";

const FILE_BITS: ReadonlyArray<readonly [number, FilePolicy]> = [
  [ExistsPolicy.FILE_FAIL, "fail"],
  [ExistsPolicy.FILE_SKIP, "skip"],
  [ExistsPolicy.FILE_OVERWRITE, "overwrite"],
  [ExistsPolicy.FILE_OVERWRITE_IF_NEWER, "overwrite-if-newer"],
];

const DIRECTORY_BITS: ReadonlyArray<readonly [number, DirectoryPolicy]> = [
  [ExistsPolicy.DIRECTORY_FAIL, "fail"],
  [ExistsPolicy.DIRECTORY_MERGE, "merge"],
];

function selectOne<T>(policy: ExistsPolicyFlags, bits: ReadonlyArray<readonly [number, T]>, axis: string): T {
  const set = bits.filter(([bit]) => (policy & bit) !== 0);
  const only = set[0];
  if (set.length !== 1 || only === undefined) {
    throw new PathError(
      `Exists policy ${policy} must set exactly one ${axis} bit (found ${set.length})`,
      PathErrorCode.INVALID_CONFIGURATION,
    );
  }
  return only[1];
}

/** The file axis of a policy. */
export function filePolicyOf(policy: ExistsPolicyFlags): FilePolicy {
  return selectOne(policy, FILE_BITS, "file");
}

/** The directory axis of a policy. */
export function directoryPolicyOf(policy: ExistsPolicyFlags): DirectoryPolicy {
  return selectOne(policy, DIRECTORY_BITS, "directory");
}

/** Timestamps are only read for `overwrite-if-newer`. */
export interface ConflictTimes {
  readonly source: Date;
  readonly target: Date;
}

/**
 * Decide a file conflict for a target that already exists.
 */
export function resolveFileConflict(policy: ExistsPolicyFlags, times: () => ConflictTimes): FileConflictAction {
  const filePolicy = filePolicyOf(policy);
  switch (filePolicy) {
    case "fail":
      return "fail";
    case "skip":
      return "skip";
    case "overwrite":
      return "overwrite";
    case "overwrite-if-newer": {
      const { source, target } = times();
      const action = target.getTime() < source.getTime() ? "overwrite" : "keep-target";
      debug.file("conflict.if-newer", { source, target, action });
      return action;
    }
  }
}

/** Human-readable form, e.g. `directory:merge|file:overwrite`. */
export function describePolicy(policy: ExistsPolicyFlags): string {
  const directory = DIRECTORY_BITS.filter(([bit]) => (policy & bit) !== 0).map(([, name]) => name);
  const file = FILE_BITS.filter(([bit]) => (policy & bit) !== 0).map(([, name]) => name);
  return `directory:${directory.join(",") || "none"}|file:${file.join(",") || "none"}`;
}
