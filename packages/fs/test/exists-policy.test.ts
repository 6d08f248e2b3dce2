import { describe, it, expect } from "vitest";
import { PathErrorCode, isPathError } from "@treekit/paths";
import {
  ExistsPolicy,
  describePolicy,
  directoryPolicyOf,
  filePolicyOf,
  resolveFileConflict,
  type ConflictTimes,
} from "../src/exists-policy.js";

const OLD = new Date(Date.UTC(2020, 0, 1));
const NEW = new Date(Date.UTC(2021, 0, 1));

const noTimes = (): ConflictTimes => {
  throw new Error("timestamps should not be read");
};

describe("ExistsPolicy", () => {
  it("composes presets from one bit per axis", () => {
    expect(ExistsPolicy.FAIL).toBe(5);
    expect(ExistsPolicy.MERGE_AND_SKIP).toBe(10);
    expect(ExistsPolicy.MERGE_AND_OVERWRITE).toBe(18);
    expect(ExistsPolicy.MERGE_AND_OVERWRITE_IF_NEWER).toBe(34);
  });

  it("splits a policy into its axes", () => {
    expect(filePolicyOf(ExistsPolicy.FAIL)).toBe("fail");
    expect(directoryPolicyOf(ExistsPolicy.FAIL)).toBe("fail");
    expect(filePolicyOf(ExistsPolicy.MERGE_AND_OVERWRITE_IF_NEWER)).toBe("overwrite-if-newer");
    expect(directoryPolicyOf(ExistsPolicy.MERGE_AND_SKIP)).toBe("merge");
  });

  it("rejects zero or several bits on one axis", () => {
    const conflicting = ExistsPolicy.FILE_SKIP | ExistsPolicy.FILE_OVERWRITE;
    for (const fn of [
      () => filePolicyOf(conflicting),
      () => filePolicyOf(ExistsPolicy.DIRECTORY_MERGE),
      () => directoryPolicyOf(ExistsPolicy.DIRECTORY_FAIL | ExistsPolicy.DIRECTORY_MERGE),
      () => directoryPolicyOf(ExistsPolicy.FILE_FAIL),
    ]) {
      let caught: unknown;
      try {
        fn();
      } catch (error) {
        caught = error;
      }
      expect(isPathError(caught, PathErrorCode.INVALID_CONFIGURATION)).toBe(true);
    }
  });

  it("describes policies", () => {
    expect(describePolicy(ExistsPolicy.MERGE_AND_OVERWRITE_IF_NEWER)).toBe(
      "directory:merge|file:overwrite-if-newer",
    );
    expect(describePolicy(0)).toBe("directory:none|file:none");
  });
});

describe("resolveFileConflict", () => {
  it("follows the decision table", () => {
    expect(resolveFileConflict(ExistsPolicy.FAIL, noTimes)).toBe("fail");
    expect(resolveFileConflict(ExistsPolicy.MERGE_AND_SKIP, noTimes)).toBe("skip");
    expect(resolveFileConflict(ExistsPolicy.MERGE_AND_OVERWRITE, noTimes)).toBe("overwrite");
  });

  it("overwrites only a strictly older target", () => {
    const policy = ExistsPolicy.MERGE_AND_OVERWRITE_IF_NEWER;
    expect(resolveFileConflict(policy, () => ({ source: NEW, target: OLD }))).toBe("overwrite");
    expect(resolveFileConflict(policy, () => ({ source: OLD, target: NEW }))).toBe("keep-target");
    expect(resolveFileConflict(policy, () => ({ source: OLD, target: OLD }))).toBe("keep-target");
  });
});
