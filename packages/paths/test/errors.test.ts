import { describe, it, expect } from "vitest";
import { PathError, PathErrorCode, isPathError } from "../src/errors.js";

describe("PathError", () => {
  it("carries a code, a path and a stable name", () => {
    const error = new PathError("File '/x' not found", PathErrorCode.FILE_NOT_FOUND, "/x");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("PathError");
    expect(error.code).toBe("PATH_FILE_NOT_FOUND");
    expect(error.path).toBe("/x");
  });

  it("serializes to a plain object", () => {
    const withPath = new PathError("boom", PathErrorCode.ALREADY_EXISTS, "/t");
    expect(withPath.toJSON()).toEqual({ code: "PATH_ALREADY_EXISTS", message: "boom", path: "/t" });

    const withoutPath = new PathError("bad policy", PathErrorCode.INVALID_CONFIGURATION);
    expect(JSON.parse(JSON.stringify(withoutPath))).toEqual({
      code: "PATH_INVALID_CONFIGURATION",
      message: "bad policy",
    });
  });
});

describe("isPathError", () => {
  it("narrows by class and optionally by code", () => {
    const error: unknown = new PathError("x", PathErrorCode.INVALID_TARGET);
    expect(isPathError(error)).toBe(true);
    expect(isPathError(error, PathErrorCode.INVALID_TARGET)).toBe(true);
    expect(isPathError(error, PathErrorCode.MALFORMED_PATH)).toBe(false);
    expect(isPathError(new Error("x"))).toBe(false);
    expect(isPathError("PATH_INVALID_TARGET")).toBe(false);
  });
});
