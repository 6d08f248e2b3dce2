import { describe, it, expect } from "vitest";
import { PathErrorCode, isPathError } from "@treekit/paths";
import { createMemoryFileSystemHost } from "../../src/host/memory-host.js";
import { FileAttribute, attributesMatch, entryName, matchesWildcard } from "../../src/host/context.js";

const T1 = new Date(Date.UTC(2023, 2, 1));
const T2 = new Date(Date.UTC(2023, 2, 2));

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (isPathError(error)) return error.code;
    if (error instanceof Error && "code" in error && typeof error.code === "string") return error.code;
    return "unknown";
  }
  return undefined;
}

describe("wildcards", () => {
  it("matches star and question mark against names", () => {
    expect(matchesWildcard("a.txt", "*", true)).toBe(true);
    expect(matchesWildcard("Makefile", "*.*", true)).toBe(true);
    expect(matchesWildcard("file1.ts", "file?.ts", true)).toBe(true);
    expect(matchesWildcard("file10.ts", "file?.ts", true)).toBe(false);
    expect(matchesWildcard("a+b.txt", "a+b.txt", true)).toBe(true);
    expect(matchesWildcard("aab.txt", "a+b.txt", true)).toBe(false);
  });

  it("follows the case rule it is given", () => {
    expect(matchesWildcard("A.TXT", "*.txt", true)).toBe(false);
    expect(matchesWildcard("A.TXT", "*.txt", false)).toBe(true);
  });

  it("matches attribute masks bitwise", () => {
    const attrs = FileAttribute.READ_ONLY | FileAttribute.HIDDEN;
    expect(attributesMatch(attrs, 0)).toBe(true);
    expect(attributesMatch(attrs, FileAttribute.READ_ONLY)).toBe(true);
    expect(attributesMatch(attrs, FileAttribute.READ_ONLY | FileAttribute.DIRECTORY)).toBe(false);
  });

  it("takes entry names from either separator", () => {
    expect(entryName("/a/b.txt")).toBe("b.txt");
    expect(entryName("C:\\a\\b.txt")).toBe("b.txt");
    expect(entryName("plain")).toBe("plain");
  });
});

describe("createMemoryFileSystemHost", () => {
  it("seeds files and directories with their parents", () => {
    const host = createMemoryFileSystemHost({ files: { "/a/b/c.txt": "x" }, directories: ["/empty"] });
    expect(host.getAllFiles()).toEqual(["/a/b/c.txt"]);
    expect(host.getAllDirectories()).toEqual(["/a", "/a/b", "/empty"]);
    expect(host.platform).toBe("posix");
  });

  it("treats roots as existing directories", () => {
    const host = createMemoryFileSystemHost();
    expect(host.directoryExists("/")).toBe(true);
    expect(host.directoryExists("C:\\")).toBe(true);
    expect(host.getAttributes("/")).toBe(FileAttribute.DIRECTORY);
    expect(host.hasEntries("/")).toBe(false);
  });

  it("requires the parent directory for writes", () => {
    const host = createMemoryFileSystemHost();
    expect(errorCode(() => host.writeText("/no/such/file.txt", "x", "utf8"))).toBe(PathErrorCode.DIRECTORY_NOT_FOUND);
    host.createDirectory("/no/such");
    host.writeText("/no/such/file.txt", "x", "utf8");
    expect(host.readText("/no/such/file.txt", "utf8")).toBe("x");
  });

  it("compares unix paths by case only when case-sensitive", () => {
    const sensitive = createMemoryFileSystemHost({ files: { "/Dir/File.txt": "x" } });
    expect(sensitive.fileExists("/dir/file.txt")).toBe(false);

    const insensitive = createMemoryFileSystemHost({ files: { "/Dir/File.txt": "x" }, caseSensitive: false });
    expect(insensitive.fileExists("/dir/file.txt")).toBe(true);
    expect(insensitive.listFiles("/DIR", "*.TXT", false)).toEqual(["/Dir/File.txt"]);
  });

  it("always compares drive paths case-insensitively", () => {
    const host = createMemoryFileSystemHost({ files: { "C:\\Work\\A.txt": "x" } });
    expect(host.fileExists("c:\\work\\a.txt")).toBe(true);
    expect(host.fileExists("C:/Work/A.txt")).toBe(true);
  });

  it("lists immediate or recursive entries", () => {
    const host = createMemoryFileSystemHost({
      files: { "/r/a.txt": "", "/r/s/b.txt": "", "/r/s/t/c.md": "" },
    });
    expect(host.listFiles("/r", "*", false)).toEqual(["/r/a.txt"]);
    expect([...host.listFiles("/r", "*.txt", true)].sort()).toEqual(["/r/a.txt", "/r/s/b.txt"]);
    expect([...host.listDirectories("/r", "*", true)].sort()).toEqual(["/r/s", "/r/s/t"]);
    expect(errorCode(() => host.listFiles("/missing", "*", false))).toBe(PathErrorCode.DIRECTORY_NOT_FOUND);
  });

  it("refuses to delete read-only files", () => {
    const host = createMemoryFileSystemHost({ files: { "/d/locked.txt": "x" } });
    host.setAttributes("/d/locked.txt", FileAttribute.READ_ONLY);
    expect(errorCode(() => host.deleteFile("/d/locked.txt"))).toBe("EACCES");
    expect(errorCode(() => host.deleteDirectory("/d"))).toBe("EACCES");
    expect(host.fileExists("/d/locked.txt")).toBe(true);
  });

  it("keeps write times on move and stamps them on copy", () => {
    let clock = T1;
    const host = createMemoryFileSystemHost({ now: () => clock });
    host.addFile("/a.txt", "x", T1);
    clock = T2;
    host.copyFile("/a.txt", "/b.txt", false);
    host.moveFile("/a.txt", "/c.txt");
    expect(host.getLastWriteTime("/b.txt")).toEqual(T2);
    expect(host.getLastWriteTime("/c.txt")).toEqual(T1);
    expect(host.getAllFiles()).toEqual(["/b.txt", "/c.txt"]);
  });

  it("refuses to copy over an existing file without overwrite", () => {
    const host = createMemoryFileSystemHost({ files: { "/a.txt": "a", "/b.txt": "b" } });
    expect(errorCode(() => host.copyFile("/a.txt", "/b.txt", false))).toBe("EEXIST");
    host.copyFile("/a.txt", "/b.txt", true);
    expect(host.readText("/b.txt", "utf8")).toBe("a");
  });

  it("appends to new and existing files", () => {
    const host = createMemoryFileSystemHost();
    host.appendText("/log.txt", "one", "utf8");
    host.appendText("/log.txt", "two", "utf8");
    expect(host.readText("/log.txt", "utf8")).toBe("onetwo");
  });

  it("reports missing files", () => {
    const host = createMemoryFileSystemHost();
    expect(errorCode(() => host.readBytes("/none"))).toBe(PathErrorCode.FILE_NOT_FOUND);
    expect(errorCode(() => host.getLastWriteTime("/none"))).toBe(PathErrorCode.FILE_NOT_FOUND);
  });
});
