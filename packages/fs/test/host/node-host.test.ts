import { test, expect } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PathErrorCode, isPathError } from "@treekit/paths";
import { AbsolutePath } from "../../src/absolute-path.js";
import { ExistsPolicy } from "../../src/exists-policy.js";
import { FileAttribute } from "../../src/host/context.js";
import { createNodeFileSystemHost } from "../../src/host/node-host.js";
import { createMemoryFileSystemHost } from "../../src/host/memory-host.js";

const host = createNodeFileSystemHost();

function withTempDir(run: (dir: AbsolutePath) => void): void {
  const tmp = fs.mkdtempSync(path.join(os.tmpdir(), "treekit-"));
  try {
    run(AbsolutePath.parse(tmp, host));
  } finally {
    fs.rmSync(tmp, { recursive: true, force: true });
  }
}

test("text round-trips through the disk", () => {
  withTempDir((dir) => {
    const file = dir.combine("out/notes.txt").file;
    file.writeAllText("a\nb\n\n");
    expect(fs.readFileSync(file.path.value, "utf8")).toBe("a\nb\n");
    expect(file.readAllLines()).toEqual(["a", "b"]);
    file.appendAllText("c");
    expect(file.readAllText()).toBe("a\nb\nc");
  });
});

test("enumeration and hashing agree with the in-memory host", () => {
  withTempDir((dir) => {
    dir.combine("a.txt").file.writeAllText("alpha", { eofLineBreak: false });
    dir.combine("sub/b.txt").file.writeAllText("beta", { eofLineBreak: false });

    expect(dir.directory.getFiles({ depth: 2 }).map((p) => p.relativeTo(dir))).toEqual(["a.txt", "sub/b.txt"]);
    expect(dir.directory.getDirectories().toArray().map((p) => p.name)).toEqual(["sub"]);

    const memory = createMemoryFileSystemHost({ files: { "/m/a.txt": "alpha", "/m/sub/b.txt": "beta" } });
    expect(dir.directory.getDirectoryHash()).toBe(
      AbsolutePath.parse("/m", memory).directory.getDirectoryHash(),
    );
  });
});

test("files move with conflict policies", () => {
  withTempDir((dir) => {
    const source = dir.combine("src/x.txt");
    const target = dir.combine("dst/x.txt");
    source.file.writeAllText("new");
    target.file.writeAllText("old");

    expect(source.file.move(target, { policy: ExistsPolicy.MERGE_AND_SKIP }).equals(source)).toBe(true);
    expect(source.file.move(target, { policy: ExistsPolicy.MERGE_AND_OVERWRITE }).equals(target)).toBe(true);
    expect(source.file.exists()).toBe(false);
    expect(target.file.readAllText()).toBe("new\n");
  });
});

test("attributes map onto permissions and names", () => {
  withTempDir((dir) => {
    const file = dir.combine("data.txt").file;
    file.writeAllText("x");
    expect(host.getAttributes(file.path.value)).toBe(FileAttribute.NORMAL);

    host.setAttributes(file.path.value, FileAttribute.READ_ONLY);
    expect(host.getAttributes(file.path.value)).toBe(FileAttribute.READ_ONLY);

    dir.combine(".env").file.writeAllText("K=V");
    expect(host.getAttributes(dir.combine(".env").value)).toBe(FileAttribute.HIDDEN);
    expect(host.getAttributes(dir.value)).toBe(FileAttribute.DIRECTORY);

    dir.directory.remove();
    expect(dir.directory.exists()).toBe(false);
  });
});

test("missing entries become path errors", () => {
  withTempDir((dir) => {
    const missing = dir.combine("none");
    let caught: unknown;
    try {
      host.readBytes(missing.value);
    } catch (error) {
      caught = error;
    }
    expect(isPathError(caught, PathErrorCode.FILE_NOT_FOUND)).toBe(true);

    caught = undefined;
    try {
      host.listFiles(missing.value, "*", false);
    } catch (error) {
      caught = error;
    }
    expect(isPathError(caught, PathErrorCode.DIRECTORY_NOT_FOUND)).toBe(true);
  });
});

test("entry names with a colon are listed and hashed as-is", () => {
  withTempDir((dir) => {
    const source = dir.combine("src");
    source.directory.create();
    fs.writeFileSync(path.join(source.value, "c:notes"), "n");
    fs.writeFileSync(path.join(source.value, "plain.txt"), "p");

    expect(source.directory.getFiles().map((p) => p.name)).toEqual(["c:notes", "plain.txt"]);
    expect(source.directory.containsFile("c:*")).toBe(true);

    const memory = createMemoryFileSystemHost({ files: { "/m/c:notes": "n", "/m/plain.txt": "p" } });
    expect(source.directory.getDirectoryHash()).toBe(AbsolutePath.parse("/m", memory).directory.getDirectoryHash());

    source.directory.copy(dir.combine("dst"));
    expect(fs.readFileSync(path.join(dir.value, "dst", "c:notes"), "utf8")).toBe("n");

    source.directory.remove();
    expect(source.directory.exists()).toBe(false);
  });
});

test("entry names with a backslash are left out of listings", () => {
  withTempDir((dir) => {
    fs.writeFileSync(path.join(dir.value, "a\\b"), "x");
    fs.writeFileSync(path.join(dir.value, "plain.txt"), "p");

    expect(dir.directory.getFiles().map((p) => p.name)).toEqual(["plain.txt"]);
    expect(dir.directory.getDirectoryHash()).toBe(
      AbsolutePath.parse("/m", createMemoryFileSystemHost({ files: { "/m/plain.txt": "p" } })).directory.getDirectoryHash(),
    );
  });
});

test("writes under a missing directory become path errors", () => {
  withTempDir((dir) => {
    const file = dir.combine("missing/f.txt").file;
    let caught: unknown;
    try {
      file.touch({ createParents: false });
    } catch (error) {
      caught = error;
    }
    expect(isPathError(caught, PathErrorCode.DIRECTORY_NOT_FOUND)).toBe(true);

    caught = undefined;
    try {
      host.appendText(file.path.value, "x", "utf8");
    } catch (error) {
      caught = error;
    }
    expect(isPathError(caught, PathErrorCode.DIRECTORY_NOT_FOUND)).toBe(true);
  });
});
