/**
 * In-Memory File System Host
 *
 * Deterministic host for tests. Mirrors the behaviour of a real file system
 * closely enough for the path operations: parents must exist before children
 * are written, read-only files refuse deletion, roots always exist.
 */

import { PathError, PathErrorCode, hasWindowsRoot } from "@treekit/paths";
import {
  FileAttribute,
  decodeText,
  encodeText,
  entryName,
  matchesWildcard,
  type FileSystemHost,
} from "./context.js";

interface MemoryFileEntry {
  readonly kind: "file";
  readonly path: string;
  bytes: Uint8Array;
  mtime: Date;
  attributes: number;
}

interface MemoryDirectoryEntry {
  readonly kind: "directory";
  readonly path: string;
  attributes: number;
}

type MemoryEntry = MemoryFileEntry | MemoryDirectoryEntry;

/**
 * Options for creating an in-memory host.
 */
export interface MemoryFileSystemHostOptions {
  /**
   * Initial file contents, keyed by absolute path. Parents are created.
   */
  readonly files?: Record<string, string | Uint8Array>;

  /**
   * Initial (possibly empty) directories.
   */
  readonly directories?: readonly string[];

  /**
   * Platform to simulate. Defaults to "posix".
   */
  readonly platform?: "win32" | "posix";

  /**
   * Case sensitivity for Unix-rooted paths. Drive-rooted paths always
   * compare case-insensitively. Defaults to `true`.
   */
  readonly caseSensitive?: boolean;

  /**
   * Clock used for write times.
   */
  readonly now?: () => Date;
}

/**
 * In-memory host with setup and inspection helpers.
 */
export interface MemoryFileSystemHost extends FileSystemHost {
  /** Add a file, creating missing parents. */
  addFile(path: string, content: string | Uint8Array, mtime?: Date): void;

  /** Add a directory, creating missing parents. */
  addDirectory(path: string): void;

  /** Every file path, sorted. */
  getAllFiles(): string[];

  /** Every directory path (roots excluded), sorted. */
  getAllDirectories(): string[];
}

function errnoError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

/**
 * Create an in-memory host.
 *
 * @example
 * ```typescript
 * const host = createMemoryFileSystemHost({
 *   files: { "/repo/src/a.ts": "export {};" },
 * });
 * AbsolutePath.parse("/repo/src/a.ts", host).file.exists(); // true
 * ```
 */
export function createMemoryFileSystemHost(options?: MemoryFileSystemHostOptions): MemoryFileSystemHost {
  const platform = options?.platform ?? "posix";
  const caseSensitive = options?.caseSensitive ?? true;
  const now = options?.now ?? (() => new Date());

  const entries = new Map<string, MemoryEntry>();

  function keyOf(path: string): string {
    let key = path.replace(/\\/g, "/");
    const drive = /^([A-Za-z]:)\/*$/.exec(key);
    if (drive) {
      key = `${drive[1]}/`;
    } else if (key.length > 1) {
      key = key.replace(/\/+$/, "");
    }
    return caseSensitive && !hasWindowsRoot(path) ? key : key.toLowerCase();
  }

  function isRootKey(key: string): boolean {
    return key === "/" || /^[a-z]:\/$/i.test(key);
  }

  function parentKey(key: string): string | undefined {
    if (isRootKey(key)) return undefined;
    const slash = key.lastIndexOf("/");
    if (slash < 0) return undefined;
    const head = key.slice(0, slash);
    if (head === "") return "/";
    if (/^[a-z]:$/i.test(head)) return `${head}/`;
    return head;
  }

  function prefixOf(key: string): string {
    return key.endsWith("/") ? key : `${key}/`;
  }

  function isDirectoryKey(key: string): boolean {
    return isRootKey(key) || entries.get(key)?.kind === "directory";
  }

  function getFile(path: string): MemoryFileEntry {
    const entry = entries.get(keyOf(path));
    if (entry?.kind !== "file") {
      throw new PathError(`File '${path}' not found`, PathErrorCode.FILE_NOT_FOUND, path);
    }
    return entry;
  }

  function getEntry(path: string): MemoryEntry {
    const key = keyOf(path);
    const entry = entries.get(key);
    if (entry) return entry;
    if (isRootKey(key)) {
      return { kind: "directory", path, attributes: FileAttribute.DIRECTORY };
    }
    throw new PathError(`'${path}' not found`, PathErrorCode.FILE_NOT_FOUND, path);
  }

  function requireDirectory(path: string): string {
    const key = keyOf(path);
    if (!isDirectoryKey(key)) {
      throw new PathError(`Directory '${path}' not found`, PathErrorCode.DIRECTORY_NOT_FOUND, path);
    }
    return key;
  }

  function requireParent(path: string): void {
    const parent = parentKey(keyOf(path));
    if (parent !== undefined && !isDirectoryKey(parent)) {
      throw new PathError(
        `Directory of '${path}' not found`,
        PathErrorCode.DIRECTORY_NOT_FOUND,
        path,
      );
    }
  }

  function assertWritable(entry: MemoryEntry): void {
    if ((entry.attributes & FileAttribute.READ_ONLY) !== 0) {
      throw errnoError(`EACCES: permission denied, '${entry.path}'`, "EACCES");
    }
  }

  function putFile(path: string, bytes: Uint8Array, mtime: Date): void {
    const key = keyOf(path);
    const existing = entries.get(key);
    if (existing?.kind === "directory") {
      throw errnoError(`EISDIR: illegal operation on a directory, '${path}'`, "EISDIR");
    }
    if (existing) {
      assertWritable(existing);
      existing.bytes = new Uint8Array(bytes);
      existing.mtime = mtime;
      return;
    }
    entries.set(key, { kind: "file", path, bytes: new Uint8Array(bytes), mtime, attributes: FileAttribute.NORMAL });
  }

  function makeDirectory(path: string): void {
    const chain: string[] = [];
    let current: string | undefined = path;
    while (current !== undefined) {
      const key = keyOf(current);
      if (isRootKey(key)) break;
      const existing = entries.get(key);
      if (existing?.kind === "directory") break;
      if (existing?.kind === "file") {
        throw errnoError(`EEXIST: file already exists, '${current}'`, "EEXIST");
      }
      chain.push(current);
      current = parentPath(current);
    }
    for (const dir of chain) {
      entries.set(keyOf(dir), { kind: "directory", path: dir, attributes: FileAttribute.DIRECTORY });
    }
  }

  function parentPath(path: string): string | undefined {
    const trimmed = path.length > 1 ? path.replace(/[\\/]+$/, "") : path;
    const slash = Math.max(trimmed.lastIndexOf("/"), trimmed.lastIndexOf("\\"));
    if (slash < 0) return undefined;
    const head = trimmed.slice(0, slash);
    if (head === "") return trimmed === "/" ? undefined : "/";
    return head;
  }

  function list(directory: string, pattern: string, recursive: boolean, kind: MemoryEntry["kind"]): string[] {
    const dirKey = requireDirectory(directory);
    const prefix = prefixOf(dirKey);
    const results: string[] = [];
    for (const [key, entry] of entries) {
      if (entry.kind !== kind) continue;
      const inScope = recursive ? key.startsWith(prefix) : parentKey(key) === dirKey;
      if (inScope && matchesWildcard(entryName(entry.path), pattern, caseSensitive)) {
        results.push(entry.path);
      }
    }
    return results;
  }

  const host: MemoryFileSystemHost = {
    platform,
    caseSensitive,

    fileExists(path: string): boolean {
      return entries.get(keyOf(path))?.kind === "file";
    },

    directoryExists(path: string): boolean {
      return isDirectoryKey(keyOf(path));
    },

    readBytes(path: string): Uint8Array {
      return new Uint8Array(getFile(path).bytes);
    },

    readText(path: string, encoding: BufferEncoding): string {
      return decodeText(getFile(path).bytes, encoding);
    },

    writeBytes(path: string, bytes: Uint8Array): void {
      requireParent(path);
      putFile(path, bytes, now());
    },

    writeText(path: string, text: string, encoding: BufferEncoding): void {
      requireParent(path);
      putFile(path, encodeText(text, encoding), now());
    },

    appendText(path: string, text: string, encoding: BufferEncoding): void {
      requireParent(path);
      const existing = entries.get(keyOf(path));
      const head = existing?.kind === "file" ? existing.bytes : new Uint8Array();
      const tail = encodeText(text, encoding);
      const merged = new Uint8Array(head.length + tail.length);
      merged.set(head, 0);
      merged.set(tail, head.length);
      putFile(path, merged, now());
    },

    deleteFile(path: string): void {
      const entry = getFile(path);
      assertWritable(entry);
      entries.delete(keyOf(path));
    },

    createDirectory(path: string): void {
      makeDirectory(path);
    },

    deleteDirectory(path: string): void {
      const dirKey = requireDirectory(path);
      const prefix = prefixOf(dirKey);
      const doomed = [...entries.keys()].filter((key) => key === dirKey || key.startsWith(prefix));
      for (const key of doomed) {
        const entry = entries.get(key);
        if (entry?.kind === "file") assertWritable(entry);
      }
      for (const key of doomed) {
        entries.delete(key);
      }
    },

    listFiles(directory: string, pattern: string, recursive: boolean): string[] {
      return list(directory, pattern, recursive, "file");
    },

    listDirectories(directory: string, pattern: string, recursive: boolean): string[] {
      return list(directory, pattern, recursive, "directory");
    },

    hasEntries(directory: string): boolean {
      const dirKey = requireDirectory(directory);
      for (const key of entries.keys()) {
        if (parentKey(key) === dirKey) return true;
      }
      return false;
    },

    getLastWriteTime(path: string): Date {
      return new Date(getFile(path).mtime.getTime());
    },

    setLastWriteTime(path: string, time: Date): void {
      getFile(path).mtime = new Date(time.getTime());
    },

    getAttributes(path: string): number {
      return getEntry(path).attributes;
    },

    setAttributes(path: string, attributes: number): void {
      const entry = getEntry(path);
      entry.attributes = entry.kind === "directory" ? attributes | FileAttribute.DIRECTORY : attributes;
    },

    moveFile(source: string, destination: string): void {
      const entry = getFile(source);
      requireParent(destination);
      const destinationKey = keyOf(destination);
      if (entries.get(destinationKey)?.kind === "directory") {
        throw errnoError(`EISDIR: illegal operation on a directory, '${destination}'`, "EISDIR");
      }
      entries.delete(keyOf(source));
      entries.set(destinationKey, { ...entry, path: destination });
    },

    copyFile(source: string, destination: string, overwrite: boolean): void {
      const entry = getFile(source);
      requireParent(destination);
      if (!overwrite && entries.has(keyOf(destination))) {
        throw errnoError(`EEXIST: file already exists, '${destination}'`, "EEXIST");
      }
      putFile(destination, entry.bytes, now());
    },

    addFile(path: string, content: string | Uint8Array, mtime?: Date): void {
      const parent = parentPath(path);
      if (parent !== undefined) makeDirectory(parent);
      const bytes = typeof content === "string" ? encodeText(content, "utf8") : content;
      putFile(path, bytes, mtime ?? now());
    },

    addDirectory(path: string): void {
      makeDirectory(path);
    },

    getAllFiles(): string[] {
      return [...entries.values()]
        .filter((entry) => entry.kind === "file")
        .map((entry) => entry.path)
        .sort();
    },

    getAllDirectories(): string[] {
      return [...entries.values()]
        .filter((entry) => entry.kind === "directory")
        .map((entry) => entry.path)
        .sort();
    },
  };

  for (const dir of options?.directories ?? []) {
    host.addDirectory(dir);
  }
  for (const [path, content] of Object.entries(options?.files ?? {})) {
    host.addFile(path, content);
  }

  return host;
}
