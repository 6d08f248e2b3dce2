/**
 * Node.js File System Host
 *
 * Production implementation over the synchronous `node:fs` API.
 */

import * as fs from "node:fs";
import { PathError, PathErrorCode, debug, getSeparator } from "@treekit/paths";
import {
  FileAttribute,
  decodeText,
  encodeText,
  entryName,
  matchesWildcard,
  type FileSystemHost,
} from "./context.js";

/**
 * Options for creating a Node.js host.
 */
export interface NodeFileSystemHostOptions {
  /**
   * Override platform detection.
   */
  readonly platform?: "win32" | "posix";

  /**
   * Override case sensitivity. Defaults to the platform default.
   */
  readonly caseSensitive?: boolean;
}

const OWNER_WRITE = 0o200;
const ALL_WRITE = 0o222;
const PERMISSION_BITS = 0o7777;

function isErrnoException(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/** Join an entry name onto its directory without re-reading it as path syntax. */
function entryPath(directory: string, name: string): string {
  return /[\\/]$/.test(directory) ? directory + name : directory + getSeparator(directory) + name;
}

/**
 * Create a host backed by the local file system.
 *
 * @example
 * ```typescript
 * const host = createNodeFileSystemHost();
 * const path = AbsolutePath.parse("/tmp/build", host);
 * ```
 */
export function createNodeFileSystemHost(options?: NodeFileSystemHostOptions): FileSystemHost {
  const platform = options?.platform ?? (process.platform === "win32" ? "win32" : "posix");
  const caseSensitive = options?.caseSensitive ?? (platform !== "win32");

  function stat(path: string): fs.Stats | undefined {
    return fs.statSync(path, { throwIfNoEntry: false });
  }

  function readFile(path: string): Buffer {
    try {
      return fs.readFileSync(path);
    } catch (error) {
      if (isErrnoException(error, "ENOENT")) {
        throw new PathError(`File '${path}' not found`, PathErrorCode.FILE_NOT_FOUND, path);
      }
      throw error;
    }
  }

  function writeFile(path: string, write: () => void): void {
    try {
      write();
    } catch (error) {
      if (isErrnoException(error, "ENOENT")) {
        throw new PathError(`Directory of '${path}' not found`, PathErrorCode.DIRECTORY_NOT_FOUND, path);
      }
      throw error;
    }
  }

  function readEntries(directory: string): fs.Dirent[] {
    try {
      return fs.readdirSync(directory, { withFileTypes: true });
    } catch (error) {
      if (isErrnoException(error, "ENOENT") || isErrnoException(error, "ENOTDIR")) {
        throw new PathError(`Directory '${directory}' not found`, PathErrorCode.DIRECTORY_NOT_FOUND, directory);
      }
      throw error;
    }
  }

  function list(directory: string, pattern: string, recursive: boolean, wantDirectories: boolean): string[] {
    const results: string[] = [];

    function walk(dir: string): void {
      for (const entry of readEntries(dir)) {
        if (platform === "posix" && entry.name.includes("\\")) {
          // A backslash would read back as a separator on either root kind.
          debug.host("list.skip", { directory: dir, name: entry.name });
          continue;
        }
        const fullPath = entryPath(dir, entry.name);
        const isDirectory = entry.isDirectory();
        if (isDirectory === wantDirectories && (isDirectory || entry.isFile())) {
          if (matchesWildcard(entry.name, pattern, caseSensitive)) {
            results.push(fullPath);
          }
        }
        if (recursive && isDirectory) {
          walk(fullPath);
        }
      }
    }

    walk(directory);
    return results;
  }

  return {
    platform,
    caseSensitive,

    fileExists(path: string): boolean {
      return stat(path)?.isFile() ?? false;
    },

    directoryExists(path: string): boolean {
      return stat(path)?.isDirectory() ?? false;
    },

    readBytes(path: string): Uint8Array {
      return new Uint8Array(readFile(path));
    },

    readText(path: string, encoding: BufferEncoding): string {
      return decodeText(readFile(path), encoding);
    },

    writeBytes(path: string, bytes: Uint8Array): void {
      writeFile(path, () => fs.writeFileSync(path, bytes));
    },

    writeText(path: string, text: string, encoding: BufferEncoding): void {
      writeFile(path, () => fs.writeFileSync(path, encodeText(text, encoding)));
    },

    appendText(path: string, text: string, encoding: BufferEncoding): void {
      writeFile(path, () => fs.appendFileSync(path, encodeText(text, encoding)));
    },

    deleteFile(path: string): void {
      fs.unlinkSync(path);
    },

    createDirectory(path: string): void {
      fs.mkdirSync(path, { recursive: true });
    },

    deleteDirectory(path: string): void {
      fs.rmSync(path, { recursive: true, force: true });
    },

    listFiles(directory: string, pattern: string, recursive: boolean): string[] {
      return list(directory, pattern, recursive, false);
    },

    listDirectories(directory: string, pattern: string, recursive: boolean): string[] {
      return list(directory, pattern, recursive, true);
    },

    hasEntries(directory: string): boolean {
      return readEntries(directory).length > 0;
    },

    getLastWriteTime(path: string): Date {
      const stats = stat(path);
      if (!stats) {
        throw new PathError(`'${path}' not found`, PathErrorCode.FILE_NOT_FOUND, path);
      }
      return stats.mtime;
    },

    setLastWriteTime(path: string, time: Date): void {
      const stats = fs.statSync(path);
      fs.utimesSync(path, stats.atime, time);
    },

    getAttributes(path: string): number {
      const stats = stat(path);
      if (!stats) {
        throw new PathError(`'${path}' not found`, PathErrorCode.FILE_NOT_FOUND, path);
      }
      let attributes: number = FileAttribute.NONE;
      if ((stats.mode & OWNER_WRITE) === 0) attributes |= FileAttribute.READ_ONLY;
      if (entryName(path).startsWith(".")) attributes |= FileAttribute.HIDDEN;
      if (stats.isDirectory()) attributes |= FileAttribute.DIRECTORY;
      return attributes === FileAttribute.NONE ? FileAttribute.NORMAL : attributes;
    },

    setAttributes(path: string, attributes: number): void {
      // Only the read-only bit maps onto POSIX permissions; hidden follows the name.
      const mode = fs.statSync(path).mode & PERMISSION_BITS;
      const next = (attributes & FileAttribute.READ_ONLY) !== 0 ? mode & ~ALL_WRITE : mode | OWNER_WRITE;
      if (next !== mode) {
        debug.host("attributes.chmod", { path, mode: next.toString(8) });
        fs.chmodSync(path, next);
      }
    },

    moveFile(source: string, destination: string): void {
      try {
        fs.renameSync(source, destination);
      } catch (error) {
        if (!isErrnoException(error, "EXDEV")) throw error;
        debug.host("move.cross-device", { source, destination });
        fs.copyFileSync(source, destination);
        fs.unlinkSync(source);
      }
    },

    copyFile(source: string, destination: string, overwrite: boolean): void {
      fs.copyFileSync(source, destination, overwrite ? 0 : fs.constants.COPYFILE_EXCL);
    },
  };
}
