/**
 * File System Host
 *
 * Primitive, synchronous file-system access consumed by the path operations.
 * Implementations:
 * - `createNodeFileSystemHost()` - Node.js fs module
 * - `createMemoryFileSystemHost()` - in-memory, for tests
 *
 * Paths passed in are normalized absolute path strings. Paths handed back
 * (from the listing calls) are built from the directory argument and may be
 * in any order.
 */

// ============================================================================
// Core Interface
// ============================================================================

export interface FileSystemHost {
  /**
   * Platform identifier, used for host-default line endings and case rules.
   */
  readonly platform: "win32" | "posix";

  /**
   * Whether entry names compare case-sensitively (wildcards included).
   */
  readonly caseSensitive: boolean;

  /** `true` if the path exists and is a regular file. Never throws. */
  fileExists(path: string): boolean;

  /** `true` if the path exists and is a directory. Never throws. */
  directoryExists(path: string): boolean;

  /**
   * Read a file's raw bytes.
   * @throws PathError(FILE_NOT_FOUND) when the file is absent
   */
  readBytes(path: string): Uint8Array;

  /**
   * Read and decode a file. A leading byte-order mark is dropped.
   * @throws PathError(FILE_NOT_FOUND) when the file is absent
   */
  readText(path: string, encoding: BufferEncoding): string;

  /** Create or truncate a file with the given bytes. The parent must exist. */
  writeBytes(path: string, bytes: Uint8Array): void;

  /** Create or truncate a file with encoded text. The parent must exist. */
  writeText(path: string, text: string, encoding: BufferEncoding): void;

  /** Append encoded text, creating the file if needed. The parent must exist. */
  appendText(path: string, text: string, encoding: BufferEncoding): void;

  /** Delete a file. */
  deleteFile(path: string): void;

  /** Create a directory and any missing ancestors. Idempotent. */
  createDirectory(path: string): void;

  /** Delete a directory and everything below it. */
  deleteDirectory(path: string): void;

  /**
   * Files in a directory whose names match a wildcard pattern.
   * @param recursive - Descend into every subdirectory
   * @throws PathError(DIRECTORY_NOT_FOUND) when the directory is absent
   */
  listFiles(directory: string, pattern: string, recursive: boolean): string[];

  /**
   * Directories in a directory whose names match a wildcard pattern.
   * @throws PathError(DIRECTORY_NOT_FOUND) when the directory is absent
   */
  listDirectories(directory: string, pattern: string, recursive: boolean): string[];

  /** `true` when the directory holds at least one file or directory. */
  hasEntries(directory: string): boolean;

  getLastWriteTime(path: string): Date;

  setLastWriteTime(path: string, time: Date): void;

  /** Attribute flags of a file or directory (see {@link FileAttribute}). */
  getAttributes(path: string): number;

  setAttributes(path: string, attributes: number): void;

  /** Rename a file. An existing destination is replaced. */
  moveFile(source: string, destination: string): void;

  /** Copy a file, failing on an existing destination unless `overwrite`. */
  copyFile(source: string, destination: string, overwrite: boolean): void;
}

// ============================================================================
// Attributes
// ============================================================================

/** Attribute flags; combine with `|`. */
export const FileAttribute = {
  NONE: 0,
  READ_ONLY: 1,
  HIDDEN: 2,
  DIRECTORY: 16,
  NORMAL: 128,
} as const;

/** An attribute filter matches when every bit of `mask` is set. */
export function attributesMatch(attributes: number, mask: number): boolean {
  return (attributes & mask) === mask;
}

// ============================================================================
// Wildcards
// ============================================================================

/**
 * Match an entry name against a wildcard pattern.
 *
 * Supports:
 * - `*` - any run of characters
 * - `?` - exactly one character
 */
export function matchesWildcard(name: string, pattern: string, caseSensitive: boolean): boolean {
  if (pattern === "*" || pattern === "*.*") return true;

  const regex = pattern
    // Escape regex special chars (except * and ?)
    .replace(/[.+^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, ".*")
    .replace(/\?/g, ".");

  return new RegExp(`^${regex}$`, caseSensitive ? "" : "i").test(name);
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Last segment of a path, split on either separator.
 */
export function entryName(path: string): string {
  const lastSlash = Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
  return lastSlash >= 0 ? path.slice(lastSlash + 1) : path;
}

/**
 * Decode bytes, dropping a leading byte-order mark.
 */
export function decodeText(bytes: Uint8Array, encoding: BufferEncoding): string {
  const text = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(encoding);
  return text.startsWith("\uFEFF") ? text.slice(1) : text;
}

export function encodeText(text: string, encoding: BufferEncoding): Uint8Array {
  return Buffer.from(text, encoding);
}
