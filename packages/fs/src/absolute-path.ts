/**
 * Absolute Path
 *
 * Immutable, normalized, rooted path bound to the file-system host it was
 * parsed with. Path arithmetic returns new values; I/O goes through the
 * `file` and `directory` views.
 *
 * Equality follows the root kind: drive-rooted paths compare
 * case-insensitively, Unix-rooted paths exactly.
 */

import {
  PathError,
  PathErrorCode,
  combinePaths,
  fsPathFromUri,
  getRoot,
  getSeparator,
  hasRoot,
  isRootPath,
  isWindowsRoot,
  normalizePath,
  relativePath,
  uriFromFsPath,
  type PathSeparator,
} from "@treekit/paths";
import type { FileSystemHost } from "./host/context.js";
import { getDefaultHost } from "./host/default.js";
import { FileOperations } from "./file-operations.js";
import { DirectoryOperations } from "./directory-operations.js";

export class AbsolutePath {
  private constructor(
    /** Normalized path text. */
    readonly value: string,
    /** Host every I/O operation on this path delegates to. */
    readonly host: FileSystemHost,
  ) {}

  /**
   * Parse a rooted path.
   * @throws PathError(MALFORMED_PATH) when the input has no root
   */
  static parse(raw: string, host: FileSystemHost = getDefaultHost()): AbsolutePath {
    if (!hasRoot(raw)) {
      throw new PathError(`Path '${raw}' is not absolute`, PathErrorCode.MALFORMED_PATH, raw);
    }
    return new AbsolutePath(normalizePath(raw), host);
  }

  /**
   * Parse a path, resolving a relative one against `cwd`
   * (default `process.cwd()`).
   */
  static fromCurrentDirectory(raw: string, cwd: string = process.cwd(), host?: FileSystemHost): AbsolutePath {
    if (hasRoot(raw)) return AbsolutePath.parse(raw, host);
    return AbsolutePath.parse(cwd, host).combine(raw);
  }

  /** Parse the path of a `file:` URI. */
  static fromUri(uri: string, host?: FileSystemHost): AbsolutePath {
    return AbsolutePath.parse(fsPathFromUri(uri), host);
  }

  // ==========================================================================
  // Components
  // ==========================================================================

  /** `/` or a drive (`C:`). */
  get root(): string {
    return getRoot(this.value) ?? "";
  }

  get separator(): PathSeparator {
    return getSeparator(this.value);
  }

  get isWindowsRooted(): boolean {
    return isWindowsRoot(this.root);
  }

  /** Whether this path is a root and so has no parent. */
  get isRoot(): boolean {
    return isRootPath(this.value);
  }

  /** Last component; empty for a root. */
  get name(): string {
    if (this.isRoot) return "";
    return this.value.slice(this.value.lastIndexOf(this.separator) + 1);
  }

  /** Containing directory, `undefined` for a root. */
  get parent(): AbsolutePath | undefined {
    if (this.isRoot) return undefined;
    const head = this.value.slice(0, this.value.lastIndexOf(this.separator));
    return this.derive(head === "" || isWindowsRoot(head) ? combinePaths(this.root, "") : head);
  }

  /** String usable as a map key, consistent with {@link equals}. */
  get key(): string {
    return this.isWindowsRooted ? this.value.toLowerCase() : this.value;
  }

  get file(): FileOperations {
    return new FileOperations(this);
  }

  get directory(): DirectoryOperations {
    return new DirectoryOperations(this);
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  /**
   * Append a relative segment and normalize.
   * @throws PathError(MALFORMED_PATH) when the segment is rooted
   */
  combine(segment: string): AbsolutePath {
    return this.derive(combinePaths(this.value, segment, this.separator));
  }

  /**
   * Path of the directory entry `name`. The name is taken literally, so a
   * colon in it is not read as a drive.
   */
  child(name: string): AbsolutePath {
    return this.derive(this.isRoot ? this.value + name : this.value + this.separator + name);
  }

  /** Raw string concatenation, then normalization (`/a/b` + `.txt`). */
  concat(suffix: string): AbsolutePath {
    return this.derive(this.value + suffix);
  }

  /** Relative path from `base` to this path; empty when they are equal. */
  relativeTo(base: AbsolutePath): string {
    return relativePath(base.value, this.value);
  }

  /** Parse another raw path against this path's host. */
  derive(raw: string): AbsolutePath {
    return AbsolutePath.parse(raw, this.host);
  }

  /** Ancestors from nearest to the root, optionally starting with this path. */
  ancestors(includeSelf = false): AbsolutePath[] {
    const result: AbsolutePath[] = [];
    let current: AbsolutePath | undefined = includeSelf ? this : this.parent;
    while (current !== undefined) {
      result.push(current);
      current = current.parent;
    }
    return result;
  }

  /** Whether `other` lies below this path (or equals it, with `includeSelf`). */
  isAncestorOf(other: AbsolutePath, includeSelf = false): boolean {
    return other.ancestors(includeSelf).some((ancestor) => ancestor.equals(this));
  }

  // ==========================================================================
  // Identity
  // ==========================================================================

  equals(other: AbsolutePath | undefined): boolean {
    return other !== undefined && this.key === other.key && this.isWindowsRooted === other.isWindowsRooted;
  }

  /** Ordinal ordering over {@link key}. */
  compare(other: AbsolutePath): number {
    if (this.key === other.key) return 0;
    return this.key < other.key ? -1 : 1;
  }

  toUri(): string {
    return uriFromFsPath(this.value);
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
