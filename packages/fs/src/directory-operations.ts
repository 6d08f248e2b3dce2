/**
 * Directory Operations
 *
 * View over an {@link AbsolutePath} that denotes a directory.
 *
 * Enumeration:
 * - `getFiles` walks depth-first with an explicit stack. Each directory's own
 *   files come first, sorted, then each subdirectory in sorted order.
 * - `getDirectories` walks breadth-first, one sorted level at a time, and
 *   restarts from scratch every time it is iterated.
 */

import { PathError, PathErrorCode, debug } from "@treekit/paths";
import type { AbsolutePath } from "./absolute-path.js";
import { FileAttribute, attributesMatch, entryName, matchesWildcard } from "./host/context.js";
import {
  ExistsPolicy,
  directoryPolicyOf,
  filePolicyOf,
  type ExistsPolicyFlags,
} from "./exists-policy.js";
import type { NameSource, PathPredicate } from "./file-operations.js";
import { hashFileSet } from "./hashing.js";

export interface EnumerateOptions {
  /** Wildcard matched against entry names. Defaults to `*`. */
  pattern?: string;
  /** Directory levels to descend; 1 lists only this directory. Defaults to 1. */
  depth?: number;
  /** Attribute bits every result must carry. Defaults to 0 (any). */
  attributes?: number;
}

export interface DirectoryMoveOptions {
  /** Defaults to `FAIL`. */
  policy?: ExistsPolicyFlags;
  /** Create the target's parents. Defaults to `true`. */
  createParents?: boolean;
  /** Remove the source even when skipped files remain in it. */
  deleteRemainingFiles?: boolean;
}

export interface DirectoryCopyOptions {
  /** Defaults to `FAIL`. */
  policy?: ExistsPolicyFlags;
  /** Create the target's parents. Defaults to `true`. */
  createParents?: boolean;
  /** Files for which this returns `true` are not copied. */
  excludeFile?: PathPredicate;
  /** Directories for which this returns `true` are not copied or entered. */
  excludeDirectory?: PathPredicate;
}

function byValue(a: AbsolutePath, b: AbsolutePath): number {
  return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
}

function validateDepth(depth: number): void {
  if (!Number.isInteger(depth) || depth < 0) {
    throw new PathError(`Depth must be a non-negative integer, got ${depth}`, PathErrorCode.INVALID_ARGUMENT);
  }
}

/**
 * Breadth-first directory listing. Each iteration starts a fresh traversal.
 */
export class DirectoryListing implements Iterable<AbsolutePath> {
  constructor(
    private readonly root: AbsolutePath,
    private readonly pattern: string,
    private readonly depth: number,
    private readonly attributes: number,
  ) {}

  *[Symbol.iterator](): Iterator<AbsolutePath> {
    const host = this.root.host;
    let frontier: AbsolutePath[] = [this.root];
    let remaining = this.depth;

    while (remaining > 0 && frontier.length > 0) {
      const next: AbsolutePath[] = [];
      for (const dir of frontier) {
        const children = host
          .listDirectories(dir.value, "*", false)
          .map((raw) => dir.child(entryName(raw)))
          .sort(byValue);
        for (const child of children) {
          if (
            matchesWildcard(child.name, this.pattern, host.caseSensitive) &&
            attributesMatch(host.getAttributes(child.value), this.attributes)
          ) {
            yield child;
          }
          next.push(child);
        }
      }
      frontier = next;
      remaining--;
    }
  }

  toArray(): AbsolutePath[] {
    return [...this];
  }
}

export class DirectoryOperations {
  constructor(readonly path: AbsolutePath) {}

  // ==========================================================================
  // State
  // ==========================================================================

  exists(): boolean {
    return this.path.host.directoryExists(this.path.value);
  }

  /** Create this directory and any missing ancestors. */
  create(): AbsolutePath {
    if (!this.exists()) {
      this.path.host.createDirectory(this.path.value);
      debug.directory("create", { path: this.path });
    }
    return this.path;
  }

  /** Delete the whole tree, clearing read-only on every file first. No-op when absent. */
  remove(): void {
    if (!this.exists()) return;
    const host = this.path.host;
    for (const file of host.listFiles(this.path.value, "*", true)) {
      host.setAttributes(file, FileAttribute.NORMAL);
    }
    host.deleteDirectory(this.path.value);
    debug.directory("remove", { path: this.path });
  }

  cleanAndRecreate(): AbsolutePath {
    this.remove();
    return this.create();
  }

  containsFile(pattern: string, recursive = false): boolean {
    if (!this.exists()) return false;
    return this.path.host.listFiles(this.path.value, pattern, recursive).length > 0;
  }

  containsDirectory(pattern: string, recursive = false): boolean {
    if (!this.exists()) return false;
    return this.path.host.listDirectories(this.path.value, pattern, recursive).length > 0;
  }

  // ==========================================================================
  // Enumeration
  // ==========================================================================

  /**
   * Files up to `depth` levels down, depth-first, sorted within each level.
   * @throws PathError(INVALID_ARGUMENT) for a negative depth
   */
  getFiles(options: EnumerateOptions = {}): AbsolutePath[] {
    const { pattern = "*", depth = 1, attributes = 0 } = options;
    validateDepth(depth);
    if (depth === 0) return [];

    const host = this.path.host;
    const result: AbsolutePath[] = [];
    const stack: Array<{ dir: AbsolutePath; depth: number }> = [{ dir: this.path, depth }];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (frame === undefined) break;
      const { dir } = frame;

      const files = host
        .listFiles(dir.value, pattern, false)
        .map((raw) => dir.child(entryName(raw)))
        .filter((file) => attributesMatch(host.getAttributes(file.value), attributes))
        .sort(byValue);
      result.push(...files);

      if (frame.depth > 1) {
        const subdirectories = host
          .listDirectories(dir.value, "*", false)
          .map((raw) => dir.child(entryName(raw)))
          .sort(byValue);
        for (let i = subdirectories.length - 1; i >= 0; i--) {
          const sub = subdirectories[i];
          if (sub !== undefined) stack.push({ dir: sub, depth: frame.depth - 1 });
        }
      }
    }

    debug.directory("files", { path: this.path, pattern, depth, count: result.length });
    return result;
  }

  /**
   * Directories up to `depth` levels down, breadth-first, sorted within each
   * level. Lazy; iterating again re-reads the file system.
   * @throws PathError(INVALID_ARGUMENT) for a negative depth
   */
  getDirectories(options: EnumerateOptions = {}): DirectoryListing {
    const { pattern = "*", depth = 1, attributes = 0 } = options;
    validateDepth(depth);
    return new DirectoryListing(this.path, pattern, depth, attributes);
  }

  // ==========================================================================
  // Hashing
  // ==========================================================================

  /**
   * MD5 over every file in the tree (optionally filtered), relative to this
   * directory.
   * @throws PathError(DIRECTORY_NOT_FOUND) when the directory is absent
   */
  getDirectoryHash(include?: PathPredicate): string {
    if (!this.exists()) {
      throw new PathError(`Directory '${this.path}' not found`, PathErrorCode.DIRECTORY_NOT_FOUND, this.path.value);
    }
    const files = this.path.host
      .listFiles(this.path.value, "*", true)
      .map((raw) => this.path.derive(raw))
      .filter((file) => include === undefined || include(file));
    return hashFileSet(files, this.path);
  }

  /** MD5 over an explicit file set, relative to `base`. */
  static getFileSetHash(paths: Iterable<AbsolutePath>, base: AbsolutePath): string {
    return hashFileSet(paths, base);
  }

  // ==========================================================================
  // Move / copy
  // ==========================================================================

  /**
   * Move the tree into `target`, merging per the policy. The source is removed
   * once empty, or regardless with `deleteRemainingFiles`.
   */
  move(target: AbsolutePath, options: DirectoryMoveOptions = {}): AbsolutePath {
    const { policy = ExistsPolicy.FAIL, createParents = true, deleteRemainingFiles = false } = options;
    this.prepareTarget(target, policy, createParents);

    const host = this.path.host;
    for (const raw of host.listDirectories(this.path.value, "*", false)) {
      const sub = this.path.child(entryName(raw));
      sub.directory.move(target.child(sub.name), { policy, createParents: true, deleteRemainingFiles });
    }
    for (const raw of host.listFiles(this.path.value, "*", false)) {
      const file = this.path.child(entryName(raw));
      file.file.move(target.child(file.name), { policy, createParents: false });
    }

    if (deleteRemainingFiles || !host.hasEntries(this.path.value)) {
      this.remove();
    }
    debug.directory("move", { source: this.path, target, policy });
    return target;
  }

  /** Copy the tree into `target`, merging per the policy. */
  copy(target: AbsolutePath, options: DirectoryCopyOptions = {}): AbsolutePath {
    const { policy = ExistsPolicy.FAIL, createParents = true, excludeFile, excludeDirectory } = options;
    this.prepareTarget(target, policy, createParents);

    const host = this.path.host;
    for (const raw of host.listDirectories(this.path.value, "*", false)) {
      const sub = this.path.child(entryName(raw));
      if (excludeDirectory?.(sub)) continue;
      sub.directory.copy(target.child(sub.name), { policy, createParents: true, excludeFile, excludeDirectory });
    }
    for (const raw of host.listFiles(this.path.value, "*", false)) {
      const file = this.path.child(entryName(raw));
      if (excludeFile?.(file)) continue;
      file.file.copy(target.child(file.name), { policy, createParents: false });
    }

    debug.directory("copy", { source: this.path, target, policy });
    return target;
  }

  moveTo(directory: AbsolutePath, options?: DirectoryMoveOptions): AbsolutePath {
    return this.move(directory.child(this.path.name), options);
  }

  copyTo(directory: AbsolutePath, options?: DirectoryCopyOptions): AbsolutePath {
    return this.copy(directory.child(this.path.name), options);
  }

  /** Move to a sibling directory. */
  rename(name: NameSource, policy: ExistsPolicyFlags = ExistsPolicy.FAIL): AbsolutePath {
    const parent = this.path.parent;
    if (parent === undefined) {
      throw new PathError(`Root '${this.path}' cannot be renamed`, PathErrorCode.INVALID_TARGET, this.path.value);
    }
    const next = typeof name === "string" ? name : name(this.path.name);
    return this.move(parent.combine(next), { policy });
  }

  // ==========================================================================
  // Ancestor search
  // ==========================================================================

  /** Nearest ancestor matching `predicate`; `undefined` when the directory is absent. */
  findParent(predicate: PathPredicate): AbsolutePath | undefined {
    if (!this.exists()) return undefined;
    return this.path.ancestors(false).find(predicate);
  }

  findParentOrSelf(predicate: PathPredicate): AbsolutePath | undefined {
    if (!this.exists()) return undefined;
    return this.path.ancestors(true).find(predicate);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private prepareTarget(target: AbsolutePath, policy: ExistsPolicyFlags, createParents: boolean): void {
    filePolicyOf(policy);
    const directoryPolicy = directoryPolicyOf(policy);

    if (!this.exists()) {
      throw new PathError(`Directory '${this.path}' not found`, PathErrorCode.DIRECTORY_NOT_FOUND, this.path.value);
    }
    if (this.path.isAncestorOf(target, true)) {
      throw new PathError(
        `Target '${target}' lies inside source '${this.path}'`,
        PathErrorCode.INVALID_TARGET,
        target.value,
      );
    }
    if (target.directory.exists() && directoryPolicy === "fail") {
      throw new PathError(`Directory '${target}' already exists`, PathErrorCode.ALREADY_EXISTS, target.value);
    }
    if (!createParents) {
      const parent = target.parent;
      if (parent !== undefined && !parent.directory.exists()) {
        throw new PathError(
          `Parent of '${target}' not found`,
          PathErrorCode.DIRECTORY_NOT_FOUND,
          parent.value,
        );
      }
    }
    target.directory.create();
  }
}
