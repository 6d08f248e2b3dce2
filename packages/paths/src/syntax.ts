/**
 * Path Syntax
 *
 * Pure string-level functions over path text. Two root kinds are recognized
 * regardless of the host platform:
 *
 * ```
 * C:\work\repo   Windows drive root ("C:"), separator "\"
 * /work/repo     Unix root ("/"), separator "/"
 * ```
 *
 * Unrooted (relative) paths use the host separator unless told otherwise.
 * Nothing here touches the file system.
 */

import { sep as nodeSeparator } from "node:path";
import { PathError, PathErrorCode } from "./errors.js";
import { debug } from "./debug.js";

export const WINDOWS_SEPARATOR = "\\";
export const UNIX_SEPARATOR = "/";

export type PathSeparator = typeof WINDOWS_SEPARATOR | typeof UNIX_SEPARATOR;

const SEGMENT_SPLIT = /[\\/]/;
const TRAILING_SEPARATORS = /[\\/]+$/;
const DRIVE_LETTER = /^[A-Za-z]$/;

const CURRENT_DIRECTORY = ".";
const PARENT_DIRECTORY = "..";

/** The separator of the platform this process runs on. */
export function hostSeparator(): PathSeparator {
  return nodeSeparator === WINDOWS_SEPARATOR ? WINDOWS_SEPARATOR : UNIX_SEPARATOR;
}

// ============================================================================
// Roots
// ============================================================================

/** `true` for exactly a drive letter and a colon, e.g. `C:`. */
export function isWindowsRoot(value: string | null | undefined): boolean {
  return value?.length === 2 && DRIVE_LETTER.test(value[0] ?? "") && value[1] === ":";
}

/** `true` for exactly `/`. */
export function isUnixRoot(value: string | null | undefined): boolean {
  return value === UNIX_SEPARATOR;
}

export function hasWindowsRoot(path: string | null | undefined): boolean {
  return isWindowsRoot(path?.slice(0, 2));
}

export function hasUnixRoot(path: string | null | undefined): boolean {
  return isUnixRoot(path?.slice(0, 1));
}

/**
 * Root prefix of a path: `/` for Unix-rooted paths, `X:` for drive-rooted
 * ones, `undefined` for relative or empty input.
 */
export function getRoot(path: string | null | undefined): string | undefined {
  if (!path) return undefined;
  if (hasUnixRoot(path)) return path.slice(0, 1);
  if (hasWindowsRoot(path)) return path.slice(0, 2);
  return undefined;
}

export function hasRoot(path: string | null | undefined): boolean {
  return getRoot(path) !== undefined;
}

/**
 * `true` when the path denotes a root itself (`/`, `C:`, `C:\`), i.e. it has
 * no parent.
 */
export function isRootPath(path: string): boolean {
  return isUnixRoot(path) || isWindowsRoot(path.replace(/\\+$/, ""));
}

/** Separator implied by the root kind, or the host separator when unrooted. */
export function getSeparator(path: string | null | undefined): PathSeparator {
  const root = getRoot(path);
  if (root === undefined) return hostSeparator();
  return isWindowsRoot(root) ? WINDOWS_SEPARATOR : UNIX_SEPARATOR;
}

function assertSeparatorChoice(path: string | null | undefined, separator: PathSeparator | undefined): void {
  if (separator === undefined) return;
  const root = getRoot(path);
  if (root === undefined) return;

  if (isWindowsRoot(root) && separator !== WINDOWS_SEPARATOR) {
    throw new PathError(
      `For drive-rooted paths the separator must be '${WINDOWS_SEPARATOR}'`,
      PathErrorCode.SEPARATOR_CONFLICT,
      path ?? undefined,
    );
  }
  if (isUnixRoot(root) && separator !== UNIX_SEPARATOR) {
    throw new PathError(
      `For Unix-rooted paths the separator must be '${UNIX_SEPARATOR}'`,
      PathErrorCode.SEPARATOR_CONFLICT,
      path ?? undefined,
    );
  }
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Canonicalize a path: one separator throughout, no `.` segments, every
 * resolvable `..` cancelled against its predecessor.
 *
 * A `..` that would climb above an established root raises
 * ROOT_BOUNDARY_EXCEEDED. Leading `..` segments of an unrooted path cannot be
 * resolved and are kept (`../../a` stays `../../a`).
 *
 * @param separator - Forces the output separator; must agree with the root kind
 */
export function normalizePath(path: string | null | undefined, separator?: PathSeparator): string {
  assertSeparatorChoice(path, separator);

  const source = path ?? "";
  const effective = separator ?? getSeparator(source);
  const root = getRoot(source);
  const tail = root === undefined ? source : source.slice(root.length);
  const parts = tail.split(SEGMENT_SPLIT).filter((part) => part.length > 0);

  let i = 0;
  while (i < parts.length) {
    const part = parts[i];
    if (part === PARENT_DIRECTORY) {
      if (parts.slice(0, i).every((p) => p === PARENT_DIRECTORY)) {
        // Nothing left to cancel against.
        if (i === 0 && root !== undefined) {
          debug.syntax("normalize.beyond-root", { path: source });
          throw new PathError(
            `Cannot normalize '${source}' beyond path root`,
            PathErrorCode.ROOT_BOUNDARY_EXCEEDED,
            source,
          );
        }
        i++;
        continue;
      }
      parts.splice(i - 1, 2);
      i--;
      continue;
    }
    if (part === CURRENT_DIRECTORY) {
      parts.splice(i, 1);
      continue;
    }
    i++;
  }

  const joined = parts.join(effective);
  if (root === undefined) return joined;
  return isWindowsRoot(root) ? `${root}${WINDOWS_SEPARATOR}${joined}` : `${root}${joined}`;
}

// ============================================================================
// Combination
// ============================================================================

function trimTrailingSeparators(path: string | null | undefined): string {
  if (!path) return "";
  return isUnixRoot(path) ? path : path.replace(TRAILING_SEPARATORS, "");
}

/**
 * Join two path fragments. The right-hand side must not be rooted.
 *
 * ```
 * combinePaths("C:", "foo")          // C:\foo
 * combinePaths("C:\\foo\\", "bar")   // C:\foo\bar
 * combinePaths("/", "usr")           // /usr
 * combinePaths("C:", "")             // C:\
 * ```
 *
 * The result is not normalized.
 */
export function combinePaths(
  left: string | null | undefined,
  right: string | null | undefined,
  separator?: PathSeparator,
): string {
  const head = trimTrailingSeparators(left);
  const tail = trimTrailingSeparators(right);

  if (hasRoot(tail)) {
    throw new PathError(
      `Second path '${tail}' must not be rooted`,
      PathErrorCode.MALFORMED_PATH,
      tail,
    );
  }

  if (head.trim() === "") return tail;
  if (tail.trim() === "") {
    return isWindowsRoot(head) ? `${head}${WINDOWS_SEPARATOR}` : head;
  }

  assertSeparatorChoice(head, separator);
  const effective = separator ?? getSeparator(head);

  if (isWindowsRoot(head)) return `${head}${WINDOWS_SEPARATOR}${tail}`;
  if (isUnixRoot(head)) return `${head}${tail}`;
  return `${head}${effective}${tail}`;
}

// ============================================================================
// Relative paths
// ============================================================================

function rootsMatch(a: string | undefined, b: string | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (isWindowsRoot(a) && isWindowsRoot(b)) return a.toLowerCase() === b.toLowerCase();
  return a === b;
}

/**
 * Relative path leading from `basePath` to `destinationPath`.
 *
 * Both inputs are normalized first and must share separator and root.
 * Segments compare case-insensitively for drive-rooted paths and exactly
 * otherwise. Identical paths yield the empty string.
 *
 * ```
 * relativePath("/a/b/c", "/a/d")   // ../../d
 * relativePath("/a", "/a/b/c")     // b/c
 * ```
 */
export function relativePath(basePath: string, destinationPath: string): string {
  const base = normalizePath(basePath);
  const destination = normalizePath(destinationPath);

  const separator = getSeparator(base);
  if (separator !== getSeparator(destination)) {
    throw new PathError(
      `Separators of '${base}' and '${destination}' do not match`,
      PathErrorCode.SEPARATOR_CONFLICT,
      destination,
    );
  }

  const baseRoot = getRoot(base);
  if (!rootsMatch(baseRoot, getRoot(destination))) {
    throw new PathError(
      `Roots of '${base}' and '${destination}' do not match`,
      PathErrorCode.SEPARATOR_CONFLICT,
      destination,
    );
  }

  const ignoreCase = baseRoot !== undefined && isWindowsRoot(baseRoot);
  const same = (a: string, b: string): boolean => (ignoreCase ? a.toLowerCase() === b.toLowerCase() : a === b);

  const baseParts = base.split(separator).filter((part) => part.length > 0);
  const destinationParts = destination.split(separator).filter((part) => part.length > 0);

  let shared = 0;
  while (
    shared < baseParts.length &&
    shared < destinationParts.length &&
    same(baseParts[shared] ?? "", destinationParts[shared] ?? "")
  ) {
    shared++;
  }

  const upwards = new Array<string>(baseParts.length - shared).fill(PARENT_DIRECTORY);
  return [...upwards, ...destinationParts.slice(shared)].join(separator);
}
