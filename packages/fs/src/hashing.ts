/**
 * Content Hashing
 *
 * MD5 fingerprints for change detection. Not a security primitive.
 *
 * A file set is hashed as the concatenation, in ordinal order of the
 * forward-slash relative path, of (UTF-8 relative path, file bytes). The
 * digest therefore depends only on relative structure and content.
 */

import { createHash } from "node:crypto";
import { PathError, PathErrorCode, UNIX_SEPARATOR, debug, relativePath } from "@treekit/paths";
import type { AbsolutePath } from "./absolute-path.js";

const ALGORITHM = "md5";

/** Hash a single file's bytes. */
export function hashFile(path: AbsolutePath): string {
  if (!path.file.exists()) {
    throw new PathError(`File '${path}' not found`, PathErrorCode.FILE_NOT_FOUND, path.value);
  }
  const hash = createHash(ALGORITHM);
  hash.update(path.host.readBytes(path.value));
  const digest = hash.digest("hex");
  debug.hash("file", { path, digest });
  return digest;
}

/**
 * Hash a set of files relative to `base`. Input order and duplicates do not
 * affect the result.
 * @throws PathError(FILE_NOT_FOUND) when any file is absent
 */
export function hashFileSet(paths: Iterable<AbsolutePath>, base: AbsolutePath): string {
  const unique = new Map<string, AbsolutePath>();
  for (const path of paths) {
    if (!path.file.exists()) {
      throw new PathError(`File '${path}' not found`, PathErrorCode.FILE_NOT_FOUND, path.value);
    }
    unique.set(path.key, path);
  }

  const entries = [...unique.values()].map((path) => ({
    path,
    relative: relativePath(base.value, path.value).split(base.separator).join(UNIX_SEPARATOR),
  }));
  entries.sort((a, b) => (a.relative < b.relative ? -1 : a.relative > b.relative ? 1 : 0));

  const hash = createHash(ALGORITHM);
  for (const entry of entries) {
    hash.update(Buffer.from(entry.relative, "utf8"));
    hash.update(entry.path.host.readBytes(entry.path.value));
  }
  const digest = hash.digest("hex");
  debug.hash("file-set", { base, files: entries.length, digest });
  return digest;
}
