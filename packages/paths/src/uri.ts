import { URI } from "vscode-uri";
import { hasWindowsRoot, normalizePath } from "./syntax.js";

/** File-system path of a `file:` URI, normalized. */
export function fsPathFromUri(uri: string): string {
  const parsed = URI.parse(uri);
  return normalizePath(parsed.fsPath);
}

/** `file:` URI of a rooted path. Drive-rooted paths are sent with forward slashes. */
export function uriFromFsPath(path: string): string {
  const portable = hasWindowsRoot(path) ? path.replace(/\\/g, "/") : path;
  return URI.file(portable).toString();
}
