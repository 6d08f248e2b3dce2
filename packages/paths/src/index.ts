// Paths package public API
//
// String-level path syntax shared by every package in the workspace:
// - Syntax: roots, normalization, combination, relative paths
// - Errors: PathError and its code table
// - Debug: TREEKIT_DEBUG trace channels

// === Syntax ===
export {
  WINDOWS_SEPARATOR,
  UNIX_SEPARATOR,
  hostSeparator,
  isWindowsRoot,
  isUnixRoot,
  hasWindowsRoot,
  hasUnixRoot,
  getRoot,
  hasRoot,
  isRootPath,
  getSeparator,
  normalizePath,
  combinePaths,
  relativePath,
  type PathSeparator,
} from "./syntax.js";

// === URIs ===
export { fsPathFromUri, uriFromFsPath } from "./uri.js";

// === Errors ===
export { PathError, PathErrorCode, isPathError, type PathErrorCodeType } from "./errors.js";

// === Debug ===
export {
  debug,
  configureDebug,
  refreshDebugChannels,
  isDebugEnabled,
  getDebugChannel,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";
