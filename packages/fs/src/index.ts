// File-system package public API
//
// - AbsolutePath: normalized rooted path value
// - FileOperations / DirectoryOperations: I/O views over a path
// - ExistsPolicy: conflict policy for move and copy
// - Hosts: Node.js and in-memory file-system access

// === Paths ===
export { AbsolutePath } from "./absolute-path.js";

// === Operations ===
export {
  FileOperations,
  type TouchOptions,
  type WriteTextOptions,
  type WriteLinesOptions,
  type TransferOptions,
  type NameSource,
  type PathPredicate,
} from "./file-operations.js";
export {
  DirectoryOperations,
  DirectoryListing,
  type EnumerateOptions,
  type DirectoryMoveOptions,
  type DirectoryCopyOptions,
} from "./directory-operations.js";

// === Policy ===
export {
  ExistsPolicy,
  filePolicyOf,
  directoryPolicyOf,
  resolveFileConflict,
  describePolicy,
  type ExistsPolicyFlags,
  type FilePolicy,
  type DirectoryPolicy,
  type FileConflictAction,
  type ConflictTimes,
} from "./exists-policy.js";

// === Hashing ===
export { hashFile, hashFileSet } from "./hashing.js";

// === Settings ===
export {
  getFileSettings,
  configureFileSettings,
  resetFileSettings,
  lineBreakFor,
  type FileSettings,
  type LineBreakStyle,
} from "./settings.js";

// === Hosts ===
export {
  FileAttribute,
  attributesMatch,
  matchesWildcard,
  type FileSystemHost,
} from "./host/context.js";
export { createNodeFileSystemHost, type NodeFileSystemHostOptions } from "./host/node-host.js";
export {
  createMemoryFileSystemHost,
  type MemoryFileSystemHost,
  type MemoryFileSystemHostOptions,
} from "./host/memory-host.js";
export { getDefaultHost, setDefaultHost } from "./host/default.js";
