import type { FileSystemHost } from "./context.js";
import { createNodeFileSystemHost } from "./node-host.js";

let defaultHost: FileSystemHost | undefined;

/** Host used when a path is parsed without one. Created on first use. */
export function getDefaultHost(): FileSystemHost {
  defaultHost ??= createNodeFileSystemHost();
  return defaultHost;
}

/** Replace the process-wide host; `undefined` restores the Node host. */
export function setDefaultHost(host: FileSystemHost | undefined): void {
  defaultHost = host;
}
