/**
 * File Settings
 *
 * Process-wide defaults read by the text operations at call time. Configure
 * once at startup; the values are not meant to change while operations run.
 */

import { EOL } from "node:os";
import { PathError, PathErrorCode } from "@treekit/paths";

export type LineBreakStyle = "windows" | "unix";

export interface FileSettings {
  /** Text encoding for reads and writes. */
  readonly encoding: BufferEncoding;
  /** Whether text writes end with exactly one line break. */
  readonly eofLineBreak: boolean;
  /** Line-break style for line writes; `undefined` uses the host's. */
  readonly lineBreak: LineBreakStyle | undefined;
}

const DEFAULT_SETTINGS: FileSettings = {
  encoding: "utf8",
  eofLineBreak: true,
  lineBreak: undefined,
};

let settings: FileSettings = DEFAULT_SETTINGS;

export function getFileSettings(): FileSettings {
  return settings;
}

/**
 * Override some of the defaults. Unknown encodings are rejected here rather
 * than on the first write.
 */
export function configureFileSettings(partial: Partial<FileSettings>): FileSettings {
  if (partial.encoding !== undefined && !Buffer.isEncoding(partial.encoding)) {
    throw new PathError(
      `Unknown encoding '${String(partial.encoding)}'`,
      PathErrorCode.INVALID_CONFIGURATION,
    );
  }
  settings = { ...settings, ...partial };
  return settings;
}

export function resetFileSettings(): void {
  settings = DEFAULT_SETTINGS;
}

/**
 * Line terminator for a style, falling back to the configured style, then the
 * host platform's, then `os.EOL`.
 */
export function lineBreakFor(style?: LineBreakStyle, platform?: "win32" | "posix"): string {
  switch (style ?? settings.lineBreak) {
    case "windows":
      return "\r\n";
    case "unix":
      return "\n";
    default:
      if (platform === "win32") return "\r\n";
      if (platform === "posix") return "\n";
      return EOL;
  }
}
