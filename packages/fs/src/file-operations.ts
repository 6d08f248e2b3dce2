/**
 * File Operations
 *
 * View over an {@link AbsolutePath} that denotes a file. Holds only the path;
 * every call reads the file-system state afresh through the path's host.
 */

import { PathError, PathErrorCode, debug } from "@treekit/paths";
import type { AbsolutePath } from "./absolute-path.js";
import { FileAttribute } from "./host/context.js";
import { ExistsPolicy, filePolicyOf, resolveFileConflict, type ExistsPolicyFlags } from "./exists-policy.js";
import { getFileSettings, lineBreakFor, type LineBreakStyle } from "./settings.js";
import { hashFile } from "./hashing.js";

export interface TouchOptions {
  /** Last-write time to set. Defaults to now. */
  time?: Date;
  /** Create missing parent directories. Defaults to `true`. */
  createParents?: boolean;
}

export interface WriteTextOptions {
  encoding?: BufferEncoding;
  /** End with exactly one line break. Defaults to the configured setting. */
  eofLineBreak?: boolean;
}

export interface WriteLinesOptions extends WriteTextOptions {
  /** Line terminator style. Defaults to the configured setting, then the host platform's. */
  lineBreak?: LineBreakStyle;
}

export interface TransferOptions {
  /** Conflict policy; only the file bits are consulted. Defaults to `FAIL`. */
  policy?: ExistsPolicyFlags;
  /** Create the target's parent directories. Defaults to `true`. */
  createParents?: boolean;
}

/** A new name, or a function of the current one. */
export type NameSource = string | ((current: string) => string);

export type PathPredicate = (path: AbsolutePath) => boolean;

const TRAILING_LINE_BREAKS = /[\r\n]+$/;
const LINE_SPLIT = /\r\n|\r|\n/;

export class FileOperations {
  constructor(readonly path: AbsolutePath) {}

  // ==========================================================================
  // Name
  // ==========================================================================

  /** Name without its extension. A leading dot does not start an extension. */
  get stem(): string {
    const name = this.path.name;
    const dot = name.lastIndexOf(".");
    return dot > 0 ? name.slice(0, dot) : name;
  }

  /** Extension including the dot, or `""`. */
  get extension(): string {
    const name = this.path.name;
    const dot = name.lastIndexOf(".");
    return dot > 0 ? name.slice(dot) : "";
  }

  /** Case-insensitive match against any of the extensions (dot optional). */
  hasExtension(extension: string, ...alternatives: string[]): boolean {
    const name = this.path.name.toLowerCase();
    return [extension, ...alternatives].some((candidate) => {
      const suffix = candidate.startsWith(".") ? candidate : `.${candidate}`;
      return name.endsWith(suffix.toLowerCase());
    });
  }

  /**
   * Sibling path with the extension replaced; `""` removes it.
   * `undefined` for a root.
   */
  withExtension(extension: string): AbsolutePath | undefined {
    const parent = this.path.parent;
    if (parent === undefined) return undefined;
    const suffix = extension === "" || extension.startsWith(".") ? extension : `.${extension}`;
    return parent.combine(this.stem + suffix);
  }

  // ==========================================================================
  // State
  // ==========================================================================

  exists(): boolean {
    return this.path.host.fileExists(this.path.value);
  }

  /** Create the file if absent and set its last-write time. */
  touch(options: TouchOptions = {}): AbsolutePath {
    const { time = new Date(), createParents = true } = options;
    const host = this.path.host;
    if (createParents) this.ensureParent();
    if (!this.exists()) {
      host.writeBytes(this.path.value, new Uint8Array());
    }
    host.setLastWriteTime(this.path.value, time);
    debug.file("touch", { path: this.path, time });
    return this.path;
  }

  /** Delete the file, clearing read-only first. No-op when absent. */
  remove(): void {
    if (!this.exists()) return;
    const host = this.path.host;
    host.setAttributes(this.path.value, FileAttribute.NORMAL);
    host.deleteFile(this.path.value);
    debug.file("remove", { path: this.path });
  }

  getLastWriteTime(): Date {
    this.assertExists();
    return this.path.host.getLastWriteTime(this.path.value);
  }

  // ==========================================================================
  // Reading
  // ==========================================================================

  readAllText(encoding?: BufferEncoding): string {
    this.assertExists();
    return this.path.host.readText(this.path.value, encoding ?? getFileSettings().encoding);
  }

  /** Lines without terminators; a final line break does not add an empty line. */
  readAllLines(encoding?: BufferEncoding): string[] {
    const text = this.readAllText(encoding);
    if (text === "") return [];
    const lines = text.split(LINE_SPLIT);
    if (lines[lines.length - 1] === "") lines.pop();
    return lines;
  }

  readAllBytes(): Uint8Array {
    this.assertExists();
    return this.path.host.readBytes(this.path.value);
  }

  // ==========================================================================
  // Writing
  // ==========================================================================

  /**
   * Write text, replacing any content. With `eofLineBreak`, trailing line
   * breaks collapse to one, CRLF if the content uses CRLF and LF otherwise.
   */
  writeAllText(content: string, options: WriteTextOptions = {}): AbsolutePath {
    const settings = getFileSettings();
    const encoding = options.encoding ?? settings.encoding;
    const eofLineBreak = options.eofLineBreak ?? settings.eofLineBreak;

    let text = content;
    if (eofLineBreak) {
      const terminator = content.includes("\r\n") ? "\r\n" : "\n";
      text = content.replace(TRAILING_LINE_BREAKS, "") + terminator;
    }

    this.ensureParent();
    this.path.host.writeText(this.path.value, text, encoding);
    debug.file("write.text", { path: this.path, length: text.length });
    return this.path;
  }

  /** Write lines joined by the chosen terminator, ending with one when `eofLineBreak`. */
  writeAllLines(lines: Iterable<string>, options: WriteLinesOptions = {}): AbsolutePath {
    const eofLineBreak = options.eofLineBreak ?? getFileSettings().eofLineBreak;
    const all = [...lines];
    if (eofLineBreak) all.push("");
    return this.writeAllText(all.join(lineBreakFor(options.lineBreak, this.path.host.platform)), {
      encoding: options.encoding,
      eofLineBreak: false,
    });
  }

  appendAllText(content: string, encoding?: BufferEncoding): AbsolutePath {
    this.ensureParent();
    this.path.host.appendText(this.path.value, content, encoding ?? getFileSettings().encoding);
    return this.path;
  }

  /** Append each line followed by a terminator. */
  appendAllLines(lines: Iterable<string>, options: { encoding?: BufferEncoding; lineBreak?: LineBreakStyle } = {}): AbsolutePath {
    const terminator = lineBreakFor(options.lineBreak, this.path.host.platform);
    let text = "";
    for (const line of lines) {
      text += line + terminator;
    }
    return this.appendAllText(text, options.encoding);
  }

  writeAllBytes(bytes: Uint8Array): AbsolutePath {
    this.ensureParent();
    this.path.host.writeBytes(this.path.value, bytes);
    debug.file("write.bytes", { path: this.path, length: bytes.length });
    return this.path;
  }

  /**
   * Read, transform, write back with {@link writeAllText}'s end-of-file
   * handling. Not atomic.
   */
  updateText(transform: (text: string) => string, encoding?: BufferEncoding): AbsolutePath {
    const next = transform(this.readAllText(encoding));
    return this.writeAllText(next, { encoding });
  }

  /** MD5 of the content, lower-case hex. */
  getHash(): string {
    return hashFile(this.path);
  }

  // ==========================================================================
  // Move / copy
  // ==========================================================================

  /**
   * Move the file to `target`.
   * @returns where the content now is: the target, or the source when skipped
   */
  move(target: AbsolutePath, options: TransferOptions = {}): AbsolutePath {
    return this.transfer(target, options, "move");
  }

  copy(target: AbsolutePath, options: TransferOptions = {}): AbsolutePath {
    return this.transfer(target, options, "copy");
  }

  /** Move into `directory`, keeping the name. */
  moveTo(directory: AbsolutePath, options?: TransferOptions): AbsolutePath {
    return this.move(directory.child(this.path.name), options);
  }

  copyTo(directory: AbsolutePath, options?: TransferOptions): AbsolutePath {
    return this.copy(directory.child(this.path.name), options);
  }

  /** Move within the same directory. */
  rename(name: NameSource, policy: ExistsPolicyFlags = ExistsPolicy.FAIL): AbsolutePath {
    const parent = this.requireParent();
    const next = typeof name === "string" ? name : name(this.path.name);
    return this.move(parent.combine(next), { policy });
  }

  /** Rename the stem; the current extension is re-appended. */
  renameWithoutExtension(stem: NameSource, policy: ExistsPolicyFlags = ExistsPolicy.FAIL): AbsolutePath {
    const parent = this.requireParent();
    const next = typeof stem === "string" ? stem : stem(this.stem);
    return this.move(parent.combine(next + this.extension), { policy });
  }

  // ==========================================================================
  // Ancestor search
  // ==========================================================================

  /** Nearest ancestor matching `predicate`; `undefined` when the file is absent. */
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

  private transfer(target: AbsolutePath, options: TransferOptions, mode: "move" | "copy"): AbsolutePath {
    const { policy = ExistsPolicy.FAIL, createParents = true } = options;
    const host = this.path.host;
    filePolicyOf(policy);
    this.assertExists();

    if (target.equals(this.path)) return target;

    if (target.file.exists()) {
      const action = resolveFileConflict(policy, () => ({
        source: host.getLastWriteTime(this.path.value),
        target: host.getLastWriteTime(target.value),
      }));
      switch (action) {
        case "fail":
          throw new PathError(`File '${target}' already exists`, PathErrorCode.ALREADY_EXISTS, target.value);
        case "skip":
          debug.file(`${mode}.skip`, { source: this.path, target });
          return this.path;
        case "keep-target":
          debug.file(`${mode}.keep-target`, { source: this.path, target });
          return target;
        case "overwrite":
          break;
      }
    }

    if (createParents) {
      const parent = target.parent;
      if (parent !== undefined) parent.directory.create();
    }

    if (mode === "move") {
      target.file.remove();
      host.moveFile(this.path.value, target.value);
    } else {
      if (target.file.exists()) host.setAttributes(target.value, FileAttribute.NORMAL);
      host.copyFile(this.path.value, target.value, true);
    }
    debug.file(mode, { source: this.path, target, policy });
    return target;
  }

  private ensureParent(): void {
    this.path.parent?.directory.create();
  }

  private requireParent(): AbsolutePath {
    const parent = this.path.parent;
    if (parent === undefined) {
      throw new PathError(`Root '${this.path}' cannot be renamed`, PathErrorCode.INVALID_TARGET, this.path.value);
    }
    return parent;
  }

  private assertExists(): void {
    if (!this.exists()) {
      throw new PathError(`File '${this.path}' not found`, PathErrorCode.FILE_NOT_FOUND, this.path.value);
    }
  }
}
