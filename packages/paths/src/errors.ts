/* =============================================================================
 * PATH ERRORS
 * ============================================================================= */

/** Error codes */
export const PathErrorCode = {
  /** Input lacks a root, or a rooted segment was combined onto a path. */
  MALFORMED_PATH: "PATH_MALFORMED",
  /** Separator incompatible with the root kind, or paths from different roots. */
  SEPARATOR_CONFLICT: "PATH_SEPARATOR_CONFLICT",
  /** A `..` segment tried to climb above the root. */
  ROOT_BOUNDARY_EXCEEDED: "PATH_ROOT_BOUNDARY_EXCEEDED",
  FILE_NOT_FOUND: "PATH_FILE_NOT_FOUND",
  DIRECTORY_NOT_FOUND: "PATH_DIRECTORY_NOT_FOUND",
  ALREADY_EXISTS: "PATH_ALREADY_EXISTS",
  /** Mutually exclusive policy bits, or a missing one. */
  INVALID_CONFIGURATION: "PATH_INVALID_CONFIGURATION",
  /** A recursive copy/move whose destination lies inside its source. */
  INVALID_TARGET: "PATH_INVALID_TARGET",
  INVALID_ARGUMENT: "PATH_INVALID_ARGUMENT",
} as const;

export type PathErrorCodeType = (typeof PathErrorCode)[keyof typeof PathErrorCode];

/**
 * Error raised by path syntax and file-system operations.
 *
 * Raised at the point of detection and never caught internally; callers
 * decide whether a failure aborts their step.
 */
export class PathError extends Error {
  constructor(
    message: string,
    public readonly code: PathErrorCodeType,
    public readonly path?: string,
  ) {
    super(message);
    this.name = "PathError";
  }

  toJSON(): { code: PathErrorCodeType; message: string; path?: string } {
    return {
      code: this.code,
      message: this.message,
      ...(this.path !== undefined && { path: this.path }),
    };
  }
}

/** Narrow an unknown value to a PathError, optionally of a specific code. */
export function isPathError(value: unknown, code?: PathErrorCodeType): value is PathError {
  if (!(value instanceof PathError)) return false;
  return code === undefined || value.code === code;
}
