/**
 * Common types for treecopy
 *
 * This module defines the error taxonomy and the response structures shared by
 * the copy core, the CLI and the MCP tools.
 */

/**
 * Security error - thrown when a path violates the workspace policy
 *
 * Common causes:
 * - Path outside the workspace root
 * - Path containing `..` segments
 * - Blocked path or blocked pattern
 * - Write while the workspace is read-only
 *
 * @example
 * ```typescript
 * throw new SecurityError("Path traversal detected - path outside workspace");
 * ```
 */
export class SecurityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SecurityError";
  }
}

/**
 * Validation error - thrown when tool arguments, CLI flags or the
 * configuration file are malformed
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Filesystem error - base class for every failure reported by the filesystem
 */
export class FileSystemError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FileSystemError";
  }
}

/**
 * Base class of the failures a copy reports instead of throwing.
 *
 * `path` is the file or directory the failing call was made on and `cause`
 * holds the underlying system error.
 */
export abstract class CopyError extends FileSystemError {
  readonly path: string;

  protected constructor(message: string, filePath: string, cause: unknown) {
    super(`${message}: ${filePath} (${describeCause(cause)})`, { cause });
    this.path = filePath;
  }

  /**
   * errno code of the underlying system error (ENOENT, EACCES, ...), if any
   */
  get errno(): string | undefined {
    return systemErrorCode(this.cause);
  }
}

/** A directory could not be listed */
export class ReadError extends CopyError {
  constructor(directory: string, cause: unknown) {
    super("Cannot read directory", directory, cause);
    this.name = "ReadError";
  }
}

/** A destination directory could not be created */
export class DestinationError extends CopyError {
  constructor(directory: string, cause: unknown) {
    super("Cannot create destination directory", directory, cause);
    this.name = "DestinationError";
  }
}

/** A source file could not be opened for reading */
export class SourceOpenError extends CopyError {
  constructor(file: string, cause: unknown) {
    super("Cannot open source file", file, cause);
    this.name = "SourceOpenError";
  }
}

/** A destination file could not be created or truncated */
export class DestinationOpenError extends CopyError {
  constructor(file: string, cause: unknown) {
    super("Cannot open destination file", file, cause);
    this.name = "DestinationOpenError";
  }
}

/** Bytes could not be transferred between two open files */
export class TransferError extends CopyError {
  constructor(file: string, cause: unknown) {
    super("Transfer failed", file, cause);
    this.name = "TransferError";
  }
}

/**
 * Thrown when a progress channel is used after it was closed.
 * Indicates a programming error in the owner of the channel.
 */
export class ChannelClosedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChannelClosedError";
  }
}

/**
 * Extract the errno code from an unknown thrown value
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    const code = error.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * MCP error response structure
 *
 * @example
 * ```json
 * {
 *   "error": {
 *     "code": "SOURCE_OPEN_ERROR",
 *     "message": "Cannot open source file: /work/a.txt (ENOENT: no such file or directory)",
 *     "details": { "path": "/work/a.txt", "errno": "ENOENT" }
 *   }
 * }
 * ```
 */
export interface MCPErrorResponse {
  error: {
    /** Error code (e.g., "READ_ERROR", "VALIDATION_ERROR") */
    code: string;
    /** Human-readable error message */
    message: string;
    /** Optional additional error details */
    details?: Record<string, unknown>;
  };
}
