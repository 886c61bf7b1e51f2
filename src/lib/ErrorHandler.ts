/**
 * Error handler for treecopy
 * Provides structured error responses with specific error codes
 */

import {
  CopyError,
  DestinationError,
  DestinationOpenError,
  FileSystemError,
  MCPErrorResponse,
  ReadError,
  SecurityError,
  SourceOpenError,
  TransferError,
  ValidationError,
  systemErrorCode,
} from "../types";

/**
 * Error codes for different error types
 */
export enum ErrorCode {
  // Security errors
  SECURITY_ERROR = "SECURITY_ERROR",
  WORKSPACE_BOUNDARY_VIOLATION = "WORKSPACE_BOUNDARY_VIOLATION",
  PATH_TRAVERSAL = "PATH_TRAVERSAL",
  BLOCKED_PATH = "BLOCKED_PATH",
  READ_ONLY_MODE = "READ_ONLY_MODE",

  // Validation errors
  VALIDATION_ERROR = "VALIDATION_ERROR",

  // Copy errors
  READ_ERROR = "READ_ERROR",
  DESTINATION_ERROR = "DESTINATION_ERROR",
  SOURCE_OPEN_ERROR = "SOURCE_OPEN_ERROR",
  DESTINATION_OPEN_ERROR = "DESTINATION_OPEN_ERROR",
  TRANSFER_ERROR = "TRANSFER_ERROR",

  // Filesystem errors
  FILESYSTEM_ERROR = "FILESYSTEM_ERROR",
  FILE_NOT_FOUND = "FILE_NOT_FOUND",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  DISK_FULL = "DISK_FULL",

  // Generic errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Error handler class
 * Converts errors to structured MCP error responses
 */
export class ErrorHandler {
  /**
   * Convert an error to an MCP error response with structured error codes
   */
  static toMCPError(error: unknown): MCPErrorResponse {
    if (error instanceof CopyError) {
      return this.handleCopyError(error);
    }

    if (error instanceof SecurityError) {
      return this.handleSecurityError(error);
    }

    if (error instanceof ValidationError) {
      return {
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: error.message,
          details: {
            type: "validation_error",
            remediation: "Check the input parameters and try again",
          },
        },
      };
    }

    if (error instanceof FileSystemError || this.isNodeError(error)) {
      return this.handleSystemError(error);
    }

    const message =
      error instanceof Error ? error.message : String(error);
    return {
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: message || "An unexpected error occurred",
        details: {
          name: error instanceof Error ? error.name : typeof error,
          stack:
            process.env["NODE_ENV"] === "development" && error instanceof Error
              ? error.stack
              : undefined,
        },
      },
    };
  }

  /**
   * Error code for a copy failure
   */
  static codeForCopyError(error: CopyError): ErrorCode {
    if (error instanceof ReadError) {
      return ErrorCode.READ_ERROR;
    }
    if (error instanceof DestinationError) {
      return ErrorCode.DESTINATION_ERROR;
    }
    if (error instanceof SourceOpenError) {
      return ErrorCode.SOURCE_OPEN_ERROR;
    }
    if (error instanceof DestinationOpenError) {
      return ErrorCode.DESTINATION_OPEN_ERROR;
    }
    if (error instanceof TransferError) {
      return ErrorCode.TRANSFER_ERROR;
    }
    return ErrorCode.FILESYSTEM_ERROR;
  }

  private static handleCopyError(error: CopyError): MCPErrorResponse {
    const code = this.codeForCopyError(error);

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "copy_error",
          path: error.path,
          errno: error.errno,
          remediation: this.getCopyRemediation(code, error.errno),
        },
      },
    };
  }

  /**
   * Handle security errors with specific error codes
   */
  private static handleSecurityError(error: SecurityError): MCPErrorResponse {
    const message = error.message.toLowerCase();

    let code = ErrorCode.SECURITY_ERROR;
    if (message.includes("workspace") && message.includes("outside")) {
      code = ErrorCode.WORKSPACE_BOUNDARY_VIOLATION;
    } else if (message.includes("traversal")) {
      code = ErrorCode.PATH_TRAVERSAL;
    } else if (message.includes("blocked")) {
      code = ErrorCode.BLOCKED_PATH;
    } else if (message.includes("read-only")) {
      code = ErrorCode.READ_ONLY_MODE;
    }

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "security_violation",
          remediation: this.getSecurityRemediation(code),
        },
      },
    };
  }

  /**
   * Handle Node.js system errors (ENOENT, EACCES, etc.)
   */
  private static handleSystemError(error: Error): MCPErrorResponse {
    const errno = systemErrorCode(error);

    let code = ErrorCode.FILESYSTEM_ERROR;
    switch (errno) {
      case "ENOENT":
        code = ErrorCode.FILE_NOT_FOUND;
        break;
      case "EACCES":
      case "EPERM":
        code = ErrorCode.PERMISSION_DENIED;
        break;
      case "ENOSPC":
        code = ErrorCode.DISK_FULL;
        break;
    }

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "filesystem_error",
          errno,
          remediation: this.getErrnoRemediation(errno),
        },
      },
    };
  }

  /**
   * Check if error is a Node.js system error
   */
  private static isNodeError(error: unknown): error is NodeJS.ErrnoException {
    const code = systemErrorCode(error);
    return code !== undefined && code.startsWith("E");
  }

  private static getCopyRemediation(
    code: ErrorCode,
    errno: string | undefined
  ): string {
    const hint = this.getErrnoRemediation(errno);
    switch (code) {
      case ErrorCode.READ_ERROR:
        return `Verify the source directory exists and is readable. ${hint}`;
      case ErrorCode.DESTINATION_ERROR:
        return `Verify the destination's parent is writable and not a file. ${hint}`;
      case ErrorCode.SOURCE_OPEN_ERROR:
        return `The source file could not be opened. ${hint}`;
      case ErrorCode.DESTINATION_OPEN_ERROR:
        return `The destination file could not be created. ${hint}`;
      case ErrorCode.TRANSFER_ERROR:
        return `The copy stopped mid-file; the destination file may be truncated. ${hint}`;
      default:
        return hint;
    }
  }

  /**
   * Get remediation advice for security errors
   */
  private static getSecurityRemediation(code: ErrorCode): string {
    switch (code) {
      case ErrorCode.WORKSPACE_BOUNDARY_VIOLATION:
        return "Ensure all paths are within the configured workspace root";
      case ErrorCode.PATH_TRAVERSAL:
        return "Remove path traversal sequences (..) from the path";
      case ErrorCode.BLOCKED_PATH:
        return "This path is blocked by the security policy";
      case ErrorCode.READ_ONLY_MODE:
        return "The workspace is in read-only mode. Write operations are not allowed";
      default:
        return "Review the security policy and ensure compliance";
    }
  }

  private static getErrnoRemediation(errno: string | undefined): string {
    switch (errno) {
      case "ENOENT":
        return "The specified file or directory does not exist";
      case "EACCES":
      case "EPERM":
        return "Insufficient permissions to access the file or directory";
      case "ENOSPC":
        return "No space left on device";
      case "EISDIR":
        return "A directory exists where a file was expected";
      case "ENOTDIR":
        return "A file exists where a directory was expected";
      case "EEXIST":
        return "A file already exists at that path";
      default:
        return "Check the filesystem and try again";
    }
  }
}
