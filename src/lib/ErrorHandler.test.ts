/**
 * Unit tests for ErrorHandler
 */

import { ErrorCode, ErrorHandler } from "./ErrorHandler";
import {
  DestinationError,
  DestinationOpenError,
  FileSystemError,
  ReadError,
  SecurityError,
  SourceOpenError,
  TransferError,
  ValidationError,
} from "../types";

function errnoError(code: string, message: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

describe("ErrorHandler", () => {
  describe("copy errors", () => {
    it("should map a ReadError with its path, errno and remediation", () => {
      const error = new ReadError(
        "/work/src",
        errnoError("ENOENT", "ENOENT: no such file or directory")
      );

      expect(ErrorHandler.toMCPError(error)).toEqual({
        error: {
          code: "READ_ERROR",
          message:
            "Cannot read directory: /work/src (ENOENT: no such file or directory)",
          details: {
            type: "copy_error",
            path: "/work/src",
            errno: "ENOENT",
            remediation:
              "Verify the source directory exists and is readable. The specified file or directory does not exist",
          },
        },
      });
    });

    it.each([
      [new DestinationError("/d", errnoError("ENOTDIR", "x")), ErrorCode.DESTINATION_ERROR],
      [new SourceOpenError("/s", errnoError("EACCES", "x")), ErrorCode.SOURCE_OPEN_ERROR],
      [new DestinationOpenError("/d/f", errnoError("EISDIR", "x")), ErrorCode.DESTINATION_OPEN_ERROR],
      [new TransferError("/s/f", errnoError("EIO", "x")), ErrorCode.TRANSFER_ERROR],
    ])("should give %s the code %s", (error, code) => {
      expect(ErrorHandler.codeForCopyError(error)).toBe(code);
      expect(ErrorHandler.toMCPError(error).error.code).toBe(code);
    });

    it("should add the errno hint to the remediation", () => {
      const response = ErrorHandler.toMCPError(
        new DestinationOpenError("/d/f", errnoError("EISDIR", "is a directory"))
      );
      expect(response.error.details?.["remediation"]).toBe(
        "The destination file could not be created. A directory exists where a file was expected"
      );
    });

    it("should fall back to a generic hint without an errno", () => {
      const response = ErrorHandler.toMCPError(
        new TransferError("/s/f", new Error("device unplugged"))
      );
      expect(response.error.details?.["errno"]).toBeUndefined();
      expect(response.error.details?.["remediation"]).toBe(
        "The copy stopped mid-file; the destination file may be truncated. Check the filesystem and try again"
      );
    });
  });

  describe("security errors", () => {
    it.each([
      [
        "Path traversal detected - path outside workspace",
        ErrorCode.WORKSPACE_BOUNDARY_VIOLATION,
      ],
      [
        "Path traversal detected - symlink resolves outside workspace",
        ErrorCode.WORKSPACE_BOUNDARY_VIOLATION,
      ],
      ["Path contains traversal sequences", ErrorCode.PATH_TRAVERSAL],
      ["Path is blocked by security policy", ErrorCode.BLOCKED_PATH],
      ["Path matches blocked pattern", ErrorCode.BLOCKED_PATH],
      ["Workspace is in read-only mode", ErrorCode.READ_ONLY_MODE],
      ["Path must not be empty", ErrorCode.SECURITY_ERROR],
    ])("should map %p to %s", (message, code) => {
      const response = ErrorHandler.toMCPError(new SecurityError(message));
      expect(response.error.code).toBe(code);
      expect(response.error.message).toBe(message);
      expect(response.error.details?.["type"]).toBe("security_violation");
    });

    it("should explain boundary violations", () => {
      const response = ErrorHandler.toMCPError(
        new SecurityError("Path traversal detected - path outside workspace")
      );
      expect(response.error.details?.["remediation"]).toBe(
        "Ensure all paths are within the configured workspace root"
      );
    });
  });

  it("should map validation errors", () => {
    expect(ErrorHandler.toMCPError(new ValidationError("bad input"))).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "bad input",
        details: {
          type: "validation_error",
          remediation: "Check the input parameters and try again",
        },
      },
    });
  });

  describe("system errors", () => {
    it.each([
      ["ENOENT", ErrorCode.FILE_NOT_FOUND],
      ["EACCES", ErrorCode.PERMISSION_DENIED],
      ["EPERM", ErrorCode.PERMISSION_DENIED],
      ["ENOSPC", ErrorCode.DISK_FULL],
      ["EMFILE", ErrorCode.FILESYSTEM_ERROR],
    ])("should map %s to %s", (errno, code) => {
      const response = ErrorHandler.toMCPError(errnoError(errno, "failed"));
      expect(response.error.code).toBe(code);
      expect(response.error.details?.["errno"]).toBe(errno);
    });

    it("should map a FileSystemError without an errno", () => {
      const response = ErrorHandler.toMCPError(new FileSystemError("broken"));
      expect(response.error).toEqual({
        code: "FILESYSTEM_ERROR",
        message: "broken",
        details: {
          type: "filesystem_error",
          errno: undefined,
          remediation: "Check the filesystem and try again",
        },
      });
    });
  });

  describe("unexpected errors", () => {
    it("should map plain errors to INTERNAL_ERROR", () => {
      const response = ErrorHandler.toMCPError(new TypeError("oops"));
      expect(response.error.code).toBe("INTERNAL_ERROR");
      expect(response.error.message).toBe("oops");
      expect(response.error.details?.["name"]).toBe("TypeError");
    });

    it("should describe thrown non-errors", () => {
      const response = ErrorHandler.toMCPError("plain string");
      expect(response.error.message).toBe("plain string");
      expect(response.error.details?.["name"]).toBe("string");
    });

    it("should use a default message for an empty error", () => {
      const response = ErrorHandler.toMCPError(new Error(""));
      expect(response.error.message).toBe("An unexpected error occurred");
    });
  });
});
