/**
 * Error handler for the File Hash Verifier
 * Provides structured error responses with specific error codes
 */

import { ZodError } from "zod";
import {
  ValidationError,
  FileSystemError,
  UnsupportedAlgorithmError,
  LocationNotFoundError,
  LocationUnreadableError,
  InvalidManifestError,
  DuplicateManifestKeyError,
  MCPErrorResponse,
} from "../types";

/**
 * Error codes for different error types
 */
export enum ErrorCode {
  // Precondition errors
  UNSUPPORTED_ALGORITHM = "UNSUPPORTED_ALGORITHM",
  LOCATION_NOT_FOUND = "LOCATION_NOT_FOUND",
  LOCATION_UNREADABLE = "LOCATION_UNREADABLE",
  INVALID_MANIFEST = "INVALID_MANIFEST",

  // Validation errors
  VALIDATION_ERROR = "VALIDATION_ERROR",
  DUPLICATE_MANIFEST_KEY = "DUPLICATE_MANIFEST_KEY",

  // Filesystem errors
  FILESYSTEM_ERROR = "FILESYSTEM_ERROR",
  FILE_NOT_FOUND = "FILE_NOT_FOUND",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  DISK_FULL = "DISK_FULL",
  INVALID_OPERATION = "INVALID_OPERATION",

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
    if (error instanceof UnsupportedAlgorithmError) {
      return this.createErrorResponse(
        ErrorCode.UNSUPPORTED_ALGORITHM,
        error.message,
        {
          type: "precondition_failed",
          algorithm: error.algorithm,
          available: error.available,
          remediation: "Choose one of the available algorithms",
        }
      );
    }

    if (error instanceof LocationNotFoundError) {
      return this.createErrorResponse(
        ErrorCode.LOCATION_NOT_FOUND,
        error.message,
        {
          type: "precondition_failed",
          location: error.location,
          remediation: "Verify the file or directory path exists",
        }
      );
    }

    if (error instanceof LocationUnreadableError) {
      return this.createErrorResponse(
        ErrorCode.LOCATION_UNREADABLE,
        error.message,
        {
          type: "precondition_failed",
          location: error.location,
          remediation: "Check permissions on the scan location",
        }
      );
    }

    if (error instanceof InvalidManifestError) {
      return this.createErrorResponse(ErrorCode.INVALID_MANIFEST, error.message, {
        type: "precondition_failed",
        issues: error.issues,
        remediation:
          "The hash file must contain 'metadata' and 'hashes' sections written by a scan",
      });
    }

    if (error instanceof DuplicateManifestKeyError) {
      return this.createErrorResponse(
        ErrorCode.DUPLICATE_MANIFEST_KEY,
        error.message,
        {
          type: "validation_error",
          key: error.key,
          paths: error.paths,
          remediation:
            "Disable symlink following or exclude one of the colliding paths",
        }
      );
    }

    if (error instanceof ZodError) {
      return this.createErrorResponse(
        ErrorCode.VALIDATION_ERROR,
        "Invalid tool arguments",
        {
          type: "validation_error",
          issues: error.issues.map(
            (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
          ),
          remediation: "Check the input parameters and try again",
        }
      );
    }

    if (error instanceof ValidationError) {
      return this.createErrorResponse(ErrorCode.VALIDATION_ERROR, error.message, {
        type: "validation_error",
        remediation: "Check the input parameters and try again",
      });
    }

    if (this.isNodeError(error)) {
      return this.handleNodeError(error);
    }

    if (error instanceof FileSystemError) {
      return this.createErrorResponse(ErrorCode.FILESYSTEM_ERROR, error.message, {
        type: "filesystem_error",
        remediation: "Check the filesystem and try again",
      });
    }

    const err = error instanceof Error ? error : undefined;
    return this.createErrorResponse(
      ErrorCode.INTERNAL_ERROR,
      this.describe(error) || "An unexpected error occurred",
      {
        name: err?.name ?? "Error",
        stack:
          process.env["NODE_ENV"] === "development" ? err?.stack : undefined,
      }
    );
  }

  /**
   * Handle Node.js system errors (ENOENT, EACCES, etc.)
   */
  private static handleNodeError(
    error: NodeJS.ErrnoException
  ): MCPErrorResponse {
    let code = ErrorCode.FILESYSTEM_ERROR;
    let remediation = "Check the file path and permissions";

    switch (error.code) {
      case "ENOENT":
        code = ErrorCode.FILE_NOT_FOUND;
        remediation = "The specified file or directory does not exist";
        break;
      case "EACCES":
      case "EPERM":
        code = ErrorCode.PERMISSION_DENIED;
        remediation =
          "Insufficient permissions to access the file or directory";
        break;
      case "ENOSPC":
        code = ErrorCode.DISK_FULL;
        remediation = "No space left on device";
        break;
      case "EISDIR":
        code = ErrorCode.INVALID_OPERATION;
        remediation = "Cannot perform this operation on a directory";
        break;
      case "ENOTDIR":
        code = ErrorCode.INVALID_OPERATION;
        remediation = "Not a directory";
        break;
    }

    return this.createErrorResponse(code, error.message, {
      type: "filesystem_error",
      errno: error.errno,
      syscall: error.syscall,
      path: error.path,
      remediation,
    });
  }

  /**
   * Check if error is a Node.js system error
   */
  static isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return (
      typeof error === "object" &&
      error !== null &&
      "code" in error &&
      typeof error.code === "string" &&
      error.code.startsWith("E")
    );
  }

  /**
   * One-line description of any thrown value
   */
  static describe(error: unknown): string {
    if (
      typeof error === "object" &&
      error !== null &&
      "message" in error &&
      typeof error.message === "string"
    ) {
      return error.message;
    }
    return String(error);
  }

  /**
   * Create a structured error response
   */
  static createErrorResponse(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>
  ): MCPErrorResponse {
    return {
      error: {
        code,
        message,
        details,
      },
    };
  }

  /**
   * Log error for debugging
   */
  static logError(error: unknown, context?: Record<string, unknown>): void {
    const details =
      typeof error === "object" && error !== null ? error : undefined;
    console.error(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: "ERROR",
        message: this.describe(error),
        name: details && "name" in details ? String(details.name) : "Error",
        stack:
          details && "stack" in details && typeof details.stack === "string"
            ? details.stack
            : undefined,
        context,
      })
    );
  }
}
