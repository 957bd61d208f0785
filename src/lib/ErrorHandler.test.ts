/**
 * Unit tests for ErrorHandler
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { ErrorCode, ErrorHandler } from "./ErrorHandler";
import {
  DuplicateManifestKeyError,
  FileSystemError,
  InvalidManifestError,
  LocationNotFoundError,
  LocationUnreadableError,
  UnsupportedAlgorithmError,
  ValidationError,
} from "../types";

function errnoError(code: string, message: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  error.syscall = "open";
  error.path = "/data/file.txt";
  return error;
}

describe("ErrorHandler", () => {
  describe("toMCPError", () => {
    it("should map unsupported algorithms with the available set", () => {
      const response = ErrorHandler.toMCPError(
        new UnsupportedAlgorithmError("UNKNOWN", ["MD5", "SHA256"])
      );
      expect(response.error.code).toBe(ErrorCode.UNSUPPORTED_ALGORITHM);
      expect(response.error.message).toBe(
        "Unsupported algorithm: UNKNOWN. Available: MD5, SHA256"
      );
      expect(response.error.details).toMatchObject({
        algorithm: "UNKNOWN",
        available: ["MD5", "SHA256"],
      });
    });

    it("should map location errors", () => {
      expect(
        ErrorHandler.toMCPError(new LocationNotFoundError("/nowhere")).error.code
      ).toBe(ErrorCode.LOCATION_NOT_FOUND);
      expect(
        ErrorHandler.toMCPError(new LocationUnreadableError("/root", "EACCES"))
          .error.code
      ).toBe(ErrorCode.LOCATION_UNREADABLE);
    });

    it("should map invalid manifests with their issues", () => {
      const response = ErrorHandler.toMCPError(
        new InvalidManifestError("Invalid hash file format", ["hashes: Required"])
      );
      expect(response.error.code).toBe(ErrorCode.INVALID_MANIFEST);
      expect(response.error.details).toMatchObject({ issues: ["hashes: Required"] });
    });

    it("should map duplicate keys ahead of generic validation errors", () => {
      const response = ErrorHandler.toMCPError(
        new DuplicateManifestKeyError("a.txt", ["/x/a.txt", "/y/a.txt"])
      );
      expect(response.error.code).toBe(ErrorCode.DUPLICATE_MANIFEST_KEY);
      expect(
        ErrorHandler.toMCPError(new ValidationError("bad input")).error.code
      ).toBe(ErrorCode.VALIDATION_ERROR);
    });

    it("should map zod argument errors to validation errors", () => {
      const parsed = z.object({ path: z.string() }).safeParse({});
      expect(parsed.success).toBe(false);
      if (!parsed.success) {
        const response = ErrorHandler.toMCPError(parsed.error);
        expect(response.error.code).toBe(ErrorCode.VALIDATION_ERROR);
        expect(response.error.details).toMatchObject({ issues: ["path: Required"] });
      }
    });

    it("should map Node.js system errors by code", () => {
      expect(
        ErrorHandler.toMCPError(errnoError("ENOENT", "no such file")).error.code
      ).toBe(ErrorCode.FILE_NOT_FOUND);
      expect(
        ErrorHandler.toMCPError(errnoError("EACCES", "denied")).error.code
      ).toBe(ErrorCode.PERMISSION_DENIED);
      expect(
        ErrorHandler.toMCPError(errnoError("ENOSPC", "full")).error.code
      ).toBe(ErrorCode.DISK_FULL);
      expect(
        ErrorHandler.toMCPError(errnoError("EISDIR", "is a directory")).error.details
      ).toMatchObject({ syscall: "open", path: "/data/file.txt" });
    });

    it("should map other filesystem errors", () => {
      expect(
        ErrorHandler.toMCPError(new FileSystemError("disk gone")).error.code
      ).toBe(ErrorCode.FILESYSTEM_ERROR);
    });

    it("should map anything else to an internal error", () => {
      const response = ErrorHandler.toMCPError("plain string");
      expect(response.error.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(response.error.message).toBe("plain string");
    });
  });

  describe("helpers", () => {
    it("should recognise Node.js system errors", () => {
      expect(ErrorHandler.isNodeError(errnoError("ENOENT", "x"))).toBe(true);
      expect(ErrorHandler.isNodeError(new Error("x"))).toBe(false);
      expect(ErrorHandler.isNodeError({ code: "ENOENT" })).toBe(true);
      expect(ErrorHandler.isNodeError({ code: 2 })).toBe(false);
      expect(ErrorHandler.isNodeError(null)).toBe(false);
    });

    it("should recognise errors raised by fs", async () => {
      const missing = path.join(os.tmpdir(), `hash-verifier-missing-${process.pid}`);
      const error = await fs.promises.stat(missing).then(
        () => undefined,
        (reason: unknown) => reason
      );

      expect(ErrorHandler.isNodeError(error)).toBe(true);
      expect(ErrorHandler.describe(error)).toBe(
        `ENOENT: no such file or directory, stat '${missing}'`
      );
      expect(ErrorHandler.toMCPError(error).error.code).toBe(
        ErrorCode.FILE_NOT_FOUND
      );
    });

    it("should describe thrown values", () => {
      expect(ErrorHandler.describe(new Error("boom"))).toBe("boom");
      expect(ErrorHandler.describe({ message: "from another realm" })).toBe(
        "from another realm"
      );
      expect(ErrorHandler.describe(42)).toBe("42");
    });

    it("should log errors as JSON lines", () => {
      const logSpy = jest.spyOn(console, "error").mockImplementation(() => {});
      ErrorHandler.logError(new Error("boom"), { phase: "test" });

      const entry = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(entry).toMatchObject({
        level: "ERROR",
        message: "boom",
        name: "Error",
        context: { phase: "test" },
      });
      logSpy.mockRestore();
    });
  });
});
