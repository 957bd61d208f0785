/**
 * Common types for the File Hash Verifier
 *
 * This module defines the error taxonomy and the response envelopes returned by
 * the MCP tools. Only precondition failures are thrown; problems local to a
 * single file are recorded in the scan or verification result instead.
 */

/**
 * Validation error - thrown when input validation fails
 *
 * Common causes:
 * - Worker count outside 1-16
 * - Non-positive chunk size
 * - Malformed configuration file
 *
 * @example
 * ```typescript
 * throw new ValidationError("workerCount must be an integer between 1 and 16");
 * ```
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Filesystem error - thrown when a filesystem precondition fails
 *
 * Per-file read failures during a scan are never thrown; they are collected
 * into the manifest's error list.
 */
export class FileSystemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FileSystemError";
  }
}

/**
 * Requested digest algorithm is not in the available set
 *
 * Raised before any file I/O so a bad request never touches the disk.
 *
 * @example
 * ```typescript
 * throw new UnsupportedAlgorithmError("UNKNOWN", ["MD5", "SHA256"]);
 * ```
 */
export class UnsupportedAlgorithmError extends Error {
  readonly algorithm: string;
  readonly available: string[];

  constructor(algorithm: string, available: string[]) {
    super(
      `Unsupported algorithm: ${algorithm}. Available: ${available.join(", ")}`
    );
    this.name = "UnsupportedAlgorithmError";
    this.algorithm = algorithm;
    this.available = available;
  }
}

/**
 * Scan root does not exist
 */
export class LocationNotFoundError extends FileSystemError {
  readonly location: string;

  constructor(location: string) {
    super(`Location not found: ${location}`);
    this.name = "LocationNotFoundError";
    this.location = location;
  }
}

/**
 * Scan root exists but cannot be read (permissions, not a file or directory)
 */
export class LocationUnreadableError extends FileSystemError {
  readonly location: string;

  constructor(location: string, reason: string) {
    super(`Location unreadable: ${location} (${reason})`);
    this.name = "LocationUnreadableError";
    this.location = location;
  }
}

/**
 * Persisted manifest or report is malformed or missing a required section
 *
 * `issues` holds one human-readable line per schema violation, e.g.
 * `"metadata.algorithm: Required"`.
 */
export class InvalidManifestError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "InvalidManifestError";
    this.issues = issues;
  }
}

/**
 * Two distinct scanned files produced the same relative manifest key
 *
 * Writing both would silently overwrite one entry, so manifest construction
 * stops instead.
 */
export class DuplicateManifestKeyError extends ValidationError {
  readonly key: string;
  readonly paths: [string, string];

  constructor(key: string, paths: [string, string]) {
    super(
      `Duplicate manifest key "${key}" for ${paths[0]} and ${paths[1]}`
    );
    this.name = "DuplicateManifestKeyError";
    this.key = key;
    this.paths = paths;
  }
}

/**
 * MCP error response structure
 *
 * @example
 * ```json
 * {
 *   "error": {
 *     "code": "UNSUPPORTED_ALGORITHM",
 *     "message": "Unsupported algorithm: UNKNOWN. Available: MD5, SHA256",
 *     "details": { "available": ["MD5", "SHA256"] }
 *   }
 * }
 * ```
 */
export interface MCPErrorResponse {
  error: {
    /** Error code (e.g., "INVALID_MANIFEST", "LOCATION_NOT_FOUND") */
    code: string;
    /** Human-readable error message */
    message: string;
    /** Optional additional error details */
    details?: Record<string, unknown>;
  };
}

