/**
 * Manifest codec interface
 *
 * Defines the in-memory manifest and report models and their persisted form.
 */

import { AlgorithmId } from "./IDigestProvider";

/**
 * One hashed file
 */
export interface FileRecord {
  /** Absolute path at scan time */
  path: string;
  /** Lowercase hex digest */
  digest: string;
  /** File size in bytes */
  size: number;
  /** Last modification time, epoch seconds */
  modified: number;
}

/**
 * Result of a scan, keyed by path relative to the scan root
 */
export interface Manifest {
  algorithm: AlgorithmId;
  /** Location the scan was started from */
  scanLocation: string;
  /** ISO 8601 creation time */
  createdAt: string;
  entries: Record<string, FileRecord>;
  errors: string[];
}

export type VerificationOutcome =
  | "MATCH"
  | "MISMATCH"
  | "FILE_NOT_FOUND"
  | "READ_ERROR"
  | "VERIFICATION_ERROR";

/**
 * Produced for every MISMATCH outcome
 */
export interface CorruptionRecord {
  relativePath: string;
  /** Path the file was found at during verification */
  currentPath: string;
  algorithm: AlgorithmId;
  expectedDigest: string;
  actualDigest: string;
}

export interface VerificationSummary {
  matches: number;
  mismatches: number;
  notFound: number;
  readErrors: number;
  verificationErrors: number;
}

export interface VerificationReport {
  /** Manifest file the report was produced from */
  sourceManifest: string;
  /** ISO 8601 verification time */
  verifiedAt: string;
  /** One entry per relative path checked, in manifest order */
  outcomes: Record<string, VerificationOutcome>;
  corrupted: CorruptionRecord[];
  errors: string[];
  /** Tally of `outcomes` */
  summary: VerificationSummary;
  /** True if the pass was stopped before every path was checked */
  cancelled: boolean;
}

export interface IManifestCodec {
  /** Serialize a manifest to its JSON document */
  encode(manifest: Manifest): string;

  /**
   * Parse and validate a manifest document
   * @throws InvalidManifestError if a section is missing or malformed
   */
  decode(text: string): Manifest;

  encodeReport(report: VerificationReport): string;

  /**
   * @throws InvalidManifestError if a section is missing or malformed
   */
  decodeReport(text: string): VerificationReport;

  /** Plain-text listing of the manifest's errors */
  formatErrorListing(manifest: Manifest, generatedAt?: Date): string;

  /** Plain-text listing of the report's corrupted files */
  formatCorruptionListing(report: VerificationReport, generatedAt?: Date): string;
}
