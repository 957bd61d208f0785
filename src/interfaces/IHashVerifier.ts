/**
 * Hash verifier interface
 *
 * The entry points collaborators (the MCP tools, a GUI, a CLI) call into.
 * Each pass returns a best-effort aggregate plus an explicit problem list;
 * callers must inspect it.
 */

import { AlgorithmId } from "./IDigestProvider";
import { ICancellationToken } from "./ICancellationToken";
import { ProgressSink } from "./IConcurrentScheduler";
import { Manifest, VerificationReport } from "./IManifestCodec";
import { VerifyOptions } from "./IVerifier";

export interface ScanOptions {
  /** Defaults to the configured default algorithm */
  algorithm?: AlgorithmId | string;
  /** Defaults to the configured worker count */
  workerCount?: number;
  progress?: ProgressSink;
  token?: ICancellationToken;
}

export interface ScanResult {
  manifest: Manifest;
  /** Same as manifest.errors */
  errors: string[];
  /** Number of files found but not digested because of cancellation */
  skipped: number;
  cancelled: boolean;
}

export interface SaveResult {
  /** Path of the JSON document */
  path: string;
  /** Path of the companion text listing, when one was written */
  companionPath?: string;
}

export interface IHashVerifier {
  listAlgorithms(): AlgorithmId[];

  /**
   * Canonical id for a requested algorithm name (default when omitted)
   * @throws UnsupportedAlgorithmError
   */
  resolveAlgorithm(name?: string): AlgorithmId;

  /**
   * Digest one file
   * @throws UnsupportedAlgorithmError
   * @throws FileSystemError if the file cannot be read
   */
  hashFile(filePath: string, algorithm?: AlgorithmId | string): Promise<string>;

  /**
   * Hash every file under a location
   *
   * @throws UnsupportedAlgorithmError before any file I/O
   * @throws LocationNotFoundError / LocationUnreadableError before any digesting
   * @throws DuplicateManifestKeyError if two files map to one relative key
   */
  scan(location: string, options?: ScanOptions): Promise<ScanResult>;

  /** Write the manifest and, if it has errors, `<name>_errors.txt` */
  saveManifest(manifest: Manifest, outputPath: string): Promise<SaveResult>;

  /**
   * @throws InvalidManifestError
   */
  loadManifest(manifestPath: string): Promise<Manifest>;

  verify(manifest: Manifest, options?: VerifyOptions): Promise<VerificationReport>;

  /** Load a manifest file and verify it, recording the file as the report source */
  verifyFile(
    manifestPath: string,
    options?: Omit<VerifyOptions, "sourceManifest">
  ): Promise<VerificationReport>;

  /** Write the report and, if it has mismatches, `<name>_corrupted.txt` */
  saveReport(report: VerificationReport, outputPath: string): Promise<SaveResult>;
}
