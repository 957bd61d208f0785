/**
 * Digest engine interface
 */

import { AlgorithmId } from "./IDigestProvider";
import { ICancellationToken } from "./ICancellationToken";

export interface DigestOptions {
  /** Bytes per read (default: 8192) */
  chunkSize?: number;
  /** Checked before and after every chunk read */
  token?: ICancellationToken;
}

/**
 * Result of digesting one file
 *
 * `cancelled` means the read was stopped, not that it failed.
 */
export type DigestOutcome =
  | { status: "ok"; digest: string }
  | { status: "cancelled" }
  | { status: "failed"; error: string };

export interface IDigestEngine {
  /**
   * Digest a single file in bounded chunks
   *
   * I/O failures are returned as a `failed` outcome and never thrown. The file
   * handle is closed on every exit path.
   *
   * @throws UnsupportedAlgorithmError if the algorithm is not available
   * @throws ValidationError if chunkSize is not a positive integer
   */
  digestFile(
    filePath: string,
    algorithm: AlgorithmId | string,
    options?: DigestOptions
  ): Promise<DigestOutcome>;
}
