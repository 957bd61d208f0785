/**
 * Verifier interface
 */

import { ICancellationToken } from "./ICancellationToken";
import { ProgressSink } from "./IConcurrentScheduler";
import { Manifest, VerificationReport } from "./IManifestCodec";

export interface VerifyOptions {
  /**
   * Directory the manifest's relative paths are tried against first
   *
   * Resolution order per entry: `basePath/<relative>`, then the stored
   * absolute path, then `<relative>` against the working directory. The first
   * candidate that exists wins.
   */
  basePath?: string;
  /** Recorded as the report's source (default: "<memory>") */
  sourceManifest?: string;
  workerCount?: number;
  chunkSize?: number;
  progress?: ProgressSink;
  token?: ICancellationToken;
}

export interface IVerifier {
  /**
   * Recompute every manifest entry and classify it against the stored digest
   *
   * Per-path problems become outcomes in the report; nothing is thrown for
   * them.
   *
   * @throws UnsupportedAlgorithmError if the manifest's algorithm is not
   * available in this process
   */
  verify(manifest: Manifest, options?: VerifyOptions): Promise<VerificationReport>;
}
