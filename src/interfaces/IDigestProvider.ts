/**
 * Digest provider interface
 *
 * Enumerates the digest algorithms this process can compute and produces a
 * fresh streaming hasher per request.
 */

/**
 * Canonical digest algorithm identifiers
 */
export type AlgorithmId =
  | "MD5"
  | "SHA1"
  | "SHA3-256"
  | "SHA256"
  | "SHA512"
  | "XXH64"
  | "BLAKE2b"
  | "BLAKE3"
  | "CRC32";

/**
 * Incremental hasher fed chunk by chunk
 */
export interface StreamingHasher {
  /** Feed the next chunk of input */
  update(chunk: Uint8Array): void;
  /** Lowercase hex digest of everything fed so far; call once */
  finalize(): string;
}

/**
 * Creates a hasher for one algorithm. Rejects when the backing
 * implementation cannot run in this process.
 */
export type HasherFactory = () => Promise<StreamingHasher>;

export interface IDigestProvider {
  /**
   * Algorithms usable in this process
   *
   * Computed once when the provider is created and fixed for its lifetime.
   */
  availableAlgorithms(): ReadonlySet<AlgorithmId>;

  /**
   * Whether an algorithm name is in the available set
   */
  isAvailable(algorithm: string): algorithm is AlgorithmId;

  /**
   * Narrow an arbitrary name to an available algorithm
   * @throws UnsupportedAlgorithmError if the name is not available
   */
  assertAvailable(algorithm: string): AlgorithmId;

  /**
   * Create a new streaming hasher
   * @throws UnsupportedAlgorithmError if the algorithm is not available
   */
  newHasher(algorithm: string): Promise<StreamingHasher>;
}
