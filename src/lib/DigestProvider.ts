/**
 * Digest provider implementation
 *
 * A static registry maps every AlgorithmId to a hasher factory. The registry
 * is probed once when the provider is created; algorithms whose backend
 * cannot run here are dropped from the available set without error.
 */

import * as crypto from "crypto";
import * as CRC32 from "crc-32";
import { createBLAKE3, createXXHash64, IHasher } from "hash-wasm";
import { z } from "zod";
import {
  AlgorithmId,
  HasherFactory,
  IDigestProvider,
  StreamingHasher,
} from "../interfaces/IDigestProvider";
import { UnsupportedAlgorithmError } from "../types";

export const ALGORITHM_IDS: readonly AlgorithmId[] = [
  "MD5",
  "SHA1",
  "SHA3-256",
  "SHA256",
  "SHA512",
  "XXH64",
  "BLAKE2b",
  "BLAKE3",
  "CRC32",
];

/**
 * Hex digest length per algorithm
 */
export const DIGEST_HEX_LENGTH: Record<AlgorithmId, number> = {
  MD5: 32,
  SHA1: 40,
  "SHA3-256": 64,
  SHA256: 64,
  SHA512: 128,
  XXH64: 16,
  BLAKE2b: 128,
  BLAKE3: 64,
  CRC32: 8,
};

// Names written by older manifests
const LEGACY_NAMES: Record<string, AlgorithmId> = {
  "SHA-3": "SHA3-256",
  XXHASH64: "XXH64",
};

/**
 * Map a user- or file-supplied name to its canonical id
 *
 * Matching is case-insensitive and accepts legacy names such as "SHA-3" and
 * "xxHash64". Returns undefined for names that are not digest algorithms.
 */
export function parseAlgorithmId(name: string): AlgorithmId | undefined {
  const upper = name.trim().toUpperCase();
  const canonical = ALGORITHM_IDS.find((id) => id.toUpperCase() === upper);
  return canonical ?? LEGACY_NAMES[upper];
}

/**
 * Accepts any name parseAlgorithmId understands and outputs the canonical id
 */
export const AlgorithmIdSchema = z.string().transform((name, ctx): AlgorithmId => {
  const id = parseAlgorithmId(name);
  if (id === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown algorithm "${name}"`,
    });
    return z.NEVER;
  }
  return id;
});

function nodeHasher(opensslName: string): HasherFactory {
  return async () => {
    const hash = crypto.createHash(opensslName);
    return {
      update: (chunk) => {
        hash.update(chunk);
      },
      finalize: () => hash.digest("hex"),
    };
  };
}

function wasmHasher(load: () => Promise<IHasher>): HasherFactory {
  return async () => {
    const hasher = await load();
    hasher.init();
    return {
      update: (chunk) => {
        hasher.update(chunk);
      },
      finalize: () => hasher.digest("hex"),
    };
  };
}

/**
 * Running CRC-32 rendered as 8 lowercase hex digits
 */
export class Crc32Hasher implements StreamingHasher {
  private crc = 0;

  update(chunk: Uint8Array): void {
    this.crc = CRC32.buf(chunk, this.crc);
  }

  finalize(): string {
    return (this.crc >>> 0).toString(16).padStart(8, "0");
  }
}

export const DEFAULT_HASHER_REGISTRY: Record<AlgorithmId, HasherFactory> = {
  MD5: nodeHasher("md5"),
  SHA1: nodeHasher("sha1"),
  "SHA3-256": nodeHasher("sha3-256"),
  SHA256: nodeHasher("sha256"),
  SHA512: nodeHasher("sha512"),
  XXH64: wasmHasher(() => createXXHash64()),
  BLAKE2b: nodeHasher("blake2b512"),
  BLAKE3: wasmHasher(() => createBLAKE3()),
  CRC32: async () => new Crc32Hasher(),
};

export class DigestProvider implements IDigestProvider {
  private readonly registry: Partial<Record<AlgorithmId, HasherFactory>>;
  private readonly available: ReadonlySet<AlgorithmId>;

  private constructor(
    registry: Partial<Record<AlgorithmId, HasherFactory>>,
    available: ReadonlySet<AlgorithmId>
  ) {
    this.registry = registry;
    this.available = available;
  }

  /**
   * Probe a registry and build a provider over the algorithms that work
   *
   * Each factory is exercised once on empty input; a factory that rejects,
   * throws or returns a digest of the wrong length is left out.
   */
  static async create(
    registry: Partial<Record<AlgorithmId, HasherFactory>> = DEFAULT_HASHER_REGISTRY
  ): Promise<DigestProvider> {
    const available = new Set<AlgorithmId>();

    for (const id of ALGORITHM_IDS) {
      const factory = registry[id];
      if (!factory) {
        continue;
      }
      try {
        const hasher = await factory();
        hasher.update(new Uint8Array(0));
        if (hasher.finalize().length === DIGEST_HEX_LENGTH[id]) {
          available.add(id);
        }
      } catch {
        // Backend missing in this environment; leave the algorithm out
        continue;
      }
    }

    return new DigestProvider(registry, available);
  }

  availableAlgorithms(): ReadonlySet<AlgorithmId> {
    return this.available;
  }

  /**
   * True only for the exact canonical id of an available algorithm
   */
  isAvailable(algorithm: string): algorithm is AlgorithmId {
    const id = parseAlgorithmId(algorithm);
    return id !== undefined && id === algorithm && this.available.has(id);
  }

  assertAvailable(algorithm: string): AlgorithmId {
    const id = parseAlgorithmId(algorithm);
    if (id === undefined || !this.available.has(id)) {
      throw new UnsupportedAlgorithmError(algorithm, [...this.available]);
    }
    return id;
  }

  async newHasher(algorithm: string): Promise<StreamingHasher> {
    const id = this.assertAvailable(algorithm);
    const factory = this.registry[id];
    if (!factory) {
      throw new UnsupportedAlgorithmError(algorithm, [...this.available]);
    }
    return factory();
  }
}
