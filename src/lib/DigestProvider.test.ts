/**
 * Unit tests for DigestProvider
 */

import * as crypto from "crypto";
import {
  ALGORITHM_IDS,
  Crc32Hasher,
  DigestProvider,
  parseAlgorithmId,
} from "./DigestProvider";
import { AlgorithmId, StreamingHasher } from "../interfaces/IDigestProvider";
import { UnsupportedAlgorithmError } from "../types";

async function digestOf(
  provider: DigestProvider,
  algorithm: AlgorithmId,
  ...chunks: string[]
): Promise<string> {
  const hasher = await provider.newHasher(algorithm);
  for (const chunk of chunks) {
    hasher.update(Buffer.from(chunk, "utf-8"));
  }
  return hasher.finalize();
}

describe("DigestProvider", () => {
  let provider: DigestProvider;

  beforeAll(async () => {
    provider = await DigestProvider.create();
  });

  describe("parseAlgorithmId", () => {
    it("should match canonical names case-insensitively", () => {
      expect(parseAlgorithmId("sha256")).toBe("SHA256");
      expect(parseAlgorithmId("blake2b")).toBe("BLAKE2b");
      expect(parseAlgorithmId(" Sha3-256 ")).toBe("SHA3-256");
    });

    it("should accept legacy names", () => {
      expect(parseAlgorithmId("SHA-3")).toBe("SHA3-256");
      expect(parseAlgorithmId("xxHash64")).toBe("XXH64");
    });

    it("should reject unknown names", () => {
      expect(parseAlgorithmId("UNKNOWN")).toBeUndefined();
      expect(parseAlgorithmId("")).toBeUndefined();
    });
  });

  describe("default registry", () => {
    it("should make every algorithm available on Node.js 20", () => {
      expect([...provider.availableAlgorithms()].sort()).toEqual(
        [...ALGORITHM_IDS].sort()
      );
    });

    it("should agree with node crypto for the OpenSSL-backed algorithms", async () => {
      const pairs: [AlgorithmId, string][] = [
        ["MD5", "md5"],
        ["SHA1", "sha1"],
        ["SHA3-256", "sha3-256"],
        ["SHA256", "sha256"],
        ["SHA512", "sha512"],
        ["BLAKE2b", "blake2b512"],
      ];
      for (const [id, name] of pairs) {
        const expected = crypto.createHash(name).update("hello").digest("hex");
        expect(await digestOf(provider, id, "hello")).toBe(expected);
      }
    });

    it("should produce known digests", async () => {
      expect(await digestOf(provider, "SHA256", "hello")).toBe(
        "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824"
      );
      expect(await digestOf(provider, "MD5", "hello")).toBe(
        "5d41402abc4b2a76b9719d911017c592"
      );
      expect(await digestOf(provider, "CRC32", "123456789")).toBe("cbf43926");
      expect(await digestOf(provider, "XXH64")).toBe("ef46db3751d8e999");
      expect(await digestOf(provider, "BLAKE3")).toBe(
        "af1349b9f5f9a1a6a0404dea36dcc9499bcb25c9adc112b7cc9a93cae41f3262"
      );
    });

    it("should give the same digest however the input is chunked", async () => {
      for (const id of ALGORITHM_IDS) {
        expect(await digestOf(provider, id, "hel", "", "lo")).toBe(
          await digestOf(provider, id, "hello")
        );
      }
    });

    it("should hand out independent hashers", async () => {
      const first = await provider.newHasher("SHA256");
      const second = await provider.newHasher("SHA256");
      first.update(Buffer.from("hello"));
      expect(second.finalize()).toBe(
        "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
      );
      expect(first.finalize()).toBe(
        "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824"
      );
    });
  });

  describe("capability probing", () => {
    const sha256Hasher = async (): Promise<StreamingHasher> => {
      const hash = crypto.createHash("sha256");
      return {
        update: (chunk) => {
          hash.update(chunk);
        },
        finalize: () => hash.digest("hex"),
      };
    };

    it("should leave out algorithms whose backend fails", async () => {
      const limited = await DigestProvider.create({
        SHA256: sha256Hasher,
        BLAKE3: async () => {
          throw new Error("wasm unavailable");
        },
      });

      expect([...limited.availableAlgorithms()]).toEqual(["SHA256"]);
      expect(() => limited.assertAvailable("BLAKE3")).toThrow(
        UnsupportedAlgorithmError
      );
    });

    it("should leave out algorithms whose digest has the wrong length", async () => {
      const limited = await DigestProvider.create({
        SHA256: sha256Hasher,
        MD5: sha256Hasher,
      });
      expect(limited.isAvailable("MD5")).toBe(false);
      expect(limited.isAvailable("SHA256")).toBe(true);
    });
  });

  describe("availability checks", () => {
    it("should only report exact canonical ids as available", () => {
      expect(provider.isAvailable("SHA256")).toBe(true);
      expect(provider.isAvailable("sha256")).toBe(false);
      expect(provider.isAvailable("UNKNOWN")).toBe(false);
    });

    it("should resolve aliases in assertAvailable", () => {
      expect(provider.assertAvailable("sha-3")).toBe("SHA3-256");
    });

    it("should reject unknown algorithms with the available set", async () => {
      expect(() => provider.assertAvailable("UNKNOWN")).toThrow(
        UnsupportedAlgorithmError
      );
      await expect(provider.newHasher("UNKNOWN")).rejects.toThrow(
        "Unsupported algorithm: UNKNOWN"
      );
    });
  });

  describe("Crc32Hasher", () => {
    it("should render leading zeros", () => {
      const hasher = new Crc32Hasher();
      expect(hasher.finalize()).toBe("00000000");
    });
  });
});
