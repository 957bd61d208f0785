/**
 * Digest engine implementation
 */

import * as fs from "fs";
import { AlgorithmId, IDigestProvider } from "../interfaces/IDigestProvider";
import {
  DigestOptions,
  DigestOutcome,
  IDigestEngine,
} from "../interfaces/IDigestEngine";
import { ValidationError } from "../types";
import { ErrorHandler } from "./ErrorHandler";

export const DEFAULT_CHUNK_SIZE = 8192;

const CANCELLED: DigestOutcome = { status: "cancelled" };

export class DigestEngine implements IDigestEngine {
  private provider: IDigestProvider;

  constructor(provider: IDigestProvider) {
    this.provider = provider;
  }

  /**
   * Stream a file through the algorithm's hasher
   *
   * The token is checked before and after every read. A read already in
   * flight when the token is set runs to completion; its bytes are dropped.
   */
  async digestFile(
    filePath: string,
    algorithm: AlgorithmId | string,
    options: DigestOptions = {}
  ): Promise<DigestOutcome> {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ValidationError(
        `chunkSize must be a positive integer, got ${chunkSize}`
      );
    }

    const hasher = await this.provider.newHasher(algorithm);
    const token = options.token;

    if (token?.isCancelled) {
      return CANCELLED;
    }

    let handle: fs.promises.FileHandle;
    try {
      handle = await fs.promises.open(filePath, "r");
    } catch (error) {
      return { status: "failed", error: ErrorHandler.describe(error) };
    }

    try {
      const buffer = Buffer.alloc(chunkSize);
      for (;;) {
        if (token?.isCancelled) {
          return CANCELLED;
        }
        const { bytesRead } = await handle.read(buffer, 0, chunkSize, null);
        if (token?.isCancelled) {
          return CANCELLED;
        }
        if (bytesRead === 0) {
          break;
        }
        hasher.update(buffer.subarray(0, bytesRead));
      }
      return { status: "ok", digest: hasher.finalize() };
    } catch (error) {
      return { status: "failed", error: ErrorHandler.describe(error) };
    } finally {
      await handle.close();
    }
  }
}
