/**
 * Verifier implementation
 */

import * as fs from "fs";
import * as path from "path";
import { AlgorithmId, IDigestProvider } from "../interfaces/IDigestProvider";
import { IDigestEngine } from "../interfaces/IDigestEngine";
import { IConcurrentScheduler } from "../interfaces/IConcurrentScheduler";
import {
  CorruptionRecord,
  FileRecord,
  Manifest,
  VerificationOutcome,
  VerificationReport,
} from "../interfaces/IManifestCodec";
import { IVerifier, VerifyOptions } from "../interfaces/IVerifier";
import { DEFAULT_WORKER_COUNT, TaskCancelledError } from "./ConcurrentScheduler";
import { ErrorHandler } from "./ErrorHandler";
import { tallyOutcomes } from "./ManifestCodec";

interface CheckedEntry {
  outcome: Exclude<VerificationOutcome, "VERIFICATION_ERROR">;
  /** Path reported to the progress sink */
  progressPath: string;
  corruption?: CorruptionRecord;
  error?: string;
}

export class Verifier implements IVerifier {
  private provider: IDigestProvider;
  private engine: IDigestEngine;
  private scheduler: IConcurrentScheduler;

  constructor(
    provider: IDigestProvider,
    engine: IDigestEngine,
    scheduler: IConcurrentScheduler
  ) {
    this.provider = provider;
    this.engine = engine;
    this.scheduler = scheduler;
  }

  async verify(
    manifest: Manifest,
    options: VerifyOptions = {}
  ): Promise<VerificationReport> {
    const algorithm = this.provider.assertAvailable(manifest.algorithm);
    const relativePaths = Object.keys(manifest.entries);
    const checked = new Map<string, CheckedEntry>();
    const failed = new Map<string, string>();

    const settled = await this.scheduler.runTasks(
      relativePaths,
      (relativePath) =>
        this.checkEntry(
          relativePath,
          manifest.entries[relativePath],
          algorithm,
          options
        ),
      {
        workerCount: options.workerCount ?? DEFAULT_WORKER_COUNT,
        token: options.token,
        onSettled: (task, completed, total) => {
          let progressPath = task.item;
          if (task.status === "fulfilled") {
            checked.set(task.item, task.value);
            progressPath = task.value.progressPath;
          } else if (task.status === "rejected") {
            failed.set(task.item, ErrorHandler.describe(task.reason));
          }
          options.progress?.(completed, total, progressPath);
        },
      }
    );

    const outcomeList: [string, VerificationOutcome][] = [];
    const corrupted: CorruptionRecord[] = [];
    const errors: string[] = [];

    // Rebuilt in manifest order so reports do not depend on completion order
    for (const relativePath of relativePaths) {
      const entry = checked.get(relativePath);
      const failure = failed.get(relativePath);

      if (entry) {
        outcomeList.push([relativePath, entry.outcome]);
        if (entry.corruption) {
          corrupted.push(entry.corruption);
        }
        if (entry.error) {
          errors.push(entry.error);
        }
      } else if (failure !== undefined) {
        outcomeList.push([relativePath, "VERIFICATION_ERROR"]);
        errors.push(`${relativePath} - Verification error: ${failure}`);
      }
    }

    // fromEntries defines keys, so a file named __proto__ stays an entry
    const outcomes: Record<string, VerificationOutcome> =
      Object.fromEntries(outcomeList);

    return {
      sourceManifest: options.sourceManifest ?? "<memory>",
      verifiedAt: new Date().toISOString(),
      outcomes,
      corrupted,
      errors,
      summary: tallyOutcomes(outcomes),
      cancelled: settled.some((task) => task.status === "skipped"),
    };
  }

  private async checkEntry(
    relativePath: string,
    record: FileRecord,
    algorithm: AlgorithmId,
    options: VerifyOptions
  ): Promise<CheckedEntry> {
    const currentPath = await this.resolveCurrentPath(
      relativePath,
      record,
      options.basePath
    );
    if (currentPath === undefined) {
      return {
        outcome: "FILE_NOT_FOUND",
        progressPath: relativePath,
        error: `${relativePath} - File not found`,
      };
    }

    const result = await this.engine.digestFile(currentPath, algorithm, {
      chunkSize: options.chunkSize,
      token: options.token,
    });

    switch (result.status) {
      case "cancelled":
        throw new TaskCancelledError();
      case "failed":
        return {
          outcome: "READ_ERROR",
          progressPath: currentPath,
          error: `${relativePath} - Unable to read file: ${result.error}`,
        };
      case "ok":
        if (result.digest === record.digest.toLowerCase()) {
          return { outcome: "MATCH", progressPath: currentPath };
        }
        return {
          outcome: "MISMATCH",
          progressPath: currentPath,
          corruption: {
            relativePath,
            currentPath,
            algorithm,
            expectedDigest: record.digest,
            actualDigest: result.digest,
          },
        };
    }
  }

  /**
   * First existing candidate wins: base path override, stored absolute
   * path, then the relative path against the working directory.
   */
  private async resolveCurrentPath(
    relativePath: string,
    record: FileRecord,
    basePath?: string
  ): Promise<string | undefined> {
    const candidates: string[] = [];
    if (basePath) {
      candidates.push(path.resolve(basePath, relativePath));
    }
    if (record.path) {
      candidates.push(record.path);
    }
    candidates.push(relativePath);

    for (const candidate of candidates) {
      if (await this.exists(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  private async exists(candidate: string): Promise<boolean> {
    try {
      await fs.promises.stat(candidate);
      return true;
    } catch (error) {
      if (
        ErrorHandler.isNodeError(error) &&
        (error.code === "ENOENT" || error.code === "ENOTDIR")
      ) {
        return false;
      }
      throw error;
    }
  }
}
