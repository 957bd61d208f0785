/**
 * Hash verifier implementation
 *
 * Wires the walker, scheduler, codec and verifier into the scan and verify
 * passes that collaborators call.
 */

import * as fs from "fs";
import * as path from "path";
import { AlgorithmId } from "../interfaces/IDigestProvider";
import { ICancellationToken } from "../interfaces/ICancellationToken";
import { FileRecord, Manifest, VerificationReport } from "../interfaces/IManifestCodec";
import { VerifyOptions } from "../interfaces/IVerifier";
import {
  IHashVerifier,
  SaveResult,
  ScanOptions,
  ScanResult,
} from "../interfaces/IHashVerifier";
import { DuplicateManifestKeyError, FileSystemError } from "../types";
import { AuditLogger } from "./AuditLogger";
import { ConcurrentScheduler, assertWorkerCount } from "./ConcurrentScheduler";
import { ConfigLoader, HashVerifierConfig } from "./ConfigLoader";
import { DigestEngine } from "./DigestEngine";
import { DigestProvider } from "./DigestProvider";
import { ErrorHandler } from "./ErrorHandler";
import { FileWalker } from "./FileWalker";
import { ManifestCodec, companionPath } from "./ManifestCodec";
import { Verifier } from "./Verifier";

/**
 * Manifest key for a scanned file
 *
 * Falls back to the absolute path when the file cannot be expressed
 * relative to the base (for example, a different drive on Windows).
 */
export function manifestKey(basePath: string, filePath: string): string {
  const relative = path.relative(basePath, filePath);
  if (relative === "" || path.isAbsolute(relative)) {
    return filePath;
  }
  return relative;
}

export class HashVerifier implements IHashVerifier {
  private config: HashVerifierConfig;
  private provider: DigestProvider;
  private engine: DigestEngine;
  private walker: FileWalker;
  private scheduler: ConcurrentScheduler;
  private codec: ManifestCodec;
  private verifier: Verifier;
  private logger: AuditLogger;

  constructor(config: HashVerifierConfig, provider: DigestProvider) {
    this.config = config;
    this.provider = provider;
    this.engine = new DigestEngine(provider);
    this.walker = new FileWalker();
    this.scheduler = new ConcurrentScheduler(provider, this.engine);
    this.codec = new ManifestCodec();
    this.verifier = new Verifier(provider, this.engine, this.scheduler);
    this.logger = new AuditLogger(config.enableAuditLog);
  }

  /**
   * Probe available algorithms and build a verifier
   */
  static async create(config?: HashVerifierConfig): Promise<HashVerifier> {
    const resolved = config ?? ConfigLoader.parse({});
    return new HashVerifier(resolved, await DigestProvider.create());
  }

  getConfig(): HashVerifierConfig {
    return this.config;
  }

  listAlgorithms(): AlgorithmId[] {
    return [...this.provider.availableAlgorithms()];
  }

  resolveAlgorithm(name?: string): AlgorithmId {
    return this.provider.assertAvailable(
      name ?? this.config.engine.defaultAlgorithm
    );
  }

  async hashFile(
    filePath: string,
    algorithm: AlgorithmId | string = this.config.engine.defaultAlgorithm
  ): Promise<string> {
    const outcome = await this.engine.digestFile(filePath, algorithm, {
      chunkSize: this.config.engine.chunkSize,
    });
    if (outcome.status !== "ok") {
      const reason = outcome.status === "failed" ? outcome.error : "cancelled";
      throw new FileSystemError(`Error reading file ${filePath}: ${reason}`);
    }
    return outcome.digest;
  }

  async scan(location: string, options: ScanOptions = {}): Promise<ScanResult> {
    const algorithm = this.resolveAlgorithm(options.algorithm);
    const workerCount = options.workerCount ?? this.config.engine.workerCount;
    assertWorkerCount(workerCount);
    this.warnIfAlreadyCancelled("scan", options.token);

    const root = path.resolve(location);
    const walk = await this.walker.expand(root, {
      token: options.token,
      followSymlinks: this.config.engine.followSymlinks,
      excludePatterns: this.config.engine.excludePatterns,
    });

    const batch = await this.scheduler.run(walk.files, algorithm, {
      workerCount,
      chunkSize: this.config.engine.chunkSize,
      progress: options.progress,
      token: options.token,
    });

    // A single-file scan is keyed relative to the file's directory
    const basePath =
      walk.files.length === 1 && walk.files[0] === root
        ? path.dirname(root)
        : root;

    const records: [string, FileRecord][] = [];
    const owners = new Map<string, string>();
    for (const filePath of walk.files) {
      const digest = batch.digests.get(filePath);
      if (digest === undefined) {
        continue;
      }
      const key = manifestKey(basePath, filePath);
      const owner = owners.get(key);
      if (owner !== undefined) {
        throw new DuplicateManifestKeyError(key, [owner, filePath]);
      }
      owners.set(key, filePath);
      records.push([
        key,
        { path: filePath, digest, ...(await this.statFile(filePath)) },
      ]);
    }

    const errors = [
      ...walk.errors,
      ...batch.failures.map((failure) => `${failure.path} - ${failure.reason}`),
    ];
    const manifest: Manifest = {
      algorithm,
      scanLocation: root,
      createdAt: new Date().toISOString(),
      // Defined rather than assigned so a file named __proto__ is kept
      entries: Object.fromEntries(records),
      errors,
    };
    const cancelled = walk.cancelled || batch.cancelled;

    this.logger.audit(
      "scan",
      [root],
      `${cancelled ? "cancelled" : "completed"}: ${owners.size} hashed, ${errors.length} errors, ${batch.skipped.length} skipped`
    );

    return { manifest, errors, skipped: batch.skipped.length, cancelled };
  }

  async saveManifest(manifest: Manifest, outputPath: string): Promise<SaveResult> {
    await this.writeText(outputPath, this.codec.encode(manifest));

    if (manifest.errors.length === 0) {
      return { path: outputPath };
    }
    const listingPath = companionPath(outputPath, "_errors");
    await this.writeText(listingPath, this.codec.formatErrorListing(manifest));
    return { path: outputPath, companionPath: listingPath };
  }

  async loadManifest(manifestPath: string): Promise<Manifest> {
    return this.codec.decode(await this.readText(manifestPath));
  }

  async verify(
    manifest: Manifest,
    options: VerifyOptions = {}
  ): Promise<VerificationReport> {
    this.warnIfAlreadyCancelled("verify", options.token);

    const report = await this.verifier.verify(manifest, {
      workerCount: this.config.engine.workerCount,
      chunkSize: this.config.engine.chunkSize,
      ...options,
    });

    this.logger.audit(
      "verify",
      [report.sourceManifest],
      `${report.cancelled ? "cancelled" : "completed"}: ${report.summary.matches} match, ${report.summary.mismatches} mismatch, ${report.errors.length} errors`
    );
    return report;
  }

  async verifyFile(
    manifestPath: string,
    options: Omit<VerifyOptions, "sourceManifest"> = {}
  ): Promise<VerificationReport> {
    const manifest = await this.loadManifest(manifestPath);
    return this.verify(manifest, { ...options, sourceManifest: manifestPath });
  }

  async saveReport(
    report: VerificationReport,
    outputPath: string
  ): Promise<SaveResult> {
    await this.writeText(outputPath, this.codec.encodeReport(report));

    if (report.corrupted.length === 0) {
      return { path: outputPath };
    }
    const listingPath = companionPath(outputPath, "_corrupted");
    await this.writeText(listingPath, this.codec.formatCorruptionListing(report));
    return { path: outputPath, companionPath: listingPath };
  }

  private async statFile(
    filePath: string
  ): Promise<Pick<FileRecord, "size" | "modified">> {
    try {
      const stats = await fs.promises.stat(filePath);
      return { size: stats.size, modified: stats.mtimeMs / 1000 };
    } catch (error) {
      // Digest is still valid; size and mtime are informational
      ErrorHandler.logError(error, { phase: "stat", path: filePath });
      return { size: 0, modified: 0 };
    }
  }

  private warnIfAlreadyCancelled(
    operation: string,
    token?: ICancellationToken
  ): void {
    if (token?.isCancelled) {
      this.logger.warn(
        `${operation} started with a cancelled token; call reset() before reusing it`,
        { operation }
      );
    }
  }

  private async readText(filePath: string): Promise<string> {
    try {
      return await fs.promises.readFile(filePath, "utf-8");
    } catch (error) {
      throw new FileSystemError(
        `Unable to read ${filePath}: ${ErrorHandler.describe(error)}`
      );
    }
  }

  private async writeText(filePath: string, text: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, text, "utf-8");
  }
}
