/**
 * Configuration loader for the File Hash Verifier
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { AlgorithmId } from "../interfaces/IDigestProvider";
import { ValidationError } from "../types";
import { DEFAULT_WORKER_COUNT, MAX_WORKERS } from "./ConcurrentScheduler";
import { AlgorithmIdSchema } from "./DigestProvider";
import { DEFAULT_CHUNK_SIZE } from "./DigestEngine";
import { ErrorHandler } from "./ErrorHandler";

export interface EngineConfig {
  defaultAlgorithm: AlgorithmId;
  workerCount: number;
  chunkSize: number;
  followSymlinks: boolean;
  excludePatterns: string[];
}

export interface HashVerifierConfig {
  engine: EngineConfig;
  enableAuditLog: boolean;
}

const EngineConfigSchema = z.object({
  defaultAlgorithm: AlgorithmIdSchema.default("SHA256"),
  workerCount: z
    .number()
    .int()
    .min(1)
    .max(MAX_WORKERS)
    .default(DEFAULT_WORKER_COUNT),
  chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  followSymlinks: z.boolean().default(false),
  excludePatterns: z.array(z.string()).default([]),
});

const ConfigSchema = z.object({
  engine: EngineConfigSchema.default({}),
  enableAuditLog: z.boolean().default(true),
});

export class ConfigLoader {
  /**
   * Load configuration from file or environment
   *
   * Lookup order: explicit path, `HASH_VERIFIER_CONFIG`, then
   * `hash-verifier-config.json` in the working directory. Environment
   * overrides are applied last.
   *
   * @throws ValidationError if the file is not valid JSON or fails the schema
   */
  static async loadConfig(configPath?: string): Promise<HashVerifierConfig> {
    const resolvedPath =
      configPath ||
      process.env["HASH_VERIFIER_CONFIG"] ||
      path.join(process.cwd(), "hash-verifier-config.json");

    let raw: unknown = {};
    if (fs.existsSync(resolvedPath)) {
      const configData = await fs.promises.readFile(resolvedPath, "utf-8");
      try {
        raw = JSON.parse(configData);
      } catch (error) {
        throw new ValidationError(
          `Configuration file ${resolvedPath} is not valid JSON: ${
            ErrorHandler.describe(error)
          }`
        );
      }
    }

    return this.parse(this.applyEnvironment(raw));
  }

  /**
   * Validate a raw configuration object and fill in defaults
   */
  static parse(raw: unknown): HashVerifierConfig {
    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ValidationError(`Invalid configuration: ${issues}`);
    }
    return parsed.data;
  }

  private static applyEnvironment(raw: unknown): unknown {
    const workers = process.env["HASH_VERIFIER_WORKERS"];
    const algorithm = process.env["HASH_VERIFIER_ALGORITHM"];
    if (!workers && !algorithm) {
      return raw;
    }

    const base = typeof raw === "object" && raw !== null ? raw : {};
    const engine =
      "engine" in base && typeof base.engine === "object" && base.engine !== null
        ? base.engine
        : {};

    return {
      ...base,
      engine: {
        ...engine,
        ...(workers ? { workerCount: Number(workers) } : {}),
        ...(algorithm ? { defaultAlgorithm: algorithm } : {}),
      },
    };
  }
}
