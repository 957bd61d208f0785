/**
 * MCP tool definitions for hash verification
 *
 * Provides 5 MCP tools:
 * 1. hash_list_algorithms - List digest algorithms usable on this host
 * 2. hash_compute_file - Digest a single file
 * 3. hash_scan_location - Build a manifest for a file or directory tree
 * 4. hash_verify_manifest - Re-check files against a saved manifest
 * 5. hash_cancel_operation - Cancel a running scan or verification
 */

import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import { AlgorithmId } from "../interfaces/IDigestProvider";
import { CorruptionRecord, VerificationSummary } from "../interfaces/IManifestCodec";
import { ValidationError } from "../types";
import { CancellationToken } from "./CancellationToken";
import { MAX_WORKERS } from "./ConcurrentScheduler";
import { HashVerifier } from "./HashVerifier";

type OperationStatus = "success" | "cancelled";

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, unknown>;
  required: string[];
}

function toPropertySchema(field: z.ZodTypeAny): Record<string, unknown> {
  const inner: z.ZodTypeAny =
    field instanceof z.ZodOptional ? field.unwrap() : field;
  const property: Record<string, unknown> = {};

  if (inner instanceof z.ZodString) {
    property["type"] = "string";
    if (inner.minLength !== null) {
      property["minLength"] = inner.minLength;
    }
  } else if (inner instanceof z.ZodNumber) {
    property["type"] = inner.isInt ? "integer" : "number";
    if (inner.minValue !== null) {
      property["minimum"] = inner.minValue;
    }
    if (inner.maxValue !== null) {
      property["maximum"] = inner.maxValue;
    }
  } else if (inner instanceof z.ZodBoolean) {
    property["type"] = "boolean";
  }

  const description = field.description ?? inner.description;
  if (description) {
    property["description"] = description;
  }
  return property;
}

/**
 * Convert a tool's zod input schema to the JSON Schema MCP clients expect
 */
export function toToolInputSchema(schema: z.AnyZodObject): ToolInputSchema {
  const shape: z.ZodRawShape = schema.shape;
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const [key, field] of Object.entries(shape)) {
    properties[key] = toPropertySchema(field);
    if (!field.isOptional()) {
      required.push(key);
    }
  }

  return { type: "object", properties, required };
}

/**
 * MCP Tools class
 * Provides all tool implementations for the File Hash Verifier server
 */
export class MCPTools {
  private hashVerifier: HashVerifier;
  private operations: Map<string, CancellationToken> = new Map();

  constructor(hashVerifier: HashVerifier) {
    this.hashVerifier = hashVerifier;
  }

  /**
   * Tool 1: hash_list_algorithms
   */
  async hashListAlgorithms(): Promise<{
    status: string;
    algorithms: AlgorithmId[];
    defaultAlgorithm: AlgorithmId;
  }> {
    return {
      status: "success",
      algorithms: this.hashVerifier.listAlgorithms(),
      defaultAlgorithm: this.hashVerifier.getConfig().engine.defaultAlgorithm,
    };
  }

  static getHashListAlgorithmsSchema() {
    return {
      name: "hash_list_algorithms",
      description: "List the digest algorithms available on this host",
      inputSchema: z.object({}),
    };
  }

  /**
   * Tool 2: hash_compute_file
   */
  async hashComputeFile(
    args: z.infer<ReturnType<typeof MCPTools.getHashComputeFileSchema>["inputSchema"]>
  ): Promise<{
    status: string;
    path: string;
    algorithm: AlgorithmId;
    digest: string;
  }> {
    const algorithm = this.hashVerifier.resolveAlgorithm(args.algorithm);
    const digest = await this.hashVerifier.hashFile(args.path, algorithm);

    return {
      status: "success",
      path: args.path,
      algorithm,
      digest,
    };
  }

  static getHashComputeFileSchema() {
    return {
      name: "hash_compute_file",
      description: "Compute the digest of a single file",
      inputSchema: z.object({
        path: z.string().min(1).describe("File path"),
        algorithm: z
          .string()
          .optional()
          .describe("Digest algorithm (default: configured default)"),
      }),
    };
  }

  /**
   * Tool 3: hash_scan_location
   *
   * Without an output path the digests are returned inline.
   */
  async hashScanLocation(
    args: z.infer<ReturnType<typeof MCPTools.getHashScanLocationSchema>["inputSchema"]>
  ): Promise<{
    status: OperationStatus;
    operationId: string;
    location: string;
    algorithm: AlgorithmId;
    totalFiles: number;
    skipped: number;
    errors: string[];
    outputPath?: string;
    errorListingPath?: string;
    hashes?: Record<string, string>;
  }> {
    const { operationId, token } = this.beginOperation(args.operationId);
    try {
      const result = await this.hashVerifier.scan(args.location, {
        algorithm: args.algorithm,
        workerCount: args.workerCount,
        token,
      });
      const { manifest } = result;
      const status: OperationStatus = result.cancelled ? "cancelled" : "success";

      const response = {
        status,
        operationId,
        location: manifest.scanLocation,
        algorithm: manifest.algorithm,
        totalFiles: Object.keys(manifest.entries).length,
        skipped: result.skipped,
        errors: result.errors,
      };

      if (args.outputPath) {
        const saved = await this.hashVerifier.saveManifest(
          manifest,
          args.outputPath
        );
        return {
          ...response,
          outputPath: saved.path,
          errorListingPath: saved.companionPath,
        };
      }

      const hashes: Record<string, string> = Object.fromEntries(
        Object.entries(manifest.entries).map(
          ([key, record]): [string, string] => [key, record.digest]
        )
      );
      return { ...response, hashes };
    } finally {
      this.operations.delete(operationId);
    }
  }

  static getHashScanLocationSchema() {
    return {
      name: "hash_scan_location",
      description:
        "Hash every file under a location and optionally save the manifest",
      inputSchema: z.object({
        location: z.string().min(1).describe("File or directory to scan"),
        algorithm: z
          .string()
          .optional()
          .describe("Digest algorithm (default: configured default)"),
        workerCount: z
          .number()
          .int()
          .min(1)
          .max(MAX_WORKERS)
          .optional()
          .describe(`Concurrent workers, 1-${MAX_WORKERS}`),
        outputPath: z
          .string()
          .optional()
          .describe("Where to write the manifest JSON"),
        operationId: z
          .string()
          .optional()
          .describe("Id used to cancel this scan (generated when omitted)"),
      }),
    };
  }

  /**
   * Tool 4: hash_verify_manifest
   */
  async hashVerifyManifest(
    args: z.infer<ReturnType<typeof MCPTools.getHashVerifyManifestSchema>["inputSchema"]>
  ): Promise<{
    status: OperationStatus;
    operationId: string;
    sourceManifest: string;
    summary: VerificationSummary;
    corrupted: CorruptionRecord[];
    errors: string[];
    reportPath?: string;
    corruptionListingPath?: string;
  }> {
    const { operationId, token } = this.beginOperation(args.operationId);
    try {
      const report = await this.hashVerifier.verifyFile(args.manifestPath, {
        basePath: args.basePath,
        workerCount: args.workerCount,
        token,
      });

      const status: OperationStatus = report.cancelled ? "cancelled" : "success";

      const response = {
        status,
        operationId,
        sourceManifest: report.sourceManifest,
        summary: report.summary,
        corrupted: report.corrupted,
        errors: report.errors,
      };

      if (args.reportPath) {
        const saved = await this.hashVerifier.saveReport(report, args.reportPath);
        return {
          ...response,
          reportPath: saved.path,
          corruptionListingPath: saved.companionPath,
        };
      }
      return response;
    } finally {
      this.operations.delete(operationId);
    }
  }

  static getHashVerifyManifestSchema() {
    return {
      name: "hash_verify_manifest",
      description:
        "Verify files against a saved manifest and optionally save the report",
      inputSchema: z.object({
        manifestPath: z.string().min(1).describe("Manifest JSON to verify"),
        basePath: z
          .string()
          .optional()
          .describe("Directory to resolve relative manifest keys against"),
        reportPath: z
          .string()
          .optional()
          .describe("Where to write the verification report JSON"),
        workerCount: z
          .number()
          .int()
          .min(1)
          .max(MAX_WORKERS)
          .optional()
          .describe(`Concurrent workers, 1-${MAX_WORKERS}`),
        operationId: z
          .string()
          .optional()
          .describe("Id used to cancel this verification (generated when omitted)"),
      }),
    };
  }

  /**
   * Tool 5: hash_cancel_operation
   */
  async hashCancelOperation(
    args: z.infer<ReturnType<typeof MCPTools.getHashCancelOperationSchema>["inputSchema"]>
  ): Promise<{ status: string; operationId: string; cancelled: boolean }> {
    const token = this.operations.get(args.operationId);
    token?.cancel();
    return {
      status: token ? "success" : "not_found",
      operationId: args.operationId,
      cancelled: token !== undefined,
    };
  }

  static getHashCancelOperationSchema() {
    return {
      name: "hash_cancel_operation",
      description: "Cancel a running scan or verification",
      inputSchema: z.object({
        operationId: z.string().min(1).describe("Id of the running operation"),
      }),
    };
  }

  /**
   * Ids of operations currently running
   */
  getRunningOperations(): string[] {
    return [...this.operations.keys()];
  }

  /**
   * Cancel every running operation
   */
  cancelAll(): void {
    for (const token of this.operations.values()) {
      token.cancel();
    }
  }

  private beginOperation(requestedId?: string): {
    operationId: string;
    token: CancellationToken;
  } {
    const operationId = requestedId ?? uuidv4();
    if (this.operations.has(operationId)) {
      throw new ValidationError(`Operation already running: ${operationId}`);
    }
    const token = new CancellationToken();
    this.operations.set(operationId, token);
    return { operationId, token };
  }

  /**
   * Get all tool schemas
   */
  static getAllSchemas() {
    return [
      MCPTools.getHashListAlgorithmsSchema(),
      MCPTools.getHashComputeFileSchema(),
      MCPTools.getHashScanLocationSchema(),
      MCPTools.getHashVerifyManifestSchema(),
      MCPTools.getHashCancelOperationSchema(),
    ];
  }
}
