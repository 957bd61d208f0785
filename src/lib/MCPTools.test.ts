/**
 * Unit tests for MCPTools
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import * as crypto from "crypto";
import { MCPTools, toToolInputSchema } from "./MCPTools";
import { HashVerifier } from "./HashVerifier";
import { ConfigLoader } from "./ConfigLoader";
import { UnsupportedAlgorithmError } from "../types";

const sha256 = (content: string): string =>
  crypto.createHash("sha256").update(content).digest("hex");

describe("MCPTools", () => {
  let mcpTools: MCPTools;
  let testDir: string;
  let outDir: string;

  beforeAll(async () => {
    mcpTools = new MCPTools(
      await HashVerifier.create(ConfigLoader.parse({ enableAuditLog: false }))
    );
  });

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "mcp-tools-data-"));
    outDir = fs.mkdtempSync(path.join(os.tmpdir(), "mcp-tools-out-"));
    fs.writeFileSync(path.join(testDir, "a.txt"), "alpha");
    fs.writeFileSync(path.join(testDir, "b.txt"), "bravo");
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
    fs.rmSync(outDir, { recursive: true, force: true });
  });

  describe("hash_list_algorithms", () => {
    it("should list algorithms and the configured default", async () => {
      const result = await mcpTools.hashListAlgorithms();
      expect(result.status).toBe("success");
      expect(result.defaultAlgorithm).toBe("SHA256");
      expect(result.algorithms).toContain("BLAKE3");
    });
  });

  describe("hash_compute_file", () => {
    it("should digest a file with the default algorithm", async () => {
      const filePath = path.join(testDir, "a.txt");
      expect(await mcpTools.hashComputeFile({ path: filePath })).toEqual({
        status: "success",
        path: filePath,
        algorithm: "SHA256",
        digest: sha256("alpha"),
      });
    });

    it("should honour an explicit algorithm", async () => {
      const result = await mcpTools.hashComputeFile({
        path: path.join(testDir, "a.txt"),
        algorithm: "md5",
      });
      expect(result.algorithm).toBe("MD5");
      expect(result.digest).toBe(
        crypto.createHash("md5").update("alpha").digest("hex")
      );
    });

    it("should reject an unknown algorithm", async () => {
      await expect(
        mcpTools.hashComputeFile({
          path: path.join(testDir, "a.txt"),
          algorithm: "UNKNOWN",
        })
      ).rejects.toThrow(UnsupportedAlgorithmError);
    });
  });

  describe("hash_scan_location", () => {
    it("should return digests inline without an output path", async () => {
      const result = await mcpTools.hashScanLocation({ location: testDir });

      expect(result.status).toBe("success");
      expect(result.totalFiles).toBe(2);
      expect(result.hashes).toEqual({
        "a.txt": sha256("alpha"),
        "b.txt": sha256("bravo"),
      });
      expect(result.operationId).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
      );
      expect(mcpTools.getRunningOperations()).toEqual([]);
    });

    it("should save the manifest when an output path is given", async () => {
      const outputPath = path.join(outDir, "scan.json");
      const result = await mcpTools.hashScanLocation({
        location: testDir,
        outputPath,
        operationId: "scan-1",
      });

      expect(result.operationId).toBe("scan-1");
      expect(result.outputPath).toBe(outputPath);
      expect(result.errorListingPath).toBeUndefined();
      expect(result.hashes).toBeUndefined();
      expect(JSON.parse(fs.readFileSync(outputPath, "utf-8")).metadata.total_files).toBe(2);
    });

    it("should refuse a second operation with a running id", async () => {
      const first = mcpTools.hashScanLocation({
        location: testDir,
        operationId: "busy",
      });
      await expect(
        mcpTools.hashScanLocation({ location: testDir, operationId: "busy" })
      ).rejects.toThrow("Operation already running: busy");
      await first;
    });

    it("should stop when the operation is cancelled", async () => {
      const pending = mcpTools.hashScanLocation({
        location: testDir,
        operationId: "scan-cancel",
      });
      expect(mcpTools.getRunningOperations()).toEqual(["scan-cancel"]);

      expect(
        await mcpTools.hashCancelOperation({ operationId: "scan-cancel" })
      ).toEqual({ status: "success", operationId: "scan-cancel", cancelled: true });
      const result = await pending;

      expect(result.status).toBe("cancelled");
      expect(result.totalFiles).toBe(0);
      expect(mcpTools.getRunningOperations()).toEqual([]);
    });
  });

  describe("hash_verify_manifest", () => {
    it("should verify a saved manifest and save the report", async () => {
      const manifestPath = path.join(outDir, "scan.json");
      const reportPath = path.join(outDir, "report.json");
      await mcpTools.hashScanLocation({ location: testDir, outputPath: manifestPath });
      fs.writeFileSync(path.join(testDir, "b.txt"), "BRAVO");

      const result = await mcpTools.hashVerifyManifest({ manifestPath, reportPath });

      expect(result.status).toBe("success");
      expect(result.sourceManifest).toBe(manifestPath);
      expect(result.summary).toEqual({
        matches: 1,
        mismatches: 1,
        notFound: 0,
        readErrors: 0,
        verificationErrors: 0,
      });
      expect(result.corrupted.map((record) => record.relativePath)).toEqual(["b.txt"]);
      expect(result.reportPath).toBe(reportPath);
      expect(result.corruptionListingPath).toBe(
        path.join(outDir, "report_corrupted.txt")
      );
    });
  });

  describe("hash_cancel_operation", () => {
    it("should report ids that are not running", async () => {
      expect(await mcpTools.hashCancelOperation({ operationId: "nope" })).toEqual({
        status: "not_found",
        operationId: "nope",
        cancelled: false,
      });
    });
  });

  describe("schemas", () => {
    it("should expose five tools", () => {
      expect(MCPTools.getAllSchemas().map((schema) => schema.name)).toEqual([
        "hash_list_algorithms",
        "hash_compute_file",
        "hash_scan_location",
        "hash_verify_manifest",
        "hash_cancel_operation",
      ]);
    });

    it("should convert input schemas to JSON Schema", () => {
      const inputSchema = toToolInputSchema(
        MCPTools.getHashScanLocationSchema().inputSchema
      );
      expect(inputSchema.type).toBe("object");
      expect(Object.keys(inputSchema.properties)).toEqual([
        "location",
        "algorithm",
        "workerCount",
        "outputPath",
        "operationId",
      ]);
      expect(inputSchema.required).toEqual(["location"]);
      expect(inputSchema.properties["location"]).toEqual({
        type: "string",
        minLength: 1,
        description: "File or directory to scan",
      });
      expect(inputSchema.properties["workerCount"]).toEqual({
        type: "integer",
        minimum: 1,
        maximum: 16,
        description: "Concurrent workers, 1-16",
      });
    });

    it("should publish an empty object for tools without arguments", () => {
      expect(
        toToolInputSchema(MCPTools.getHashListAlgorithmsSchema().inputSchema)
      ).toEqual({ type: "object", properties: {}, required: [] });
    });

    it("should reject arguments that fail validation", () => {
      expect(() =>
        MCPTools.getHashScanLocationSchema().inputSchema.parse({
          location: "/data",
          workerCount: 32,
        })
      ).toThrow();
    });
  });
});
