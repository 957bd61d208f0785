/**
 * Unit tests for ConfigLoader
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { ConfigLoader } from "./ConfigLoader";
import { ValidationError } from "../types";

describe("ConfigLoader", () => {
  const savedEnv = { ...process.env };
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-test-"));
    delete process.env["HASH_VERIFIER_CONFIG"];
    delete process.env["HASH_VERIFIER_WORKERS"];
    delete process.env["HASH_VERIFIER_ALGORITHM"];
  });

  afterEach(() => {
    process.env = { ...savedEnv };
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("parse", () => {
    it("should fill in defaults", () => {
      expect(ConfigLoader.parse({})).toEqual({
        engine: {
          defaultAlgorithm: "SHA256",
          workerCount: 4,
          chunkSize: 8192,
          followSymlinks: false,
          excludePatterns: [],
        },
        enableAuditLog: true,
      });
    });

    it("should canonicalize algorithm names", () => {
      const config = ConfigLoader.parse({ engine: { defaultAlgorithm: "sha-3" } });
      expect(config.engine.defaultAlgorithm).toBe("SHA3-256");
    });

    it("should reject out-of-range worker counts", () => {
      expect(() => ConfigLoader.parse({ engine: { workerCount: 17 } })).toThrow(
        ValidationError
      );
      expect(() => ConfigLoader.parse({ engine: { workerCount: 0 } })).toThrow(
        /^Invalid configuration: engine\.workerCount: /
      );
    });

    it("should reject unknown algorithms", () => {
      expect(() =>
        ConfigLoader.parse({ engine: { defaultAlgorithm: "ROT13" } })
      ).toThrow('Invalid configuration: engine.defaultAlgorithm: Unknown algorithm "ROT13"');
    });
  });

  describe("loadConfig", () => {
    it("should read an explicit config file", async () => {
      const configPath = path.join(tempDir, "config.json");
      fs.writeFileSync(
        configPath,
        JSON.stringify({
          engine: { workerCount: 8, excludePatterns: ["*.tmp"] },
          enableAuditLog: false,
        })
      );

      const config = await ConfigLoader.loadConfig(configPath);
      expect(config.engine.workerCount).toBe(8);
      expect(config.engine.excludePatterns).toEqual(["*.tmp"]);
      expect(config.enableAuditLog).toBe(false);
    });

    it("should find the config file through the environment", async () => {
      const configPath = path.join(tempDir, "env-config.json");
      fs.writeFileSync(configPath, JSON.stringify({ engine: { chunkSize: 4096 } }));
      process.env["HASH_VERIFIER_CONFIG"] = configPath;

      const config = await ConfigLoader.loadConfig();
      expect(config.engine.chunkSize).toBe(4096);
    });

    it("should use defaults when no file exists", async () => {
      const config = await ConfigLoader.loadConfig(path.join(tempDir, "none.json"));
      expect(config).toEqual(ConfigLoader.parse({}));
    });

    it("should let environment variables override the file", async () => {
      const configPath = path.join(tempDir, "config.json");
      fs.writeFileSync(
        configPath,
        JSON.stringify({ engine: { workerCount: 8, chunkSize: 1024 } })
      );
      process.env["HASH_VERIFIER_WORKERS"] = "2";
      process.env["HASH_VERIFIER_ALGORITHM"] = "blake3";

      const config = await ConfigLoader.loadConfig(configPath);
      expect(config.engine.workerCount).toBe(2);
      expect(config.engine.defaultAlgorithm).toBe("BLAKE3");
      expect(config.engine.chunkSize).toBe(1024);
    });

    it("should reject a worker count override that is not a number", async () => {
      process.env["HASH_VERIFIER_WORKERS"] = "many";
      await expect(
        ConfigLoader.loadConfig(path.join(tempDir, "none.json"))
      ).rejects.toThrow(ValidationError);
    });

    it("should reject a file that is not JSON", async () => {
      const configPath = path.join(tempDir, "broken.json");
      fs.writeFileSync(configPath, "{ engine: ");
      await expect(ConfigLoader.loadConfig(configPath)).rejects.toThrow(
        `Configuration file ${configPath} is not valid JSON`
      );
    });
  });
});
