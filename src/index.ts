/**
 * File Hash Verifier
 *
 * Builds digest manifests for files and directory trees and later re-checks
 * those files against them, exposed to AI agents as MCP tools.
 */

export * from "./interfaces";
export * from "./lib";
export * from "./types";

import { MCPServer } from "./lib/MCPServer";
import { ConfigLoader } from "./lib/ConfigLoader";
import { ErrorHandler } from "./lib/ErrorHandler";
import { HashVerifier } from "./lib/HashVerifier";

function installProcessHandlers(): void {
  process.on("unhandledRejection", (reason) => {
    ErrorHandler.logError(reason, { source: "unhandledRejection" });
  });
  process.on("uncaughtException", (error) => {
    ErrorHandler.logError(error, { source: "uncaughtException" });
  });
}

/**
 * Load configuration, probe algorithms and serve MCP over stdio
 */
export async function startHashVerifierServer(
  configPath?: string
): Promise<MCPServer> {
  installProcessHandlers();

  const config = await ConfigLoader.loadConfig(configPath);
  const hashVerifier = await HashVerifier.create(config);
  console.error(
    `[File Hash Verifier] Available algorithms: ${hashVerifier
      .listAlgorithms()
      .join(", ")}`
  );

  const server = new MCPServer(config, hashVerifier);
  await server.start();
  return server;
}

if (require.main === module) {
  startHashVerifierServer().catch((error: unknown) => {
    ErrorHandler.logError(error, { phase: "startup" });
    process.exit(1);
  });
}
