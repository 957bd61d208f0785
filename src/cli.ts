#!/usr/bin/env node

/**
 * Starts the File Hash Verifier MCP server
 *
 * Usage: file-hash-verifier [config.json]
 */

import { ErrorHandler } from "./lib/ErrorHandler";
import { startHashVerifierServer } from "./index";

async function main(): Promise<void> {
  try {
    await startHashVerifierServer(process.argv[2]);
  } catch (error) {
    ErrorHandler.logError(error, { phase: "startup" });
    process.exit(1);
  }
}

void main();
