/**
 * MCP Server implementation for hash verification
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { HashVerifierConfig } from "./ConfigLoader";
import { HashVerifier } from "./HashVerifier";
import { MCPTools, toToolInputSchema } from "./MCPTools";
import { ErrorHandler } from "./ErrorHandler";
import { APP_NAME, APP_VERSION } from "./ManifestCodec";

const LOG_PREFIX = "[File Hash Verifier]";

export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private config: HashVerifierConfig;
  private mcpTools: MCPTools;
  private isRunning: boolean = false;

  constructor(config: HashVerifierConfig, hashVerifier: HashVerifier) {
    this.config = config;

    this.server = new Server(
      {
        name: APP_NAME,
        version: APP_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.mcpTools = new MCPTools(hashVerifier);
    this.transport = new StdioServerTransport();

    this.server.onerror = (error) => {
      console.error(`${LOG_PREFIX} Server error`, error);
    };

    process.on("SIGINT", () => {
      console.error(`${LOG_PREFIX} Received SIGINT, shutting down...`);
      void this.stop();
    });
    process.on("SIGTERM", () => {
      console.error(`${LOG_PREFIX} Received SIGTERM, shutting down...`);
      void this.stop();
    });
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error("Server is already running");
    }

    console.error(`${LOG_PREFIX} Starting ${APP_NAME} v${APP_VERSION}`);
    console.error(
      `${LOG_PREFIX} Default algorithm ${this.config.engine.defaultAlgorithm}, ${this.config.engine.workerCount} workers`
    );

    try {
      this.registerHandlers();
      console.error(
        `${LOG_PREFIX} Registered ${MCPTools.getAllSchemas().length} MCP tools`
      );

      await this.server.connect(this.transport);
      console.error(`${LOG_PREFIX} Connected stdio transport`);

      this.isRunning = true;
      console.error(`${LOG_PREFIX} Server started and ready to accept requests`);
    } catch (error) {
      console.error(`${LOG_PREFIX} Failed to start server:`, error);
      throw error;
    }
  }

  /**
   * Register MCP protocol handlers
   */
  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: MCPTools.getAllSchemas().map((schema) => ({
          name: schema.name,
          description: schema.description,
          inputSchema: toToolInputSchema(schema.inputSchema),
        })),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        const result = await this.callTool(name, args ?? {});

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(result, null, 2),
            },
          ],
        };
      } catch (error) {
        ErrorHandler.logError(error, { tool: name });
        const errorResponse = ErrorHandler.toMCPError(error);

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(errorResponse, null, 2),
            },
          ],
          isError: true,
        };
      }
    });
  }

  /**
   * Validate arguments against the tool's schema and dispatch
   */
  async callTool(name: string, args: unknown): Promise<unknown> {
    switch (name) {
      case "hash_list_algorithms":
        MCPTools.getHashListAlgorithmsSchema().inputSchema.parse(args);
        return this.mcpTools.hashListAlgorithms();

      case "hash_compute_file":
        return this.mcpTools.hashComputeFile(
          MCPTools.getHashComputeFileSchema().inputSchema.parse(args)
        );

      case "hash_scan_location":
        return this.mcpTools.hashScanLocation(
          MCPTools.getHashScanLocationSchema().inputSchema.parse(args)
        );

      case "hash_verify_manifest":
        return this.mcpTools.hashVerifyManifest(
          MCPTools.getHashVerifyManifestSchema().inputSchema.parse(args)
        );

      case "hash_cancel_operation":
        return this.mcpTools.hashCancelOperation(
          MCPTools.getHashCancelOperationSchema().inputSchema.parse(args)
        );

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      console.error(`${LOG_PREFIX} Server is not running, skipping shutdown`);
      return;
    }

    console.error(`${LOG_PREFIX} Shutting down gracefully...`);
    this.isRunning = false;

    try {
      const running = this.mcpTools.getRunningOperations();
      if (running.length > 0) {
        console.error(
          `${LOG_PREFIX} Cancelling ${running.length} running operation(s)`
        );
        this.mcpTools.cancelAll();
      }

      await this.transport.close();
      await this.server.close();

      console.error(`${LOG_PREFIX} Shutdown complete`);
    } catch (error) {
      console.error(`${LOG_PREFIX} Error during shutdown:`, error);
    } finally {
      process.exit(0);
    }
  }

  /**
   * Get the server instance
   */
  getServer(): Server {
    return this.server;
  }

  /**
   * Check if server is running
   */
  isServerRunning(): boolean {
    return this.isRunning;
  }
}
