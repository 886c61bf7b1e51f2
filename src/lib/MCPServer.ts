/**
 * MCP Server implementation for copy operations
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ILogger } from "../interfaces/ILogger";
import { TreecopyConfig } from "./ConfigLoader";
import { CopyDirectory } from "./CopyDirectory";
import { ErrorHandler } from "./ErrorHandler";
import { MCPTools, ToolSchema } from "./MCPTools";
import { SilentProgressSink } from "./ProgressBar";
import { SecurityManager } from "./SecurityManager";

export const SERVER_NAME = "treecopy";
export const SERVER_VERSION = "0.1.0";

interface JsonSchema {
  type: string;
  description?: string;
  items?: JsonSchema;
}

export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private mcpTools: MCPTools;
  private logger: ILogger;
  private isRunning: boolean = false;

  constructor(config: TreecopyConfig, logger: ILogger) {
    this.logger = logger.child({ component: "mcp-server" });

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    // stdout carries the protocol, so copies report progress nowhere
    const copyDirectory = new CopyDirectory({
      bufferSize: config.copy.bufferSize,
      maxConcurrentTransfers: config.copy.maxConcurrentTransfers,
      exclusions: config.copy.exclusions,
      createProgressSink: (total) => new SilentProgressSink(total),
    });
    const securityManager = new SecurityManager(config.security, logger);
    this.mcpTools = new MCPTools(securityManager, copyDirectory, logger);

    this.transport = new StdioServerTransport();

    this.server.onerror = (error) => {
      this.logger.error("Server error", { err: error });
    };

    process.on("SIGINT", () => this.shutdownOnSignal("SIGINT"));
    process.on("SIGTERM", () => this.shutdownOnSignal("SIGTERM"));
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error("Server is already running");
    }

    this.logger.info("Starting treecopy MCP server", {
      version: SERVER_VERSION,
    });

    this.registerHandlers();
    this.logger.debug("Registered MCP tools", {
      tools: MCPTools.getAllSchemas().map((schema) => schema.name),
    });

    await this.server.connect(this.transport);
    this.isRunning = true;
    this.logger.info("Server started and ready to accept requests");
  }

  /**
   * Register MCP protocol handlers
   */
  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: MCPTools.getAllSchemas().map((schema) => ({
        name: schema.name,
        description: schema.description,
        inputSchema: toInputSchema(schema),
      })),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        const result = await this.mcpTools.callTool(name, args);
        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(result, null, 2),
            },
          ],
          isError: result.status !== "success",
        };
      } catch (error) {
        this.logger.warn("Tool call failed", { tool: name, err: error });
        const errorResponse = ErrorHandler.toMCPError(error);

        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(errorResponse, null, 2),
            },
          ],
          isError: true,
        };
      }
    });
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      this.logger.debug("Server is not running, skipping shutdown");
      return;
    }

    this.logger.info("Shutting down");
    this.isRunning = false;

    await this.transport.close();
    await this.server.close();
    this.logger.info("Shutdown complete");
  }

  getServer(): Server {
    return this.server;
  }

  isServerRunning(): boolean {
    return this.isRunning;
  }

  private shutdownOnSignal(signal: NodeJS.Signals): void {
    this.logger.info("Received signal, shutting down", { signal });
    this.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        this.logger.error("Error during shutdown", { err: error });
        process.exit(1);
      }
    );
  }
}

/**
 * JSON schema published by tools/list for a tool's zod input schema
 */
export function toInputSchema(schema: ToolSchema): {
  type: "object";
  properties: Record<string, JsonSchema>;
  required: string[];
} {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries(schema.inputSchema.shape)) {
    if (!(value instanceof z.ZodType)) {
      continue;
    }
    properties[key] = toJsonSchema(value);
    if (!value.isOptional()) {
      required.push(key);
    }
  }

  return { type: "object", properties, required };
}

function toJsonSchema(value: z.ZodTypeAny): JsonSchema {
  const description = value.description;
  const inner = value instanceof z.ZodOptional ? value.unwrap() : value;

  let schema: JsonSchema;
  if (inner instanceof z.ZodArray) {
    schema = { type: "array", items: toJsonSchema(inner.element) };
  } else if (inner instanceof z.ZodNumber) {
    schema = { type: "number" };
  } else if (inner instanceof z.ZodBoolean) {
    schema = { type: "boolean" };
  } else {
    schema = { type: "string" };
  }

  return description ? { ...schema, description } : schema;
}
