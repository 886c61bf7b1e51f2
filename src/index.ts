/**
 * treecopy
 *
 * Concurrent recursive directory copy with progress reporting, usable as a
 * library, a CLI and an MCP server.
 */

export * from "./interfaces";
export * from "./lib";
export * from "./types";

import { ILogger } from "./interfaces/ILogger";
import { ConfigLoader } from "./lib/ConfigLoader";
import { Logger } from "./lib/Logger";
import { MCPServer } from "./lib/MCPServer";

/**
 * Load the configuration, then create and start the MCP server
 */
export async function startTreecopyServer(logger?: ILogger): Promise<MCPServer> {
  const config = await ConfigLoader.loadConfig();
  const server = new MCPServer(
    config,
    logger ?? new Logger({ level: config.logLevel })
  );
  await server.start();
  return server;
}
