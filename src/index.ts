#!/usr/bin/env node

/**
 * Wallhaven MCP Server
 *
 * This MCP (Model Context Protocol) server lets AI assistants search wallpapers on Wallhaven, read
 * wallpaper, tag, collection and browsing-settings metadata, and download full-size images. Set
 * WALLHAVEN_API_KEY to unlock NSFW content, private collections and account settings.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./log.js";
import { registerTools } from "./tools.js";
import { FetchTransport } from "./transport.js";
import { WallhavenClient } from "./wallhaven-api.js";

/**
 * Main function - Initialize transport and connect server
 */
async function main() {
  const config = loadConfig();
  const logger = createLogger("wallhaven", { debug: config.debug });
  const transport = new FetchTransport(config.timeoutMs);

  const client = new WallhavenClient({
    apiKey: config.apiKey,
    transport,
    authMethod: config.authMethod,
    useAccountSettings: config.useAccountSettings,
    logger,
  });

  const server = new McpServer({
    name: "wallhaven",
    version: "1.0.0",
  });
  registerTools(server, {
    client,
    transport,
    downloadDirectory: config.downloadDirectory,
    logger,
  });

  await server.connect(new StdioServerTransport());
  logger.info("Server ready", { authenticated: client.hasApiKey });
}

// Run the server
main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
