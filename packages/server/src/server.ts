/**
 * Aesthetics MCP server
 *
 * Builds an McpServer with the configured toolsets. The catalog and atlas
 * default to the bundled taxonomy; tests pass their own.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  getDefaultCatalog,
  loadAestheticAtlas,
  type AestheticAtlas,
  type ProfileCatalog
} from "@cocktail-aesthetics/core";
import { DEFAULT_SERVER_CONFIG, type ServerConfig } from "./config.js";
import { registerAtlasTools } from "./tools/atlas-tools.js";
import { registerProfileTools } from "./tools/profile-tools.js";

export interface AestheticsServerOptions {
  catalog?: ProfileCatalog;
  atlas?: AestheticAtlas;
  config?: ServerConfig;
}

export function createAestheticsServer(options: AestheticsServerOptions = {}): McpServer {
  const config = options.config ?? DEFAULT_SERVER_CONFIG;
  const server = new McpServer({ name: config.name, version: config.version });

  if (config.toolsets.includes("profiles")) {
    registerProfileTools(server, options.catalog ?? getDefaultCatalog());
  }
  if (config.toolsets.includes("atlas")) {
    registerAtlasTools(server, options.atlas ?? loadAestheticAtlas());
  }

  return server;
}
