#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getDefaultCatalog } from "@cocktail-aesthetics/core";
import { resolveServerConfig } from "./config.js";
import { createAestheticsServer } from "./server.js";

// stdout carries the protocol; diagnostics go to stderr.
async function main(): Promise<void> {
  const config = resolveServerConfig(process.env);
  const catalog = getDefaultCatalog();

  if (config.preload && config.toolsets.includes("profiles")) {
    catalog.ensureBuilt();
    console.error(`Loaded ${catalog.size} cocktail profiles`);
  }

  const server = createAestheticsServer({ catalog, config });
  await server.connect(new StdioServerTransport());
  console.error(`${config.name} ${config.version} listening on stdio (toolsets: ${config.toolsets.join(", ")})`);
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
