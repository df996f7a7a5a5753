#!/usr/bin/env node

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Entry point for the credential broker MCP server. Loads configuration,
 * wires the broker, registers the credential tools, and starts listening
 * over stdio.
 */

import "dotenv/config";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { version } from "../package.json";
import { createCredentialBroker } from "./broker";
import { loadConfig } from "./config";
import { registerCredentialTools } from "./mcp/credential-tools";
import { logToFile, setLoggingEnabled } from "./utils/logger";
import { applyToolNameNormalization } from "./utils/tool-normalization";


/**
 * Bootstraps the MCP server, wires up the broker, registers tools,
 * and begins listening for incoming requests on stdio.
 */
async function main() {
  const config = loadConfig();
  if (config.debugLogging || process.argv.includes("--debug")) {
    setLoggingEnabled(true);
  }

  const broker = createCredentialBroker(config);
  if (!broker.sessions) {
    console.error("[broker] KRATOS_PUBLIC_URL is not set; every tool call will be refused");
  }

  const server = new McpServer({
    name: "credential-broker",
    version,
  });

  const useDotNames = process.argv.includes("--use-dot-names");
  const separator = useDotNames ? "." : "_";
  applyToolNameNormalization(server, useDotNames);

  registerCredentialTools(server, broker);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logToFile(`[broker] MCP server started, configured providers: ${broker.registry.listConfigured().join(", ") || "none"}`);
  console.error(
    `[broker] server running (tool separator: "${separator}"), listening for requests...`
  );
}


main().catch((error: unknown) => {
  console.error("[broker] critical error:", error);
  process.exit(1);
});
