/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";


/**
 * Tool name as clients see it: dots kept with `useDotNames`, replaced with
 * underscores otherwise, since some clients reject dotted names.
 */
export function normalizeToolName(name: string, useDotNames: boolean): string {
  return useDotNames ? name : name.replace(/\./g, "_");
}


/**
 * Wraps McpServer.registerTool so every tool registered afterwards is
 * published under its normalized name.
 */
export function applyToolNameNormalization(
  server: McpServer,
  useDotNames: boolean
): void {
  const originalRegisterTool = server.registerTool.bind(server);

  // registerTool is overloaded; the wrapper only rewrites the first argument.
  (
    server as unknown as {
      registerTool: (name: string, ...args: unknown[]) => unknown;
    }
  ).registerTool = (name: string, ...rest: unknown[]) =>
    (originalRegisterTool as (...args: unknown[]) => unknown)(
      normalizeToolName(name, useDotNames),
      ...rest
    );
}
