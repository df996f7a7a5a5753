/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * MCP tools that let an agent act on behalf of a signed-in platform user:
 * list connections, start a connection, disconnect, and obtain a usable
 * access token. Every tool takes the caller's session token.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type { CredentialBroker } from "../broker";
import { describeCredentialError, type CredentialError } from "../errors";
import { authenticate, describeSessionError } from "../session/session-verifier";
import { logToFile } from "../utils/logger";


type ToolDeps = Pick<CredentialBroker, "registry" | "store" | "flows" | "tokens" | "sessions">;


const sessionTokenSchema = z
  .string()
  .min(1)
  .describe("Session token of the platform user the call is made for.");

const providerSchema = z
  .string()
  .min(1)
  .describe("Provider id, for example notion, gmail or github.");


function text(message: string): CallToolResult {
  return { content: [{ type: "text", text: message }] };
}


function failure(message: string): CallToolResult {
  return { content: [{ type: "text", text: message }], isError: true };
}


function credentialFailure(error: CredentialError): CallToolResult {
  return failure(describeCredentialError(error));
}


/**
 * Tool implementations, independent of the MCP server so they can be called
 * directly.
 */
export function createToolHandlers(deps: ToolDeps) {
  const resolveUser = async (
    sessionToken: string
  ): Promise<{ ok: true; userId: string } | { ok: false; result: CallToolResult }> => {
    if (!deps.sessions) {
      return { ok: false, result: failure("Session verification is not configured") };
    }
    const session = await authenticate(deps.sessions, sessionToken);
    if (!session.ok) {
      return { ok: false, result: failure(describeSessionError(session.error)) };
    }
    return { ok: true, userId: session.value };
  };

  return {
    providers: async ({ sessionToken }: { sessionToken: string }): Promise<CallToolResult> => {
      const user = await resolveUser(sessionToken);
      if (!user.ok) {
        return user.result;
      }
      const listed = await deps.store.list(user.userId);
      if (!listed.ok) {
        return credentialFailure(listed.error);
      }
      return text(
        JSON.stringify(
          {
            connected: listed.value,
            supported: [...deps.registry.listSupported()],
            configured: deps.registry.listConfigured(),
          },
          null,
          2
        )
      );
    },

    connect: async ({
      sessionToken,
      provider,
    }: {
      sessionToken: string;
      provider: string;
    }): Promise<CallToolResult> => {
      const user = await resolveUser(sessionToken);
      if (!user.ok) {
        return user.result;
      }
      const begun = await deps.flows.begin(user.userId, provider);
      if (!begun.ok) {
        return credentialFailure(begun.error);
      }
      return text(
        `Ask the user to open this URL to connect ${deps.registry.displayName(provider)}:\n${begun.value}`
      );
    },

    disconnect: async ({
      sessionToken,
      provider,
    }: {
      sessionToken: string;
      provider: string;
    }): Promise<CallToolResult> => {
      const user = await resolveUser(sessionToken);
      if (!user.ok) {
        return user.result;
      }
      const deleted = await deps.store.delete(user.userId, provider);
      if (!deleted.ok) {
        return credentialFailure(deleted.error);
      }
      if (!deleted.value) {
        return failure(`Provider ${provider} not connected`);
      }
      return text(`${provider} disconnected successfully`);
    },

    accessToken: async ({
      sessionToken,
      provider,
    }: {
      sessionToken: string;
      provider: string;
    }): Promise<CallToolResult> => {
      const user = await resolveUser(sessionToken);
      if (!user.ok) {
        return user.result;
      }
      const token = await deps.tokens.getValidToken(user.userId, provider);
      if (!token.ok) {
        logToFile(`[mcp] access token unavailable for provider=${provider}: ${token.error.kind}`);
        return credentialFailure(token.error);
      }
      return text(token.value);
    },
  };
}


/**
 * Registers the credential tools. Tool names use dots; the server's name
 * normalization decides the separator clients see.
 */
export function registerCredentialTools(server: McpServer, deps: ToolDeps): void {
  const handlers = createToolHandlers(deps);

  server.registerTool(
    "oauth.providers",
    {
      description:
        "Lists the providers the user has connected, every supported provider, and which of them are configured.",
      inputSchema: { sessionToken: sessionTokenSchema },
    },
    handlers.providers
  );

  server.registerTool(
    "oauth.connect",
    {
      description:
        "Starts connecting a provider account and returns the authorization URL the user must open.",
      inputSchema: { sessionToken: sessionTokenSchema, provider: providerSchema },
    },
    handlers.connect
  );

  server.registerTool(
    "oauth.disconnect",
    {
      description: "Removes the stored credential for a provider.",
      inputSchema: { sessionToken: sessionTokenSchema, provider: providerSchema },
    },
    handlers.disconnect
  );

  server.registerTool(
    "oauth.accessToken",
    {
      description:
        "Returns a usable access token for a connected provider, refreshing it first when it is about to expire.",
      inputSchema: { sessionToken: sessionTokenSchema, provider: providerSchema },
    },
    handlers.accessToken
  );
}
